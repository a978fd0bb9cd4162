import { Command } from "commander";
import { getCommandContext } from "../lib/command-context";
import { listManagedInstances, requireInstanceByName } from "../lib/instances";
import type { InstanceStatus } from "../lib/types";

export function registerInspectCommand(program: Command): void {
  program
    .command("inspect <name>")
    .description("Show the observed status of an instance")
    .action(async (name: string) => {
      const { runtime } = await getCommandContext();

      const instances = await listManagedInstances(runtime);
      const instance = requireInstanceByName(instances, name);

      console.log(`service: ${instance.service ?? "-"}`);
      console.log(`container: ${instance.containerName}`);
      console.log(`id: ${instance.id ?? "-"}`);
      console.log(`project: ${instance.project ?? "-"}`);
      console.log(`image: ${instance.image ?? "-"}`);
      console.log(`status: ${instance.state}${instance.health ? ` (${instance.health})` : ""}`);
      console.log(`exit code: ${instance.exitCode ?? "-"}`);
      console.log(`restarts: ${instance.restartCount ?? 0}`);
      console.log(`ports: ${instance.ports.join(", ") || "-"}`);
      console.log(`fingerprint: ${instance.fingerprint ?? "-"}`);
      console.log(`started: ${instance.startedAt ? instance.startedAt.toISOString() : "-"}`);
      console.log(`uptime: ${computeUptime(instance)}`);
    });
}

function computeUptime(instance: InstanceStatus): string {
  if (!instance.startedAt || instance.state !== "running") {
    return "-";
  }

  const seconds = Math.max(0, Math.floor((Date.now() - instance.startedAt.getTime()) / 1000));
  const days = Math.floor(seconds / 86400);
  const hours = Math.floor((seconds % 86400) / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);

  if (days > 0) {
    return `${days}d ${hours}h ${minutes}m`;
  }
  if (hours > 0) {
    return `${hours}h ${minutes}m`;
  }
  return `${minutes}m`;
}

import chalk from "chalk";
import { Command } from "commander";
import { loadConfig } from "../lib/config";
import { formatCommand } from "../lib/exec";
import { formatConfigurationError } from "../lib/errors";
import { deviceIndexWarnings, formatPort, reservedDeviceIds, toCreateArgs } from "../lib/plan";
import { renderTable } from "../lib/table";
import { formatBytes } from "../lib/utils";
import { resolveFiles } from "../services/deployment";
import { withDocumentOptions, type DocumentOptions } from "./options";

interface PlanOptions extends DocumentOptions {
  json?: boolean;
  args?: boolean;
}

export function registerPlanCommand(program: Command): void {
  withDocumentOptions(
    program
      .command("plan")
      .description("Print the instantiation plans a document resolves to")
      .option("--json", "Print plans as JSON")
      .option("--args", "Print the docker create command for each plan")
  ).action((options: PlanOptions) => {
    const config = loadConfig(process.env, options);
    const resolved = resolveFiles(config.files, {
      project: config.project,
      exclusiveDevices: !options.sharedDevices
    });

    for (const error of resolved.errors) {
      console.error(chalk.yellow(`skipped: ${formatConfigurationError(error)}`));
    }
    if (resolved.errors.length > 0) {
      process.exitCode = 1;
    }
    for (const warning of resolved.plans.flatMap(deviceIndexWarnings)) {
      console.error(chalk.yellow(`warning: ${warning}`));
    }

    if (options.json) {
      console.log(JSON.stringify(resolved.plans, null, 2));
      return;
    }

    if (options.args) {
      for (const plan of resolved.plans) {
        console.log(formatCommand("docker", toCreateArgs(plan)));
      }
      return;
    }

    if (resolved.plans.length === 0) {
      console.log("No services resolved.");
      return;
    }

    const rows = resolved.plans.map((plan) => [
      plan.name,
      plan.containerName,
      plan.image,
      plan.ports.map(formatPort).join(", ") || "-",
      reservedDeviceIds(plan).join(",") || "-",
      formatBytes(plan.shmSizeBytes),
      plan.networks.join(", "),
      plan.restart
    ]);
    console.log(renderTable(["SERVICE", "CONTAINER", "IMAGE", "PORTS", "GPUS", "SHM", "NETWORKS", "RESTART"], rows));
  });
}

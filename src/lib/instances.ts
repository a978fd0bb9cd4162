import { CliError } from "./errors";
import type { DockerRuntime } from "./runtime";
import type { InstanceStatus } from "./types";

export async function listManagedInstances(runtime: DockerRuntime): Promise<InstanceStatus[]> {
  const names = await runtime.listManaged();
  const instances: InstanceStatus[] = [];
  for (const name of names) {
    instances.push(await runtime.observe(name));
  }
  return instances.sort((a, b) => displayName(a).localeCompare(displayName(b)));
}

export function displayName(instance: InstanceStatus): string {
  return instance.service ?? instance.containerName;
}

export function formatInstanceNotFoundMessage(name: string, available: string[]): string {
  if (available.length === 0) {
    return `Instance '${name}' not found. No deckhand instances exist yet.`;
  }
  return `Instance '${name}' not found. Available instances: ${available.join(", ")}`;
}

/** Looks an instance up by container name first, then by service name. */
export function requireInstanceByName(instances: InstanceStatus[], name: string): InstanceStatus {
  const byContainer = instances.find((instance) => instance.containerName === name);
  if (byContainer) {
    return byContainer;
  }

  const byService = instances.filter((instance) => instance.service === name);
  if (byService.length === 1) {
    return byService[0];
  }
  if (byService.length > 1) {
    throw new CliError({
      kind: "validation",
      message: `Service name '${name}' matches several instances: ${byService.map((item) => item.containerName).join(", ")}`,
      hint: "Use the container name instead."
    });
  }

  throw new CliError({
    kind: "not_found",
    message: formatInstanceNotFoundMessage(name, instances.map(displayName)),
    hint: "Run `deckhand ps` to list managed instances."
  });
}

import type { CommandRunner } from "./exec";

export interface HostGpu {
  index: string;
  uuid: string;
  name: string;
}

/**
 * GPUs the host driver exposes, or null when `nvidia-smi` is missing or
 * fails (no driver, no devices).
 */
export async function listHostGpus(run: CommandRunner): Promise<HostGpu[] | null> {
  try {
    const result = await run("nvidia-smi", ["--query-gpu=index,uuid,name", "--format=csv,noheader"], {
      allowNonZeroExit: true,
      timeoutMs: 10_000
    });
    if (result.exitCode !== 0) {
      return null;
    }
    return parseGpuCsv(result.stdout);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return null;
    }
    throw error;
  }
}

export function parseGpuCsv(output: string): HostGpu[] {
  const gpus: HostGpu[] = [];
  for (const line of output.split("\n")) {
    const [index, uuid, ...name] = line.split(",").map((part) => part.trim());
    if (!index || !/^\d+$/.test(index)) {
      continue;
    }
    gpus.push({ index, uuid: uuid ?? "", name: name.join(",") });
  }
  return gpus;
}

/** Reserved ids (indices or UUIDs) the host does not expose. */
export function missingDeviceIds(reserved: string[], gpus: HostGpu[]): string[] {
  const exposed = new Set(gpus.flatMap((gpu) => [gpu.index, gpu.uuid]));
  return reserved.filter((id) => !exposed.has(id));
}

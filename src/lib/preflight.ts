import { MIN_NODE_MAJOR } from "./constants";
import { runCommand, type CommandRunner } from "./exec";
import { listHostGpus, missingDeviceIds } from "./gpu";
import { reservedDeviceIds } from "./plan";
import { DockerRuntime, resolveDockerBinary } from "./runtime";
import type { InstantiationPlan } from "./types";

export interface PreflightCheck {
  key: string;
  ok: boolean;
  message: string;
  fix?: string;
  suggestedCommands?: string[];
}

export interface PreflightReport {
  checks: PreflightCheck[];
  ok: boolean;
}

export interface PreflightOptions {
  dockerBin?: string;
  /** Plans whose runtime and device claims should be checked against this host. */
  plans?: InstantiationPlan[];
  run?: CommandRunner;
  nodeVersion?: string;
}

export async function runPreflight(options: PreflightOptions = {}): Promise<PreflightReport> {
  const run = options.run ?? runCommand;
  const plans = options.plans ?? [];
  const checks: PreflightCheck[] = [];

  const nodeVersion = options.nodeVersion ?? process.versions.node;
  const nodeMajor = Number(nodeVersion.split(".")[0] ?? "0");
  checks.push({
    key: "node",
    ok: Number.isFinite(nodeMajor) && nodeMajor >= MIN_NODE_MAJOR,
    message: `Node.js v${nodeVersion}`,
    fix: nodeMajor >= MIN_NODE_MAJOR ? undefined : `Install Node.js ${MIN_NODE_MAJOR} or newer.`
  });

  const bin = await resolveDockerBinary(options.dockerBin, run);
  if (!bin) {
    checks.push({
      key: "docker-bin",
      ok: false,
      message: "docker CLI not found.",
      fix: "Install Docker Engine with the NVIDIA Container Toolkit, or Docker Desktop with WSL2 GPU support."
    });
    return { checks, ok: false };
  }
  checks.push({ key: "docker-bin", ok: true, message: `docker CLI found at ${bin}` });

  const status = await new DockerRuntime({ bin, run }).status();
  checks.push({
    key: "docker-daemon",
    ok: status.running,
    message: status.running ? `docker daemon is running (server ${status.serverVersion ?? "unknown"})` : "docker daemon is not reachable",
    fix: status.running ? undefined : "Start the docker service (or Docker Desktop) and retry.",
    suggestedCommands: status.running ? undefined : ["sudo systemctl start docker"]
  });

  const wantedRuntimes = [...new Set(plans.map((plan) => plan.runtime).filter((value): value is string => Boolean(value)))];
  for (const runtime of wantedRuntimes) {
    const registered = status.runtimes.includes(runtime);
    checks.push({
      key: `runtime-${runtime}`,
      ok: registered,
      message: registered ? `container runtime '${runtime}' is registered` : `container runtime '${runtime}' is not registered with docker`,
      fix: registered ? undefined : "Install the NVIDIA Container Toolkit and register its runtime.",
      suggestedCommands: registered ? undefined : ["sudo nvidia-ctk runtime configure --runtime=docker", "sudo systemctl restart docker"]
    });
  }

  const gpus = await listHostGpus(run);
  const needsGpus = plans.some((plan) => reservedDeviceIds(plan).length > 0);
  checks.push({
    key: "gpus",
    ok: gpus !== null || !needsGpus,
    message: gpus
      ? `host GPUs: ${gpus.map((gpu) => `${gpu.index} (${gpu.name})`).join(", ") || "none"}`
      : "nvidia-smi is not available; no GPUs detected",
    fix: gpus || !needsGpus ? undefined : "Install the NVIDIA driver so nvidia-smi lists the host GPUs."
  });

  if (gpus) {
    for (const plan of plans) {
      const reserved = reservedDeviceIds(plan);
      if (reserved.length === 0) {
        continue;
      }
      const missing = missingDeviceIds(reserved, gpus);
      checks.push({
        key: `devices-${plan.name}`,
        ok: missing.length === 0,
        message: missing.length === 0
          ? `${plan.name}: GPU devices [${reserved.join(", ")}] are exposed`
          : `${plan.name}: GPU devices [${missing.join(", ")}] are not exposed by this host`,
        fix: missing.length === 0 ? undefined : `Change the device reservation of '${plan.name}' to an index the host lists.`
      });
    }
  }

  return { checks, ok: checks.every((check) => check.ok) };
}

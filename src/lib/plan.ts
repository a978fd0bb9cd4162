import { VISIBLE_DEVICES_VAR } from "./constants";
import type { InstantiationPlan, PortMapping, RestartPolicy, VolumeBinding } from "./types";

const RESTART_FLAGS: Record<RestartPolicy, string> = {
  always: "always",
  "on-failure": "on-failure",
  never: "no"
};

/**
 * `docker create` arguments for a plan. Only the first network is attached
 * here; the rest are joined with `docker network connect` before start.
 */
export function toCreateArgs(plan: InstantiationPlan): string[] {
  const args = ["create", "--name", plan.containerName, "--restart", RESTART_FLAGS[plan.restart]];

  if (plan.privileged) {
    args.push("--privileged");
  }
  if (plan.tty) {
    args.push("--tty");
  }
  if (plan.runtime) {
    args.push("--runtime", plan.runtime);
  }
  if (plan.shmSize) {
    args.push("--shm-size", plan.shmSize);
  }

  const [primaryNetwork] = plan.networks;
  if (primaryNetwork) {
    args.push("--network", primaryNetwork, "--network-alias", plan.name);
  }

  for (const port of plan.ports) {
    args.push("--publish", formatPort(port));
  }
  for (const volume of plan.volumes) {
    args.push("--volume", formatVolume(volume));
  }
  for (const [key, value] of plan.environment) {
    args.push("--env", `${key}=${value}`);
  }
  for (const host of plan.extraHosts) {
    args.push("--add-host", host);
  }

  const gpus = formatGpus(plan);
  if (gpus) {
    args.push("--gpus", gpus);
  }

  for (const key of Object.keys(plan.labels).sort()) {
    args.push("--label", `${key}=${plan.labels[key]}`);
  }

  args.push(plan.image, ...plan.command);
  return args;
}

export function secondaryNetworks(plan: InstantiationPlan): string[] {
  return plan.networks.slice(1);
}

export function formatPort(port: PortMapping): string {
  const host = port.hostIp ? `${port.hostIp}:${port.hostPort}` : String(port.hostPort);
  return `${host}:${port.containerPort}/${port.protocol}`;
}

export function formatVolume(volume: VolumeBinding): string {
  return `${volume.hostPath}:${volume.containerPath}${volume.readOnly ? ":ro" : ""}`;
}

/** Reserved GPU ids in `--gpus` syntax; a list needs the inner quotes docker expects. */
export function formatGpus(plan: InstantiationPlan): string | undefined {
  const ids = plan.devices.flatMap((device) => device.deviceIds);
  if (ids.length === 0) {
    return undefined;
  }
  return ids.length === 1 ? `device=${ids[0]}` : `"device=${ids.join(",")}"`;
}

export function reservedDeviceIds(plan: InstantiationPlan): string[] {
  return plan.devices.flatMap((device) => device.deviceIds);
}

/**
 * `--gpus` renumbers the reserved GPUs from 0 inside the container. Host
 * indices in CUDA_VISIBLE_DEVICES only line up when the service runs
 * privileged and sees every host GPU.
 */
export function deviceIndexWarnings(plan: InstantiationPlan): string[] {
  const visible = plan.environment.find(([key]) => key === VISIBLE_DEVICES_VAR)?.[1];
  const reserved = reservedDeviceIds(plan);
  if (plan.privileged || visible === undefined || reserved.length === 0) {
    return [];
  }

  const inContainer = reserved.map((_, index) => String(index));
  const indices = visible.split(",").map((id) => id.trim()).filter((id) => /^\d+$/.test(id));
  if (indices.every((id) => inContainer.includes(id))) {
    return [];
  }
  return [
    `${plan.name}: ${VISIBLE_DEVICES_VAR}=${visible} names host GPUs, but the container numbers its reserved GPUs ${inContainer.join(",")}; use those indices or run privileged`
  ];
}

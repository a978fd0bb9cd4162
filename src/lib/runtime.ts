import fs from "node:fs";
import { FINGERPRINT_LABEL, MANAGED_LABEL, PROJECT_LABEL, SERVICE_LABEL } from "./constants";
import { CommandError, runCommand, type CommandRunner } from "./exec";
import { ImageResolutionError, ResourceUnavailableError, RuntimeStartupError } from "./errors";
import { listHostGpus, missingDeviceIds } from "./gpu";
import { reservedDeviceIds, secondaryNetworks, toCreateArgs } from "./plan";
import type { InstanceHandle, InstanceState, InstanceStatus, InstantiationPlan } from "./types";
import { isRecord, parseDockerTimestamp } from "./utils";

const DOCKER_BINARY_CANDIDATES = ["/usr/bin/docker", "/usr/local/bin/docker", "/opt/homebrew/bin/docker"];

/** The two calls the deployment layer makes against a container host. */
export interface HostRuntime {
  applyPlan(plan: InstantiationPlan): Promise<InstanceHandle>;
  observe(containerName: string): Promise<InstanceStatus>;
}

export interface DockerRuntimeOptions {
  bin: string;
  run?: CommandRunner;
  /** How long a started container must stay up (or report healthy) to count as ready. */
  startTimeoutMs?: number;
  pollIntervalMs?: number;
  checkDevices?: boolean;
}

export interface RuntimeStatus {
  running: boolean;
  serverVersion?: string;
  runtimes: string[];
  rawStatus: string;
}

const RESOURCE_PATTERNS = [
  /port is already allocated/i,
  /address already in use/i,
  /could not select device driver/i,
  /unknown or invalid runtime name/i,
  /nvidia-container-cli/i,
  /no such device/i
];

const MISSING_PATH_PATTERNS = [/bind source path does not exist/i, /invalid mount config/i];

const IMAGE_PATTERNS = [/pull access denied/i, /manifest unknown/i, /not found: manifest/i, /no such image/i, /repository does not exist/i];

export class DockerRuntime implements HostRuntime {
  readonly bin: string;
  private readonly run: CommandRunner;
  private readonly startTimeoutMs: number;
  private readonly pollIntervalMs: number;
  private readonly checkDevices: boolean;

  constructor(options: DockerRuntimeOptions) {
    this.bin = options.bin;
    this.run = options.run ?? runCommand;
    this.startTimeoutMs = options.startTimeoutMs ?? 15_000;
    this.pollIntervalMs = options.pollIntervalMs ?? 1000;
    this.checkDevices = options.checkDevices ?? true;
  }

  async status(): Promise<RuntimeStatus> {
    const result = await this.run(this.bin, ["info", "--format", "{{json .}}"], {
      allowNonZeroExit: true,
      timeoutMs: 15_000
    });
    const raw = [result.stdout, result.stderr].filter(Boolean).join("\n").trim();
    if (result.exitCode !== 0) {
      return { running: false, runtimes: [], rawStatus: raw || "unknown" };
    }

    const info = parseJson(result.stdout);
    const runtimes = isRecord(info) && isRecord(info.Runtimes) ? Object.keys(info.Runtimes).sort() : [];
    const serverVersion = isRecord(info) && typeof info.ServerVersion === "string" ? info.ServerVersion : undefined;
    return { running: true, serverVersion, runtimes, rawStatus: raw };
  }

  async applyPlan(plan: InstantiationPlan): Promise<InstanceHandle> {
    const existing = await this.observe(plan.containerName);
    if (existing.state !== "missing" && existing.fingerprint === plan.fingerprint) {
      if (existing.state !== "running" && existing.state !== "restarting") {
        await this.guard(plan, () => this.start(plan.containerName, existing.state));
        await this.waitUntilReady(plan, existing.restartCount ?? 0);
      }
      return await this.handle(plan, "unchanged");
    }

    await this.ensureNetworks(plan);
    await this.ensureImage(plan);
    await this.ensureDevicesExposed(plan);

    if (existing.state !== "missing") {
      await this.remove(plan.containerName);
    }

    await this.guard(plan, () => this.run(this.bin, toCreateArgs(plan), { timeoutMs: 120_000 }));
    for (const network of secondaryNetworks(plan)) {
      await this.guard(plan, () =>
        this.run(this.bin, ["network", "connect", "--alias", plan.name, network, plan.containerName], { timeoutMs: 30_000 })
      );
    }
    await this.guard(plan, () => this.run(this.bin, ["start", plan.containerName], { timeoutMs: 60_000 }));
    await this.waitUntilReady(plan, 0);

    return await this.handle(plan, existing.state === "missing" ? "created" : "replaced");
  }

  async observe(containerName: string): Promise<InstanceStatus> {
    const result = await this.run(this.bin, ["container", "inspect", containerName], {
      allowNonZeroExit: true,
      timeoutMs: 20_000
    });
    if (result.exitCode !== 0 || !result.stdout) {
      return { containerName, state: "missing", ports: [] };
    }

    const parsed = parseJson(result.stdout);
    const root = Array.isArray(parsed) ? parsed[0] : parsed;
    if (!isRecord(root)) {
      return { containerName, state: "unknown", ports: [] };
    }
    return toInstanceStatus(containerName, root);
  }

  async listManaged(): Promise<string[]> {
    const result = await this.run(
      this.bin,
      ["ps", "--all", "--filter", `label=${MANAGED_LABEL}=true`, "--format", "{{.Names}}"],
      { timeoutMs: 20_000 }
    );
    return result.stdout.split("\n").map((line) => line.trim()).filter(Boolean).sort();
  }

  /** Docker refuses to `start` a paused container, so those are unpaused instead. */
  async start(containerName: string, state?: InstanceState): Promise<void> {
    await this.run(this.bin, [state === "paused" ? "unpause" : "start", containerName], { timeoutMs: 60_000 });
  }

  async stop(containerName: string): Promise<void> {
    await this.run(this.bin, ["stop", containerName], { timeoutMs: 60_000 });
  }

  /** Removes the container only; bind-mounted host directories are never touched. */
  async remove(containerName: string): Promise<void> {
    await this.run(this.bin, ["rm", "--force", containerName], { timeoutMs: 60_000 });
  }

  async logTail(containerName: string, lines = 40): Promise<string> {
    const result = await this.run(this.bin, ["logs", "--tail", String(lines), containerName], {
      allowNonZeroExit: true,
      timeoutMs: 20_000
    });
    return [result.stdout, result.stderr].filter(Boolean).join("\n");
  }

  private async ensureNetworks(plan: InstantiationPlan): Promise<void> {
    for (const network of plan.networks) {
      const inspect = await this.run(this.bin, ["network", "inspect", network], {
        allowNonZeroExit: true,
        timeoutMs: 20_000
      });
      if (inspect.exitCode === 0) {
        continue;
      }
      const created = await this.run(
        this.bin,
        [
          "network",
          "create",
          "--driver",
          plan.networkDrivers[network] ?? "bridge",
          "--label",
          `${MANAGED_LABEL}=true`,
          "--label",
          `${PROJECT_LABEL}=${plan.project}`,
          network
        ],
        { allowNonZeroExit: true, timeoutMs: 30_000 }
      );
      // A sibling plan applied concurrently may have created it first.
      if (created.exitCode !== 0 && !/already exists/i.test(created.stderr)) {
        throw new CommandError(`${this.bin} network create ${network}`, created.exitCode, created.stdout, created.stderr);
      }
    }
  }

  private async ensureImage(plan: InstantiationPlan): Promise<void> {
    const inspect = await this.run(this.bin, ["image", "inspect", plan.image], {
      allowNonZeroExit: true,
      timeoutMs: 20_000
    });
    if (inspect.exitCode === 0) {
      return;
    }

    try {
      await this.run(this.bin, ["pull", plan.image], { timeoutMs: 30 * 60_000 });
    } catch (error) {
      throw new ImageResolutionError({
        service: plan.name,
        image: plan.image,
        message: `image '${plan.image}' is not present and could not be pulled`,
        detail: error instanceof CommandError ? error.stderr || error.reason : errorMessage(error)
      });
    }
  }

  private async ensureDevicesExposed(plan: InstantiationPlan): Promise<void> {
    const reserved = reservedDeviceIds(plan);
    if (!this.checkDevices || reserved.length === 0) {
      return;
    }

    const gpus = await listHostGpus(this.run);
    if (!gpus) {
      throw new ResourceUnavailableError({
        service: plan.name,
        message: `GPU devices [${reserved.join(", ")}] are reserved but the host exposes no NVIDIA driver (nvidia-smi failed)`
      });
    }
    const missing = missingDeviceIds(reserved, gpus);
    if (missing.length > 0) {
      throw new ResourceUnavailableError({
        service: plan.name,
        message: `GPU devices [${missing.join(", ")}] are not exposed by the host`,
        detail: `host GPUs: ${gpus.map((gpu) => `${gpu.index} ${gpu.name}`).join("; ") || "none"}`
      });
    }
  }

  /**
   * Polls until the readiness window closes or a healthcheck reports healthy.
   * A restart past `baselineRestarts` means the process died and the restart
   * policy brought it back, which still counts as a failed start.
   */
  private async waitUntilReady(plan: InstantiationPlan, baselineRestarts: number): Promise<void> {
    const deadline = Date.now() + this.startTimeoutMs;
    do {
      const status = await this.observe(plan.containerName);
      const crashed = status.state === "exited"
        || status.state === "missing"
        || status.state === "restarting"
        || (status.restartCount ?? 0) > baselineRestarts;
      if (crashed) {
        throw new RuntimeStartupError({
          service: plan.name,
          exitCode: status.exitCode,
          message: `container '${plan.containerName}' exited before becoming ready${
            typeof status.exitCode === "number" ? ` (exit code ${status.exitCode})` : ""
          }`,
          detail: (await this.logTail(plan.containerName)) || undefined
        });
      }
      if (status.health === "healthy") {
        return;
      }
      await sleep(this.pollIntervalMs);
    } while (Date.now() < deadline);
  }

  private async handle(plan: InstantiationPlan, action: InstanceHandle["action"]): Promise<InstanceHandle> {
    const status = await this.observe(plan.containerName);
    return {
      service: plan.name,
      containerName: plan.containerName,
      containerId: status.id ?? "",
      action,
      status
    };
  }

  /** Maps docker's resource and image complaints onto the deployment taxonomy; anything else is relayed as-is. */
  private async guard<T>(plan: InstantiationPlan, action: () => Promise<T>): Promise<T> {
    try {
      return await action();
    } catch (error) {
      throw classifyRuntimeFailure(plan, error);
    }
  }
}

export function classifyRuntimeFailure(plan: InstantiationPlan, error: unknown): unknown {
  if (!(error instanceof CommandError)) {
    return error;
  }

  const lines = `${error.stderr}\n${error.stdout}`.split("\n").map((line) => line.trim()).filter(Boolean);
  const matching = (patterns: RegExp[]) => lines.find((line) => patterns.some((pattern) => pattern.test(line)));
  const detail = error.stderr || undefined;

  const missingPath = matching(MISSING_PATH_PATTERNS);
  if (missingPath) {
    return new ResourceUnavailableError({
      service: plan.name,
      message: `a volume host path does not exist on the host: ${missingPath}`,
      detail
    });
  }

  const resource = matching(RESOURCE_PATTERNS);
  if (resource) {
    return new ResourceUnavailableError({ service: plan.name, message: resource, detail });
  }

  const image = matching(IMAGE_PATTERNS);
  if (image) {
    return new ImageResolutionError({ service: plan.name, image: plan.image, message: image, detail });
  }
  return error;
}

function toInstanceStatus(containerName: string, root: Record<string, unknown>): InstanceStatus {
  const state = isRecord(root.State) ? root.State : {};
  const config = isRecord(root.Config) ? root.Config : {};
  const labels = isRecord(config.Labels) ? config.Labels : {};
  const settings = isRecord(root.NetworkSettings) ? root.NetworkSettings : {};
  const health = isRecord(state.Health) && typeof state.Health.Status === "string" ? state.Health.Status : undefined;

  return {
    containerName,
    id: typeof root.Id === "string" ? root.Id.slice(0, 12) : undefined,
    state: normalizeState(state.Status),
    health,
    exitCode: typeof state.ExitCode === "number" ? state.ExitCode : undefined,
    restartCount: typeof root.RestartCount === "number" ? root.RestartCount : undefined,
    image: typeof config.Image === "string" ? config.Image : undefined,
    service: stringLabel(labels, SERVICE_LABEL),
    project: stringLabel(labels, PROJECT_LABEL),
    fingerprint: stringLabel(labels, FINGERPRINT_LABEL),
    ports: formatPublishedPorts(settings.Ports),
    startedAt: parseDockerTimestamp(state.StartedAt)
  };
}

const DOCKER_STATES: readonly InstanceState[] = ["running", "restarting", "created", "exited", "paused"];

function normalizeState(raw: unknown): InstanceState {
  const value = typeof raw === "string" ? raw.toLowerCase() : "";
  const known = DOCKER_STATES.find((state) => state === value);
  if (known) {
    return known;
  }
  if (value === "dead" || value === "removing") {
    return "exited";
  }
  return "unknown";
}

function formatPublishedPorts(raw: unknown): string[] {
  if (!isRecord(raw)) {
    return [];
  }
  const published: string[] = [];
  for (const [containerPort, bindings] of Object.entries(raw)) {
    if (!Array.isArray(bindings)) {
      continue;
    }
    for (const binding of bindings) {
      if (isRecord(binding) && typeof binding.HostPort === "string") {
        const hostIp = typeof binding.HostIp === "string" && binding.HostIp ? `${binding.HostIp}:` : "";
        published.push(`${hostIp}${binding.HostPort}->${containerPort}`);
      }
    }
  }
  return published.sort();
}

function stringLabel(labels: Record<string, unknown>, key: string): string | undefined {
  const value = labels[key];
  return typeof value === "string" ? value : undefined;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return undefined;
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function resolveDockerBinary(override?: string, run: CommandRunner = runCommand): Promise<string | null> {
  const candidates = [override, ...DOCKER_BINARY_CANDIDATES].filter((value): value is string => Boolean(value));
  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }

  const whichResult = await run("which", ["docker"], { allowNonZeroExit: true, timeoutMs: 5000 }).catch(() => null);
  if (whichResult && whichResult.exitCode === 0 && whichResult.stdout) {
    const resolved = whichResult.stdout.split("\n")[0].trim();
    if (resolved) {
      return resolved;
    }
  }

  return null;
}

export async function requireDockerBinary(override?: string): Promise<string> {
  const binary = await resolveDockerBinary(override);
  if (binary) {
    return binary;
  }

  throw new Error("docker CLI was not found. Install Docker Engine (or Docker Desktop) and make sure `docker` is on PATH.");
}

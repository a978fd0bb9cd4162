import { loadConfig, type ConfigOverrides, type DeckhandConfig } from "./config";
import { CliError } from "./errors";
import { DockerRuntime, requireDockerBinary } from "./runtime";

export interface CommandContext {
  config: DeckhandConfig;
  runtime: DockerRuntime;
}

export interface CommandContextOptions extends ConfigOverrides {
  checkDevices?: boolean;
}

export async function getCommandContext(options: CommandContextOptions = {}): Promise<CommandContext> {
  const config = loadConfig(process.env, options);

  let bin: string;
  try {
    bin = await requireDockerBinary(config.dockerBin);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CliError({
      kind: "dependency",
      message,
      hint: "Set DECKHAND_DOCKER_BIN if docker lives somewhere unusual."
    });
  }

  const runtime = new DockerRuntime({
    bin,
    startTimeoutMs: config.startTimeoutMs,
    checkDevices: options.checkDevices
  });

  const status = await runtime.status();
  if (!status.running) {
    throw new CliError({
      kind: "dependency",
      message: "The docker daemon is not reachable.",
      hint: "Start Docker (or check DOCKER_HOST) and retry.",
      detail: status.rawStatus
    });
  }

  return { config, runtime };
}

import { spawn } from "node:child_process";

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
  allowNonZeroExit?: boolean;
}

export interface RunResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/** Signature of {@link runCommand}; the docker adapter takes one so tests can swap in a fake. */
export type CommandRunner = (command: string, args?: string[], options?: RunOptions) => Promise<RunResult>;

export class CommandError extends Error {
  readonly command: string;
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;

  constructor(command: string, exitCode: number, stdout: string, stderr: string) {
    super(`Command failed (${exitCode}): ${command}`);
    this.name = "CommandError";
    this.command = command;
    this.exitCode = exitCode;
    this.stdout = stdout;
    this.stderr = stderr;
  }

  /** Last non-empty stderr line, which is where docker puts its reason. */
  get reason(): string {
    const lines = this.stderr.split("\n").map((line) => line.trim()).filter(Boolean);
    return lines[lines.length - 1] ?? this.message;
  }
}

export const runCommand: CommandRunner = async (command, args = [], options = {}) => {
  const timeoutMs = options.timeoutMs ?? 60_000;
  const env = options.env ? { ...process.env, ...options.env } : process.env;

  return await new Promise<RunResult>((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      env,
      stdio: ["ignore", "pipe", "pipe"]
    });

    let stdout = "";
    let stderr = "";
    let settled = false;

    const settle = (action: () => void) => {
      clearTimeout(timeoutHandle);
      if (!settled) {
        settled = true;
        action();
      }
    };

    const timeoutHandle = setTimeout(() => {
      child.kill("SIGTERM");
      settle(() => reject(new Error(`Command timed out after ${timeoutMs}ms: ${formatCommand(command, args)}`)));
    }, timeoutMs);

    child.stdout?.on("data", (chunk: Buffer | string) => {
      stdout += chunk.toString();
    });

    child.stderr?.on("data", (chunk: Buffer | string) => {
      stderr += chunk.toString();
    });

    child.on("error", (error) => {
      settle(() => reject(error));
    });

    child.on("close", (code) => {
      const exitCode = typeof code === "number" ? code : 1;
      if (exitCode !== 0 && !options.allowNonZeroExit) {
        settle(() => reject(new CommandError(formatCommand(command, args), exitCode, stdout.trim(), stderr.trim())));
        return;
      }
      settle(() => resolve({ stdout: stdout.trim(), stderr: stderr.trim(), exitCode }));
    });
  });
};

/** Runs with the terminal attached; resolves with the exit code once the child ends. */
export async function runInteractive(command: string, args: string[] = []): Promise<number> {
  return await new Promise<number>((resolve, reject) => {
    const child = spawn(command, args, { stdio: "inherit" });
    child.on("error", reject);
    child.on("close", (code) => {
      resolve(typeof code === "number" ? code : 1);
    });
  });
}

export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].map((part) => (/[\s"']/.test(part) ? JSON.stringify(part) : part)).join(" ");
}

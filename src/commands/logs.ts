import { Command } from "commander";
import { getCommandContext } from "../lib/command-context";
import { runInteractive } from "../lib/exec";
import { CliError } from "../lib/errors";
import { listManagedInstances, requireInstanceByName } from "../lib/instances";

interface LogsOptions {
  follow?: boolean;
  tail: string;
}

export function registerLogsCommand(program: Command): void {
  program
    .command("logs <name>")
    .description("Print the output of an instance")
    .option("-f, --follow", "Keep streaming new output")
    .option("-n, --tail <lines>", "Number of lines from the end", "100")
    .action(async (name: string, options: LogsOptions) => {
      const tail = Number(options.tail);
      if (!Number.isInteger(tail) || tail < 0) {
        throw new CliError({ kind: "validation", message: "--tail must be a non-negative integer." });
      }

      const { runtime } = await getCommandContext();
      const instance = requireInstanceByName(await listManagedInstances(runtime), name);

      const args = ["logs", "--tail", String(tail)];
      if (options.follow) {
        args.push("--follow");
      }
      args.push(instance.containerName);

      const exitCode = await runInteractive(runtime.bin, args);
      process.exitCode = exitCode;
    });
}

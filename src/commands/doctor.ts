import chalk from "chalk";
import { Command } from "commander";
import { loadConfig } from "../lib/config";
import { CliError } from "../lib/errors";
import { runPreflight } from "../lib/preflight";
import { resolveFiles } from "../services/deployment";
import { collect } from "./options";

interface DoctorOptions {
  file: string[];
}

export function registerDoctorCommand(program: Command): void {
  program
    .command("doctor")
    .description("Check this host can run the plans: docker, NVIDIA runtime, GPU indices")
    .option("-f, --file <path>", "Also check the runtime and GPU claims of a document", collect, [])
    .action(async (options: DoctorOptions) => {
      const config = loadConfig(process.env);
      const plans = options.file.length > 0 ? resolveFiles(options.file).plans : [];
      const report = await runPreflight({ dockerBin: config.dockerBin, plans });
      const suggestedCommands = new Set<string>();

      for (const check of report.checks) {
        const symbol = check.ok ? chalk.green("✔") : chalk.red("✖");
        console.log(`${symbol} ${check.message}`);
        if (!check.ok && check.fix) {
          console.log(`  fix: ${check.fix}`);
        }
        for (const command of check.ok ? [] : check.suggestedCommands ?? []) {
          console.log(`  please run: ${chalk.bold(command)}`);
          suggestedCommands.add(command);
        }
      }

      if (!report.ok) {
        if (suggestedCommands.size > 0) {
          console.log("");
          console.log(chalk.yellow("Action required: run the command(s) above, then re-run `deckhand doctor`."));
        }
        throw new CliError({ kind: "dependency", message: "Preflight failed." });
      }
    });
}

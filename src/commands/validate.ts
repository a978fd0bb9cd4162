import chalk from "chalk";
import { Command } from "commander";
import { loadConfig } from "../lib/config";
import { CliError, formatConfigurationError } from "../lib/errors";
import { resolveFiles } from "../services/deployment";
import { withDocumentOptions, type DocumentOptions } from "./options";

export function registerValidateCommand(program: Command): void {
  withDocumentOptions(
    program
      .command("validate")
      .description("Check deployment documents without touching the host")
  ).action((options: DocumentOptions) => {
    const config = loadConfig(process.env, options);
    const resolved = resolveFiles(config.files, {
      project: config.project,
      exclusiveDevices: !options.sharedDevices
    });

    for (const plan of resolved.plans) {
      console.log(`${chalk.green("✔")} ${plan.name} ${chalk.dim(`(${plan.containerName}, ${plan.image})`)}`);
    }
    for (const error of resolved.errors) {
      console.log(`${chalk.red("✖")} ${formatConfigurationError(error)}`);
    }

    if (resolved.errors.length > 0) {
      throw new CliError({
        kind: "validation",
        message: `${resolved.errors.length} configuration error(s); ${resolved.plans.length} service(s) resolved.`
      });
    }
    console.log(chalk.green(`${resolved.plans.length} service(s) resolved with no configuration errors.`));
  });
}

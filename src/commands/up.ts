import chalk from "chalk";
import { Command } from "commander";
import inquirer from "inquirer";
import ora from "ora";
import { getCommandContext } from "../lib/command-context";
import { CliError, formatConfigurationError, renderCliError, toCliError } from "../lib/errors";
import { deviceIndexWarnings, formatPort, reservedDeviceIds } from "../lib/plan";
import { applyPlans, resolveFiles, selectPlans } from "../services/deployment";
import { withDocumentOptions, type DocumentOptions } from "./options";

interface UpOptions extends DocumentOptions {
  yes?: boolean;
  gpuCheck?: boolean;
}

export function registerUpCommand(program: Command): void {
  withDocumentOptions(
    program
      .command("up [services...]")
      .description("Resolve documents and create or update their instances")
      .option("-y, --yes", "Skip confirmation")
      .option("--no-gpu-check", "Do not check reserved GPU indices with nvidia-smi before creating")
  ).action(async (services: string[], options: UpOptions) => {
    const { config, runtime } = await getCommandContext({
      file: options.file,
      project: options.project,
      checkDevices: options.gpuCheck !== false
    });

    const resolved = resolveFiles(config.files, {
      project: config.project,
      exclusiveDevices: !options.sharedDevices
    });
    for (const error of resolved.errors) {
      console.log(chalk.yellow(`skipped: ${formatConfigurationError(error)}`));
    }

    const plans = selectPlans(resolved.plans, services);
    if (plans.length === 0) {
      throw new CliError({
        kind: "validation",
        message: "Nothing to apply: no service resolved without configuration errors."
      });
    }

    console.log(chalk.cyan("Apply summary"));
    for (const plan of plans) {
      const ports = plan.ports.map(formatPort).join(", ") || "no ports";
      const gpus = reservedDeviceIds(plan);
      console.log(`  ${plan.name}: ${plan.image}, ${ports}${gpus.length > 0 ? `, GPU ${gpus.join(",")}` : ""}`);
    }
    for (const warning of plans.flatMap(deviceIndexWarnings)) {
      console.log(chalk.yellow(`warning: ${warning}`));
    }

    if (!options.yes) {
      if (!process.stdout.isTTY) {
        throw new CliError({
          kind: "validation",
          message: "Confirmation required. Re-run with --yes in non-interactive mode."
        });
      }
      const answer = await inquirer.prompt<{ proceed: boolean }>([
        {
          type: "confirm",
          name: "proceed",
          message: `Apply ${plans.length} plan(s)?`,
          default: true
        }
      ]);
      if (!answer.proceed) {
        console.log("Cancelled.");
        return;
      }
    }

    const spinner = ora(`Applying ${plans.length} plan(s)...`).start();
    const outcomes = await applyPlans(runtime, plans);
    const failed = outcomes.filter((outcome) => !outcome.ok);
    if (failed.length === 0) {
      spinner.succeed(`Applied ${plans.length} plan(s).`);
    } else {
      spinner.fail(`${failed.length} of ${plans.length} plan(s) failed.`);
    }

    for (const outcome of outcomes) {
      if (outcome.ok) {
        const { handle } = outcome;
        console.log(`${chalk.green("✔")} ${handle.service} ${handle.action} (${handle.containerName}, ${handle.status.state})`);
      } else {
        console.log(`${chalk.red("✖")} ${chalk.red(renderCliError(toCliError(outcome.error)))}`);
      }
    }

    if (failed.length > 0 || resolved.errors.length > 0) {
      throw new CliError({
        kind: "runtime",
        message: `${failed.length} service(s) failed to start; ${resolved.errors.length} configuration error(s).`
      });
    }
  });
}

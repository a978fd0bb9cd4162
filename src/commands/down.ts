import inquirer from "inquirer";
import ora from "ora";
import { Command } from "commander";
import { getCommandContext } from "../lib/command-context";
import { CliError } from "../lib/errors";
import { displayName, listManagedInstances, requireInstanceByName } from "../lib/instances";
import type { InstanceStatus } from "../lib/types";

interface DownOptions {
  all?: boolean;
  yes?: boolean;
}

export function registerDownCommand(program: Command): void {
  program
    .command("down [names...]")
    .description("Stop and remove instances; bind-mounted host directories are kept")
    .option("-a, --all", "Remove every managed instance")
    .option("-y, --yes", "Skip interactive confirmation")
    .action(async (names: string[], options: DownOptions) => {
      if (names.length === 0 && !options.all) {
        throw new CliError({
          kind: "validation",
          message: "Name at least one instance, or pass --all.",
          hint: "Run `deckhand ps` to list managed instances."
        });
      }

      const { runtime } = await getCommandContext();
      const instances = await listManagedInstances(runtime);
      const targets: InstanceStatus[] = options.all ? instances : names.map((name) => requireInstanceByName(instances, name));
      if (targets.length === 0) {
        console.log("No deckhand instances found.");
        return;
      }

      const label = targets.map(displayName).join(", ");
      if (!options.yes) {
        if (!process.stdout.isTTY) {
          throw new CliError({
            kind: "validation",
            message: "Removal confirmation requires a TTY. Re-run with --yes."
          });
        }
        const confirm = await inquirer.prompt<{ proceed: boolean }>([
          {
            type: "confirm",
            name: "proceed",
            message: `Remove ${label}?`,
            default: false
          }
        ]);
        if (!confirm.proceed) {
          console.log("Cancelled.");
          return;
        }
      }

      for (const instance of targets) {
        const name = displayName(instance);
        const spinner = ora(`Removing '${name}'...`).start();
        try {
          await runtime.remove(instance.containerName);
          spinner.succeed(`Removed '${name}' (${instance.containerName}).`);
        } catch (error) {
          spinner.fail(`Removing '${name}' failed.`);
          throw error;
        }
      }
    });
}

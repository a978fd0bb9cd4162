import ora from "ora";
import { Command } from "commander";
import { getCommandContext } from "../lib/command-context";
import { listManagedInstances, requireInstanceByName } from "../lib/instances";

export function registerStopCommand(program: Command): void {
  program
    .command("stop <name>")
    .description("Stop a running instance; its restart policy stays in force after a host reboot")
    .action(async (name: string) => {
      const { runtime } = await getCommandContext();
      const instance = requireInstanceByName(await listManagedInstances(runtime), name);

      if (instance.state !== "running" && instance.state !== "restarting") {
        console.log(`Instance '${name}' is already stopped.`);
        return;
      }

      const spinner = ora(`Stopping '${name}'...`).start();
      try {
        await runtime.stop(instance.containerName);
        spinner.succeed(`Stopped '${name}'.`);
      } catch (error) {
        spinner.fail("Stop failed.");
        throw error;
      }

      console.log(`Volumes are preserved. Resume anytime with \`deckhand start ${name}\`.`);
    });
}

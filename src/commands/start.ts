import ora from "ora";
import { Command } from "commander";
import { getCommandContext } from "../lib/command-context";
import { listManagedInstances, requireInstanceByName } from "../lib/instances";

export function registerStartCommand(program: Command): void {
  program
    .command("start <name>")
    .description("Start a stopped or paused instance")
    .action(async (name: string) => {
      const { runtime } = await getCommandContext();
      const instance = requireInstanceByName(await listManagedInstances(runtime), name);

      if (instance.state === "running") {
        console.log(`Instance '${name}' is already running.`);
        return;
      }

      const spinner = ora(`Starting '${name}'...`).start();
      try {
        await runtime.start(instance.containerName, instance.state);
        spinner.succeed(`Started '${name}'.`);
      } catch (error) {
        spinner.fail("Start failed.");
        throw error;
      }
    });
}

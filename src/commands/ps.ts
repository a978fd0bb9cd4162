import { Command } from "commander";
import { getCommandContext } from "../lib/command-context";
import { displayName, listManagedInstances } from "../lib/instances";
import { renderTable } from "../lib/table";

export function registerPsCommand(program: Command): void {
  program
    .command("ps")
    .alias("ls")
    .description("List instances deckhand manages on this host")
    .action(async () => {
      const { runtime } = await getCommandContext();

      const instances = await listManagedInstances(runtime);
      if (instances.length === 0) {
        console.log("No deckhand instances found.");
        return;
      }

      const rows = instances.map((instance) => [
        displayName(instance),
        instance.containerName,
        instance.state,
        instance.project ?? "-",
        instance.image ?? "-",
        instance.ports.join(", ") || "-"
      ]);

      console.log(renderTable(["SERVICE", "CONTAINER", "STATUS", "PROJECT", "IMAGE", "PORTS"], rows));
    });
}

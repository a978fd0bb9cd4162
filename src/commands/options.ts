import { Command } from "commander";

export interface DocumentOptions {
  file: string[];
  project?: string;
  sharedDevices?: boolean;
}

export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/** `-f` may repeat; documents given together are checked as co-located on one host. */
export function withDocumentOptions(command: Command): Command {
  return command
    .option("-f, --file <path>", "Deployment document (repeat for several)", collect, [])
    .option("-p, --project <name>", "Project label for a single document")
    .option("--shared-devices", "Allow several services to reserve the same GPU index");
}

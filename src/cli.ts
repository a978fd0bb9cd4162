import chalk from "chalk";
import { Command } from "commander";
import { registerDoctorCommand } from "./commands/doctor";
import { registerDownCommand } from "./commands/down";
import { registerInspectCommand } from "./commands/inspect";
import { registerLogsCommand } from "./commands/logs";
import { registerPlanCommand } from "./commands/plan";
import { registerPsCommand } from "./commands/ps";
import { registerStartCommand } from "./commands/start";
import { registerStopCommand } from "./commands/stop";
import { registerUpCommand } from "./commands/up";
import { registerValidateCommand } from "./commands/validate";
import { CLI_NAME } from "./lib/constants";
import { renderCliError, toCliError } from "./lib/errors";
import { readPackageMeta } from "./lib/package";

const pkg = readPackageMeta();
const program = new Command();
const normalizedArgv = process.argv.map((arg) => (arg === "-v" ? "--version" : arg));

program
  .name(CLI_NAME)
  .description("Resolve GPU inference deployment documents into container plans and apply them to docker")
  .version(pkg.version ?? "0.0.0", "--version", "output the version number");

registerDoctorCommand(program);
registerValidateCommand(program);
registerPlanCommand(program);
registerUpCommand(program);
registerPsCommand(program);
registerInspectCommand(program);
registerLogsCommand(program);
registerStartCommand(program);
registerStopCommand(program);
registerDownCommand(program);

program.parseAsync(normalizedArgv).catch((error: unknown) => {
  const cliError = toCliError(error);
  console.error(chalk.red(renderCliError(cliError)));
  process.exitCode = cliError.exitCode;
});

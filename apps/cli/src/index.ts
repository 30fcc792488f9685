import dotenv from "dotenv";
dotenv.config({ quiet: true });

import { program } from "commander";
import { initConfig, setCliOverride } from "./config";
import { registerConfigCommand } from "./commands/config";
import { registerCubeCommands } from "./commands/cube";
import log, { parseLogLevel } from "./logger";

program
  .name("pocketsolve")
  .description("pocketsolve - Scramble, turn and solve the 2x2x2 pocket cube")
  .version("0.1.0", "-v, --version")
  .option("--log-level <level>", "Log level: trace, debug, info, warn, error or fatal");

program.hook("preAction", async (thisCommand) => {
  const { logLevel } = thisCommand.opts<{ logLevel?: string }>();
  if (logLevel) {
    setCliOverride("logLevel", logLevel);
  }
  const config = await initConfig();
  log.level(parseLogLevel(config.logLevel));
});

registerConfigCommand(program);
registerCubeCommands(program);

program.parseAsync().catch((err: unknown) => {
  log.error({ err }, "command failed");
  process.exitCode = 1;
});

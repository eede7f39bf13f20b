import { cac } from "cac";

import {
  createDefaultLoggerFromEnv,
  createLoggerFromEnvOrFallback,
} from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";

import { registerSync } from "./app/Sync";

const cli = cac("dcim-sync");

registerSync(cli, (level) => createDefaultLoggerFromEnv({ level }));

cli.help();
cli.version("0.1.0", "-V, --version");
cli.parse(process.argv, { run: false });

if (!cli.matchedCommand) {
  process.exit(0);
}

try {
  await cli.runMatchedCommand();
} catch (error) {
  const logger = createLoggerFromEnvOrFallback();
  logger.error({ error }, "執行命令時發生錯誤");
  await dispose(logger);
  process.exit(1);
}

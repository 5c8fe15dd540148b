import "dotenv/config";
import { runCli } from "./cli/main";
import { logger, toErrorDetails } from "./shared/logger/logger";

runCli(process.argv).catch((error) => {
  logger.error({ error: toErrorDetails(error) }, "CLI failed");
  process.exit(1);
});

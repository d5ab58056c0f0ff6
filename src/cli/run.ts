import { logger } from "../shared/logger/logger";
import { runCli } from "./main";

runCli(process.argv).catch((error: unknown) => {
  logger.error({ err: error }, "CLI failed");
  process.exitCode = 1;
});

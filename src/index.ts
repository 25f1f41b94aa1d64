import { runRuntime } from "./app/runtime.js";
import { errorMessage, logger } from "./lib/logger.js";

void runRuntime().catch((error) => {
  logger.error("Fatal runtime error", { error: errorMessage(error) });
  process.exitCode = 1;
});

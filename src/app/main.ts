import "dotenv/config";
import { parseCliOverrides } from "../arbitrage/config";
import { createArbitrageRuntime, formatPerformanceSummary } from "../arbitrage/runtime";
import { AppError } from "../errors/app.errors";
import { ConsoleLogger } from "../utils/logger.util";

async function main(): Promise<void> {
  const logger = new ConsoleLogger();
  const cliOverrides = parseCliOverrides(process.argv.slice(2));
  const runtime = await createArbitrageRuntime({ overrides: cliOverrides, logger });

  const shutdown = (signal: string): void => {
    logger.info(`[ARB] ${signal} received, stopping after the current cycle`);
    runtime.engine.stop();
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  await runtime.engine.start();
  logger.info(formatPerformanceSummary(runtime));
}

main().catch((err: unknown) => {
  const logger = new ConsoleLogger();
  if (err instanceof AppError) {
    logger.error(`[ARB] Fatal ${err.code ?? err.name}: ${err.message}`);
  } else {
    logger.error("[ARB] Fatal error", err instanceof Error ? err : new Error(String(err)));
  }
  process.exit(1);
});

/**
 * Caseboard service
 * Reads one JSON report per line from stdin and logs every graph update
 */

import readline from "readline";
import { getConfig, logger, wrapError } from "@tipboard/core";
import { createCaseboard } from "./system.js";

async function main(): Promise<void> {
  const config = getConfig();
  logger.setLevel(config.env.logLevel);

  const caseboard = createCaseboard();
  caseboard.broadcaster.subscribe({
    id: "log",
    deliver: (message) => {
      logger.debug(`graph ${message.action}`, { payload: message.payload });
    },
  });
  caseboard.start();

  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info(`Received ${signal}, shutting down`);
    await caseboard.stop();
    process.exit(0);
  };
  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));

  const lines = readline.createInterface({ input: process.stdin });
  for await (const line of lines) {
    if (!line.trim()) continue;
    try {
      const input: unknown = JSON.parse(line);
      const caseId =
        typeof input === "object" && input !== null && "caseId" in input && typeof input.caseId === "string"
          ? input.caseId
          : undefined;
      const { caseId: assigned, reportId } = await caseboard.intake.submitReport(input, caseId);
      logger.info("Report accepted", { caseId: assigned, nodeId: reportId });
    } catch (error) {
      const failure = wrapError(error, "Report rejected");
      logger.warn(`Report rejected: ${failure.message}`, { code: failure.code });
    }
  }

  await caseboard.settle();
  logger.info("Input closed", { ...caseboard.stats().graph });
  await shutdown("end of input");
}

main().catch((error: unknown) => {
  logger.error("Fatal error", error);
  process.exit(1);
});

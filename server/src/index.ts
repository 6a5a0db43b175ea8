import 'dotenv/config';
import path from "path";
import { HTTPServer } from "./http.js";
import { validateEnvironment, type RunMode } from "./env-validation.js";
import { getPipelineConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { createPipeline, createStores } from "./app.js";
import { countRawNames } from "./normalization/similarity-resolver.js";
import { organizationNames, readParticipantRows, writeMapping } from "./pipeline/input.js";
import { formatSummary, topErrors } from "./pipeline/summary.js";
import { closeDatabase } from "./db/client.js";

const logger = createLogger("main");

function runMode(): RunMode {
  return process.env.MODE === "http" ? "http" : "batch";
}

async function runBatch(): Promise<void> {
  const config = getPipelineConfig();
  const pipeline = await createPipeline(config, await createStores(config));

  const inputFile = path.resolve(process.env.INPUT_FILE || "input/participants.json");
  const rows = await readParticipantRows(inputFile);
  const { mapping, groups } = pipeline.resolver.resolve(countRawNames(organizationNames(rows)));
  await pipeline.registry.syncFromResolution(groups);
  const mappingFile = await writeMapping(config.outputDir, mapping);
  logger.info({ rows: rows.length, organizations: groups.length, mappingFile }, "Input resolved");

  const controller = new AbortController();
  const interrupt = (signal: string) => {
    if (controller.signal.aborted) {
      logger.warn({ signal }, "Second interrupt, exiting immediately");
      process.exit(130);
    }
    logger.warn({ signal }, "Interrupt received, finishing in-flight organizations");
    controller.abort();
  };
  process.on("SIGINT", () => interrupt("SIGINT"));
  process.on("SIGTERM", () => interrupt("SIGTERM"));

  try {
    const summary = await pipeline.runner.run({ concurrency: config.workerCount, signal: controller.signal });
    process.stdout.write(`${formatSummary(summary, topErrors(pipeline.registry.all()), pipeline.classifierUsage.usage())}\n`);
  } finally {
    await closeDatabase();
  }
}

async function runServer(): Promise<void> {
  const config = getPipelineConfig();
  const pipeline = await createPipeline(config, await createStores(config));
  const server = new HTTPServer(pipeline);
  const port = parseInt(process.env.PORT || "3000", 10);
  await server.start(port);
}

async function main() {
  const mode = runMode();
  if (!validateEnvironment(mode)) {
    process.exit(1);
  }

  if (mode === "http") {
    await runServer();
  } else {
    await runBatch();
  }
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, "Run failed");
  process.exit(1);
});

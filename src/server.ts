import { loadConfig } from "./config.js";
import { loadCatalog } from "./http/catalog.js";
import { createCatalogEngine } from "./http/engine.js";
import { startServer } from "./http/server.js";
import { configureLogging, logger, readableDuration } from "./logging/logger.js";

async function main(): Promise<void> {
  const config = loadConfig();
  configureLogging({ level: config.logLevel, format: config.logFormat });

  const started = performance.now();
  const entries = await loadCatalog(config.catalogPath);
  logger.info("catalog loaded", { items: entries.length, path: config.catalogPath, took: readableDuration(performance.now() - started) });

  const engine = createCatalogEngine(entries, config.scoring);
  const { server, port } = await startServer({ port: config.port, engine, maxResults: config.maxResults });

  function shutdown(): void {
    server.close(() => process.exit(0));
  }

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  logger.info(`listening on :${port}`);
}

try {
  await main();
} catch (e) {
  logger.fatal("startup failed", {}, e);
  process.exit(1);
}

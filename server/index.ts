import express from "express";
import { loadConfig, loadJurisdictions } from "./config";
import { registerRoutes } from "./routes";
import { SchedulerService } from "./services/scheduler";
import { Logger } from "./services/logger";
import { RequestClient } from "./services/scrapers";
import { createStorage } from "./storage";

async function main() {
  const config = loadConfig();
  const registry = loadJurisdictions();
  const storage = await createStorage(config.storage, config.databaseUrl);
  Logger.attach(storage);

  const client = new RequestClient({
    maxRetries: config.scraper.maxRetries,
    retryBaseDelayMs: config.scraper.retryBaseDelayMs,
    timeoutMs: config.scraper.requestTimeoutMs,
  });

  const scheduler = new SchedulerService({
    storage,
    registry,
    client,
    schedule: config.schedule,
    scraper: config.scraper,
  });

  const app = express();
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  const server = registerRoutes(app, { storage, scheduler });

  await scheduler.start();

  server.listen(config.port, () => {
    console.log(`[express] serving on port ${config.port} (${config.storage} storage)`);
  });

  const shutdown = async (signal: string) => {
    await Logger.info(`Received ${signal}, shutting down`, 'server');
    scheduler.stop();
    await scheduler.stopAutomation();
    server.close();
  };
  process.once('SIGINT', () => { void shutdown('SIGINT'); });
  process.once('SIGTERM', () => { void shutdown('SIGTERM'); });
}

main().catch((error) => {
  console.error('[server] Fatal startup error:', error);
  process.exit(1);
});

import type { Express, Response } from "express";
import { createServer, type Server } from "http";
import { z } from "zod";
import { attorneySearchFiltersSchema } from "@shared/schema";
import type { IStorage } from "./storage";
import { AppError, JurisdictionConfigError } from "./errors";
import type { SchedulerService } from "./services/scheduler";
import { Logger } from "./services/logger";
import { attorneysToCsv } from "./services/export";

export interface RouteDeps {
  storage: IStorage;
  scheduler: SchedulerService;
}

const limitQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(1000).optional(),
});

const runRequestSchema = z.object({
  jurisdictions: z.array(z.string().trim().min(1)).min(1).optional(),
});

function sendError(res: Response, error: unknown, fallback: string) {
  if (error instanceof z.ZodError) {
    const issues = error.issues.map(issue => `${issue.path.join('.') || 'request'}: ${issue.message}`).join('; ');
    return res.status(400).json({ error: issues });
  }
  if (error instanceof JurisdictionConfigError) {
    return res.status(400).json({ error: error.message });
  }
  if (error instanceof AppError) {
    return res.status(error.statusCode).json({ error: error.message });
  }
  return res.status(500).json({ error: fallback });
}

export function registerRoutes(app: Express, { storage, scheduler }: RouteDeps): Server {
  app.get("/api/health", (_req, res) => {
    res.json({ status: "ok", running: scheduler.isAutomationRunning() });
  });

  // Recent scrape runs
  app.get("/api/runs", async (req, res) => {
    try {
      const { limit } = limitQuerySchema.parse(req.query);
      const runs = await storage.getRecentScrapeRuns(limit ?? 20);
      res.json({
        isRunning: scheduler.isAutomationRunning(),
        schedule: scheduler.getScheduleInfo(),
        runs
      });
    } catch (error) {
      sendError(res, error, "Failed to fetch scrape runs");
    }
  });

  app.get("/api/runs/:id", async (req, res) => {
    try {
      const run = await storage.getScrapeRun(req.params.id);
      if (!run) {
        throw new AppError("Scrape run not found", 404);
      }
      res.json(run);
    } catch (error) {
      sendError(res, error, "Failed to fetch scrape run");
    }
  });

  // Manual trigger
  app.post("/api/runs", async (req, res) => {
    try {
      if (scheduler.isAutomationRunning()) {
        throw new AppError("A scrape is already running", 409);
      }

      const body = runRequestSchema.parse(req.body ?? {});
      const jurisdictions = scheduler.validateJurisdictions(
        body.jurisdictions ?? scheduler.getScheduleInfo().jurisdictions
      );

      // Start in background; progress is visible through /api/runs and /api/logs
      scheduler.runAutomation('manual', jurisdictions).catch(async error => {
        await Logger.error(`Manual automation failed: ${error}`, 'routes');
      });

      res.status(202).json({ message: "Scrape started", jurisdictions });
    } catch (error) {
      sendError(res, error, "Failed to start scrape");
    }
  });

  // Stop automation
  app.post("/api/runs/stop", async (_req, res) => {
    try {
      const stopped = await scheduler.stopAutomation();
      if (!stopped) {
        throw new AppError("No scrape is running", 409);
      }
      res.json({ message: "Stop requested" });
    } catch (error) {
      sendError(res, error, "Failed to stop scrape");
    }
  });

  app.get("/api/attorneys", async (req, res) => {
    try {
      const filters = attorneySearchFiltersSchema.parse(req.query);
      const attorneys = await storage.searchAttorneys({ ...filters, limit: filters.limit ?? 100 });
      res.json(attorneys);
    } catch (error) {
      sendError(res, error, "Failed to search attorneys");
    }
  });

  // Export search results as CSV
  app.get("/api/attorneys/export.csv", async (req, res) => {
    try {
      const filters = attorneySearchFiltersSchema.parse(req.query);
      const attorneys = await storage.searchAttorneys(filters);
      const filename = `attorneys_export_${new Date().toISOString().split('T')[0]}.csv`;

      res.setHeader('Content-Type', 'text/csv; charset=utf-8');
      res.setHeader('Content-Disposition', `attachment; filename="${filename}"`);
      res.status(200).send(attorneysToCsv(attorneys));
    } catch (error) {
      sendError(res, error, "Failed to export attorneys");
    }
  });

  app.get("/api/stats", async (_req, res) => {
    try {
      res.json(await storage.getAttorneyStats());
    } catch (error) {
      sendError(res, error, "Failed to fetch statistics");
    }
  });

  // System logs
  app.get("/api/logs", async (req, res) => {
    try {
      const { limit } = limitQuerySchema.parse(req.query);
      res.json(await storage.getRecentSystemLogs(limit ?? 50));
    } catch (error) {
      sendError(res, error, "Failed to fetch system logs");
    }
  });

  return createServer(app);
}

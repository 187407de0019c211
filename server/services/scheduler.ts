import * as cron from 'node-cron';
import type { AppConfig, JurisdictionRegistry } from '../config';
import { JurisdictionConfigError } from '../errors';
import type { IStorage } from '../storage';
import { Logger } from './logger';
import {
  createScraper,
  getAvailableJurisdictions,
  isJurisdictionSupported,
  type RequestClient,
  type ScrapeRunSummary
} from './scrapers';

export type AutomationType = 'scheduled' | 'manual';

export interface JurisdictionFailure {
  jurisdiction: string;
  error: string;
}

export interface AutomationResult {
  type: AutomationType;
  startedAt: Date;
  finishedAt: Date;
  stopped: boolean;
  summaries: ScrapeRunSummary[];
  failures: JurisdictionFailure[];
}

export interface SchedulerOptions {
  storage: IStorage;
  registry: JurisdictionRegistry;
  client: RequestClient;
  schedule: AppConfig['schedule'];
  scraper: Pick<AppConfig['scraper'], 'concurrency' | 'maxPages'>;
  sleep?: (ms: number) => Promise<void>;
}

export class SchedulerService {
  private isRunning = false;
  private scheduledTask: cron.ScheduledTask | null = null;
  private abortController: AbortController | null = null;
  private lastResult: AutomationResult | null = null;
  private options: SchedulerOptions;

  constructor(options: SchedulerOptions) {
    this.options = options;
  }

  async start(): Promise<void> {
    const { cron: expression, timezone, enabled, jurisdictions } = this.options.schedule;

    if (!enabled) {
      await Logger.info('Scheduler disabled, scrapes run only on demand', 'scheduler');
      return;
    }

    if (!cron.validate(expression)) {
      throw new Error(`Invalid schedule expression "${expression}"`);
    }
    this.validateJurisdictions(jurisdictions);

    // Stop existing task if any
    this.scheduledTask?.stop();

    this.scheduledTask = cron.schedule(expression, async () => {
      try {
        await this.runAutomation('scheduled');
      } catch (error) {
        await Logger.error(`Scheduled run failed: ${error}`, 'scheduler');
      }
    }, {
      timezone
    });

    await Logger.info(`Scheduler started - "${expression}" (${timezone}) for ${jurisdictions.join(', ')}`, 'scheduler');
  }

  stop(): void {
    this.scheduledTask?.stop();
    this.scheduledTask = null;
  }

  /**
   * Throws JurisdictionConfigError for any code without a scraper or a
   * configuration entry.
   */
  validateJurisdictions(codes: string[]): string[] {
    if (codes.length === 0) {
      throw new JurisdictionConfigError('No jurisdictions selected');
    }

    return codes.map(code => {
      const normalized = code.trim().toUpperCase();
      if (!isJurisdictionSupported(normalized)) {
        throw new JurisdictionConfigError(
          `Unknown jurisdiction "${code}". Available: ${getAvailableJurisdictions().join(', ')}`
        );
      }
      if (!this.options.registry[normalized]) {
        throw new JurisdictionConfigError(`Jurisdiction ${normalized} is not configured`);
      }
      return normalized;
    });
  }

  /**
   * Runs the given jurisdictions one after another. Returns null when a run
   * is already in progress.
   */
  async runAutomation(
    type: AutomationType,
    jurisdictions: string[] = this.options.schedule.jurisdictions
  ): Promise<AutomationResult | null> {
    if (this.isRunning) {
      await Logger.warning('Automation already running, skipping', 'scheduler');
      return null;
    }

    this.isRunning = true;
    const controller = new AbortController();
    this.abortController = controller;

    const result: AutomationResult = {
      type,
      startedAt: new Date(),
      finishedAt: new Date(),
      stopped: false,
      summaries: [],
      failures: [],
    };

    try {
      await Logger.info(`Starting ${type} automation run for ${jurisdictions.join(', ')}`, 'scheduler');

      for (const code of jurisdictions) {
        // Check if stop was requested
        if (controller.signal.aborted) {
          await Logger.info('Stopping automation as requested', 'scheduler');
          break;
        }

        try {
          const scraper = await createScraper(code, {
            storage: this.options.storage,
            client: this.options.client,
            concurrency: this.options.scraper.concurrency,
            maxPages: this.options.scraper.maxPages,
            sleep: this.options.sleep,
          }, this.options.registry);

          result.summaries.push(await scraper.run({ signal: controller.signal }));
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          result.failures.push({ jurisdiction: code, error: message });
          await Logger.error(`Error scraping ${code}: ${message}`, 'scheduler');
        }
      }

      result.stopped = controller.signal.aborted;
      result.finishedAt = new Date();

      const found = result.summaries.reduce((total, summary) => total + summary.found, 0);
      const errors = result.summaries.reduce((total, summary) => total + summary.errors, 0);
      const message = `Automation ${result.stopped ? 'stopped' : 'finished'}: ${result.summaries.length} jurisdictions, ` +
        `${found} attorneys found, ${errors} errors, ${result.failures.length} failed to start`;

      if (result.stopped || result.failures.length > 0) {
        await Logger.warning(message, 'scheduler');
      } else {
        await Logger.success(message, 'scheduler');
      }

      this.lastResult = result;
      return result;
    } finally {
      this.isRunning = false;
      this.abortController = null;
    }
  }

  isAutomationRunning(): boolean {
    return this.isRunning;
  }

  /**
   * Signals the active run to stop between traversal steps. Resolves to
   * false when nothing is running.
   */
  async stopAutomation(): Promise<boolean> {
    if (!this.isRunning || !this.abortController) {
      await Logger.warning('No automation running to stop', 'scheduler');
      return false;
    }

    this.abortController.abort();
    await Logger.info('Stop requested - finishing the current page before stopping', 'scheduler');
    return true;
  }

  getLastResult(): AutomationResult | null {
    return this.lastResult;
  }

  getScheduleInfo(): AppConfig['schedule'] & { active: boolean; running: boolean } {
    return {
      ...this.options.schedule,
      active: this.scheduledTask !== null,
      running: this.isRunning,
    };
  }
}

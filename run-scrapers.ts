import fs from 'fs';
import { parseCliArgs, USAGE } from './server/cli';
import { loadConfig, loadJurisdictions, parseJurisdictionList } from './server/config';
import { Logger } from './server/services/logger';
import { attorneysToCsv } from './server/services/export';
import { SchedulerService } from './server/services/scheduler';
import { RequestClient } from './server/services/scrapers';
import { createStorage, type IStorage } from './server/storage';
import type { AttorneySearchFilters } from './shared/schema';

function banner(title: string) {
  console.log(`\n${'='.repeat(60)}`);
  console.log(`  ${title}`);
  console.log(`${'='.repeat(60)}`);
}

async function showStats(storage: IStorage) {
  const stats = await storage.getAttorneyStats();

  banner('DATABASE STATISTICS');
  console.log(`\n  Total Attorneys: ${stats.totalAttorneys.toLocaleString()}`);

  const sections: Array<[string, Record<string, number>]> = [
    ['By State', stats.byState],
    ['By Status', stats.byStatus],
    ['Top Practice Areas', stats.topPracticeAreas],
    ['Top Firms', stats.topFirms],
  ];
  for (const [title, counts] of sections) {
    console.log(`\n  ${title}:`);
    for (const [key, count] of Object.entries(counts).slice(0, 10)) {
      console.log(`    ${key}: ${count.toLocaleString()}`);
    }
  }
  console.log(`${'='.repeat(60)}\n`);
}

async function main() {
  const options = parseCliArgs(process.argv.slice(2));

  if (options.help) {
    console.log(USAGE);
    return;
  }

  const config = loadConfig();
  const storage = await createStorage(config.storage, config.databaseUrl);
  Logger.attach(storage);

  const filters: AttorneySearchFilters = {
    state: options.states ? parseJurisdictionList(options.states)[0] : undefined,
    practiceArea: options.practiceArea,
    city: options.city,
  };

  if (options.stats) {
    await showStats(storage);
    return;
  }

  if (options.exportFile !== undefined) {
    const file = options.exportFile;
    const attorneys = await storage.searchAttorneys(filters);
    fs.writeFileSync(file, attorneysToCsv(attorneys));
    console.log(`Exported ${attorneys.length} attorneys to ${file}`);
    return;
  }

  if (options.search !== undefined) {
    const results = await storage.searchAttorneys({ ...filters, name: options.search, limit: 50 });
    console.log(`\n  Found ${results.length} attorneys matching '${options.search}':\n`);
    results.slice(0, 20).forEach((attorney, i) => {
      console.log(`  ${i + 1}. ${attorney.fullName}`);
      console.log(`     Bar #: ${attorney.barNumber ?? 'N/A'} | State: ${attorney.state}`);
      console.log(`     Status: ${attorney.status ?? 'N/A'} | City: ${attorney.city ?? 'N/A'}`);
      if (attorney.firmName) {
        console.log(`     Firm: ${attorney.firmName}`);
      }
    });
    if (results.length > 20) {
      console.log(`\n  ... and ${results.length - 20} more results`);
    }
    return;
  }

  const scheduler = new SchedulerService({
    storage,
    registry: loadJurisdictions(),
    client: new RequestClient({
      maxRetries: config.scraper.maxRetries,
      retryBaseDelayMs: config.scraper.retryBaseDelayMs,
      timeoutMs: config.scraper.requestTimeoutMs,
    }),
    schedule: config.schedule,
    scraper: config.scraper,
  });

  const jurisdictions = scheduler.validateJurisdictions(
    options.states ? parseJurisdictionList(options.states) : config.schedule.jurisdictions
  );

  process.once('SIGINT', () => {
    console.log('\nStopping after the current step...');
    void scheduler.stopAutomation();
  });

  banner(`Attorney directory scrape: ${jurisdictions.join(', ')}`);
  const result = await scheduler.runAutomation('manual', jurisdictions);

  banner('SCRAPING SUMMARY');
  for (const summary of result?.summaries ?? []) {
    const label = summary.status === 'completed' ? 'Complete' : `Failed (${summary.notes ?? 'unknown'})`;
    console.log(`  ${summary.jurisdiction}: ${label} - ${summary.found} found, ${summary.added} added, ` +
      `${summary.updated} updated, ${summary.errors} errors`);
  }
  for (const failure of result?.failures ?? []) {
    console.log(`  ${failure.jurisdiction}: Failed - ${failure.error}`);
  }

  await showStats(storage);
}

main()
  .then(() => process.exit(0))
  .catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });

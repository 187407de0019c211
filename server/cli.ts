import { parseArgs } from 'util';

export const DEFAULT_EXPORT_FILE = 'attorneys_export.csv';

export const USAGE = `
Usage:
  tsx run-scrapers.ts                       Run every configured jurisdiction
  tsx run-scrapers.ts --state TX            Run specific jurisdiction(s), comma-separated
  tsx run-scrapers.ts --stats               Show database statistics
  tsx run-scrapers.ts --export              Export attorneys to ${DEFAULT_EXPORT_FILE}
  tsx run-scrapers.ts --export --out a.csv  Export attorneys to a.csv
  tsx run-scrapers.ts --search "Johnson"    Search attorneys by name
Filters for --export and --search: --state, --practice-area, --city
`;

export interface CliOptions {
  states?: string;
  stats: boolean;
  exportFile?: string;
  search?: string;
  practiceArea?: string;
  city?: string;
  help: boolean;
}

export function parseCliArgs(args: string[]): CliOptions {
  const { values } = parseArgs({
    args,
    options: {
      state: { type: 'string', short: 's' },
      stats: { type: 'boolean' },
      export: { type: 'boolean', short: 'e' },
      out: { type: 'string', short: 'o' },
      search: { type: 'string', short: 'q' },
      'practice-area': { type: 'string', short: 'p' },
      city: { type: 'string', short: 'c' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  return {
    states: values.state,
    stats: values.stats ?? false,
    exportFile: (values.export || values.out !== undefined) ? values.out ?? DEFAULT_EXPORT_FILE : undefined,
    search: values.search,
    practiceArea: values['practice-area'],
    city: values.city,
    help: values.help ?? false,
  };
}

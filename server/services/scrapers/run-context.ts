import type { ScrapeRunMetadata, ScrapeRunUpdate, UpsertOutcome } from '@shared/schema';

export type ContextOutcome = 'done' | 'failed' | 'cancelled';

/**
 * Counters for one scrape run, shared by every worker of that run. All
 * mutations are synchronous, so interleaved workers never lose an update.
 */
export class RunContext {
  readonly jurisdiction: string;
  readonly runId: string;
  readonly signal: AbortSignal | undefined;

  private found = 0;
  private added = 0;
  private updated = 0;
  private errors = 0;
  private pagesFetched = 0;
  private contextsAttempted = 0;
  private contextsCompleted = 0;
  private contextsFailed = 0;
  private contextsCancelled = 0;

  constructor(jurisdiction: string, runId: string, signal?: AbortSignal) {
    this.jurisdiction = jurisdiction;
    this.runId = runId;
    this.signal = signal;
  }

  get cancelled(): boolean {
    return this.signal?.aborted ?? false;
  }

  recordUpsert(outcome: UpsertOutcome): void {
    this.found++;
    if (outcome === 'inserted') {
      this.added++;
    } else {
      this.updated++;
    }
  }

  recordError(): void {
    this.errors++;
  }

  recordPage(): void {
    this.pagesFetched++;
  }

  startContext(): void {
    this.contextsAttempted++;
  }

  finishContext(outcome: ContextOutcome): void {
    if (outcome === 'done') this.contextsCompleted++;
    else if (outcome === 'failed') this.contextsFailed++;
    else this.contextsCancelled++;
  }

  metadata(): ScrapeRunMetadata {
    return {
      contextsAttempted: this.contextsAttempted,
      contextsCompleted: this.contextsCompleted,
      contextsFailed: this.contextsFailed,
      contextsCancelled: this.contextsCancelled,
      pagesFetched: this.pagesFetched,
    };
  }

  /** Counter fields in the shape the run tracker takes. */
  snapshot(): Required<Pick<ScrapeRunUpdate, 'attorneysFound' | 'attorneysAdded' | 'attorneysUpdated' | 'errors' | 'metadata'>> {
    return {
      attorneysFound: this.found,
      attorneysAdded: this.added,
      attorneysUpdated: this.updated,
      errors: this.errors,
      metadata: this.metadata(),
    };
  }
}

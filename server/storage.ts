import {
  type Attorney,
  type AttorneyRecord,
  type AttorneySearchFilters,
  type AttorneyStats,
  type InsertSystemLog,
  type PracticeArea,
  type ScrapeRun,
  type ScrapeRunUpdate,
  type SystemLog,
  type UpsertResult
} from "@shared/schema";

export interface IStorage {
  // Attorney methods (upsert keyed on state + bar number)
  upsertAttorney(record: AttorneyRecord): Promise<UpsertResult>;
  attachPracticeAreas(attorneyId: string, areas: string[]): Promise<void>;
  getAttorney(id: string): Promise<Attorney | undefined>;
  getPracticeAreas(attorneyId: string): Promise<PracticeArea[]>;
  searchAttorneys(filters: AttorneySearchFilters): Promise<Attorney[]>;
  getAttorneyStats(): Promise<AttorneyStats>;

  // Scrape run methods
  createScrapeRun(state: string): Promise<string>;
  updateScrapeRun(id: string, updates: ScrapeRunUpdate): Promise<void>;
  getScrapeRun(id: string): Promise<ScrapeRun | undefined>;
  getRecentScrapeRuns(limit: number): Promise<ScrapeRun[]>;

  // System log methods
  createSystemLog(log: InsertSystemLog): Promise<SystemLog>;
  getRecentSystemLogs(limit: number): Promise<SystemLog[]>;
}

export type StorageKind = 'database' | 'memory';

/**
 * Build the storage backend. The database module is only loaded when it is
 * actually used so memory mode runs without DATABASE_URL.
 */
export async function createStorage(kind: StorageKind, databaseUrl?: string): Promise<IStorage> {
  if (kind === 'memory') {
    const { MemStorage } = await import("./memory-storage");
    return new MemStorage();
  }

  if (!databaseUrl) {
    throw new Error(
      "DATABASE_URL must be set. Did you forget to provision a database?",
    );
  }

  const { connectDatabase, testDatabaseConnection } = await import("./db");
  const { DatabaseStorage } = await import("./database-storage");
  const connection = connectDatabase(databaseUrl);
  if (!await testDatabaseConnection(connection.pool)) {
    throw new Error("Could not connect to the database at DATABASE_URL");
  }
  return new DatabaseStorage(connection);
}

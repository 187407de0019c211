import {
  attorneys,
  insertAttorneySchema,
  practiceAreas,
  scrapeRuns,
  systemLogs,
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
import { and, asc, count, desc, eq, getTableColumns, ilike, isNotNull, ne, or, sql, type SQL } from "drizzle-orm";
import type { DatabaseConnection, Database } from "./db";
import type { IStorage } from "./storage";

// Detect if running in production (deployed) environment
const isProduction = process.env.NODE_ENV === 'production';

const TRANSIENT_MESSAGES = [
  'Connection terminated',
  'connection timeout',
  'Connection timeout',
  'timeout expired',
  'Client has encountered a connection error',
  'socket hang up',
  'ECONNRESET',
  'fetch failed'
];

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function isTransientDatabaseError(error: unknown): boolean {
  const code = errorCode(error);
  const message = error instanceof Error ? error.message : String(error);

  return code === '57P01' || // admin_shutdown
    code === '57P02' || // crash_shutdown
    code?.startsWith('08') === true || // connection exception class
    code === 'ECONNRESET' ||
    code === 'ETIMEDOUT' ||
    code === 'ENOTFOUND' ||
    code === 'ECONNREFUSED' ||
    code === 'EPIPE' ||
    TRANSIENT_MESSAGES.some(fragment => message.includes(fragment));
}

// Database operation retry helper
async function retryDatabaseOperation<T>(
  operation: () => Promise<T>,
  operationName: string,
  maxRetries: number = isProduction ? 5 : 3,
  baseDelay: number = isProduction ? 2000 : 1000
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[Database] ${operationName} attempt ${attempt}/${maxRetries} failed:`, message);

      if (!isTransientDatabaseError(error) || attempt >= maxRetries) {
        console.error(`[Database] ${operationName} failed permanently after ${attempt} attempts`);
        throw error;
      }

      // Exponential backoff with jitter to prevent thundering herd
      const jitter = Math.random() * 500;
      const delay = (baseDelay * Math.pow(2, attempt - 1)) + jitter;
      console.log(`[Database] Retrying ${operationName} in ${Math.round(delay)}ms...`);
      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }
}

function toCountMap(rows: Array<{ key: string | null; count: number }>, nullKey?: string): Record<string, number> {
  const result: Record<string, number> = {};
  for (const row of rows) {
    const key = row.key ?? nullKey;
    if (key === undefined) continue;
    result[key] = Number(row.count);
  }
  return result;
}

export class DatabaseStorage implements IStorage {
  private db: Database;

  constructor(connection: DatabaseConnection) {
    this.db = connection.db;
  }

  // Attorney methods
  async upsertAttorney(record: AttorneyRecord): Promise<UpsertResult> {
    const { practiceAreas: _areas, ...attorneyColumns } = record;
    const columns = insertAttorneySchema.parse(attorneyColumns);

    return await retryDatabaseOperation<UpsertResult>(async () => {
      if (columns.barNumber === null || columns.barNumber === undefined) {
        // No natural key: every submission is a new attorney
        const [row] = await this.db.insert(attorneys).values(columns).returning({ id: attorneys.id });
        return { id: row.id, outcome: 'inserted' };
      }

      const [row] = await this.db.insert(attorneys)
        .values(columns)
        .onConflictDoUpdate({
          target: [attorneys.barNumber, attorneys.state],
          set: {
            firstName: columns.firstName,
            lastName: columns.lastName,
            fullName: columns.fullName,
            status: columns.status,
            firmName: columns.firmName,
            city: columns.city,
            county: columns.county,
            address: columns.address,
            email: columns.email,
            phone: columns.phone,
            website: columns.website,
            updatedAt: new Date()
          }
        })
        // xmax is zero only for freshly inserted tuples
        .returning({ id: attorneys.id, inserted: sql<boolean>`(xmax = 0)` });

      return { id: row.id, outcome: row.inserted ? 'inserted' : 'updated' };
    }, `upsertAttorney(${record.state}:${record.barNumber ?? record.fullName})`);
  }

  async attachPracticeAreas(attorneyId: string, areas: string[]): Promise<void> {
    const rows = areas
      .map((area, index) => ({ attorneyId, practiceArea: area.trim(), isPrimary: index === 0 }))
      .filter(row => row.practiceArea.length > 0);
    if (rows.length === 0) return;

    await retryDatabaseOperation(async () => {
      await this.db.insert(practiceAreas)
        .values(rows)
        .onConflictDoNothing({ target: [practiceAreas.attorneyId, practiceAreas.practiceArea] });
    }, `attachPracticeAreas(${attorneyId})`);
  }

  async getAttorney(id: string): Promise<Attorney | undefined> {
    return await retryDatabaseOperation(async () => {
      const [attorney] = await this.db.select().from(attorneys).where(eq(attorneys.id, id));
      return attorney;
    }, `getAttorney(${id})`);
  }

  async getPracticeAreas(attorneyId: string): Promise<PracticeArea[]> {
    return await this.db.select()
      .from(practiceAreas)
      .where(eq(practiceAreas.attorneyId, attorneyId))
      .orderBy(desc(practiceAreas.isPrimary), asc(practiceAreas.practiceArea));
  }

  async searchAttorneys(filters: AttorneySearchFilters): Promise<Attorney[]> {
    const conditions: SQL[] = [];

    if (filters.state) conditions.push(eq(attorneys.state, filters.state));
    if (filters.practiceArea) conditions.push(ilike(practiceAreas.practiceArea, `%${filters.practiceArea}%`));
    if (filters.city) conditions.push(ilike(attorneys.city, `%${filters.city}%`));
    if (filters.firm) conditions.push(ilike(attorneys.firmName, `%${filters.firm}%`));
    if (filters.status) conditions.push(eq(attorneys.status, filters.status));
    if (filters.name) {
      const nameMatch = or(
        ilike(attorneys.fullName, `%${filters.name}%`),
        ilike(attorneys.lastName, `%${filters.name}%`)
      );
      if (nameMatch) conditions.push(nameMatch);
    }

    return await retryDatabaseOperation(async () => {
      const query = this.db.selectDistinct(getTableColumns(attorneys))
        .from(attorneys)
        .leftJoin(practiceAreas, eq(attorneys.id, practiceAreas.attorneyId))
        .where(and(...conditions))
        .orderBy(asc(attorneys.lastName), asc(attorneys.firstName));

      return filters.limit ? await query.limit(filters.limit) : await query;
    }, 'searchAttorneys');
  }

  async getAttorneyStats(): Promise<AttorneyStats> {
    return await retryDatabaseOperation(async () => {
      const [total] = await this.db.select({ count: count() }).from(attorneys);

      const byState = await this.db.select({ key: attorneys.state, count: count() })
        .from(attorneys)
        .groupBy(attorneys.state)
        .orderBy(desc(count()));

      const byStatus = await this.db.select({ key: attorneys.status, count: count() })
        .from(attorneys)
        .groupBy(attorneys.status);

      const topAreas = await this.db.select({ key: practiceAreas.practiceArea, count: count() })
        .from(practiceAreas)
        .groupBy(practiceAreas.practiceArea)
        .orderBy(desc(count()))
        .limit(20);

      const topFirms = await this.db.select({ key: attorneys.firmName, count: count() })
        .from(attorneys)
        .where(and(isNotNull(attorneys.firmName), ne(attorneys.firmName, '')))
        .groupBy(attorneys.firmName)
        .orderBy(desc(count()))
        .limit(20);

      return {
        totalAttorneys: Number(total?.count ?? 0),
        byState: toCountMap(byState),
        byStatus: toCountMap(byStatus, 'Unknown'),
        topPracticeAreas: toCountMap(topAreas),
        topFirms: toCountMap(topFirms)
      };
    }, 'getAttorneyStats');
  }

  // Scrape run methods
  async createScrapeRun(state: string): Promise<string> {
    return await retryDatabaseOperation(async () => {
      const [run] = await this.db.insert(scrapeRuns)
        .values({ state, status: 'running', startedAt: new Date() })
        .returning({ id: scrapeRuns.id });
      return run.id;
    }, `createScrapeRun(${state})`);
  }

  async updateScrapeRun(id: string, updates: ScrapeRunUpdate): Promise<void> {
    await retryDatabaseOperation(async () => {
      await this.db.update(scrapeRuns)
        .set(updates)
        .where(eq(scrapeRuns.id, id));
    }, `updateScrapeRun(${id})`);
  }

  async getScrapeRun(id: string): Promise<ScrapeRun | undefined> {
    const [run] = await this.db.select().from(scrapeRuns).where(eq(scrapeRuns.id, id));
    return run;
  }

  async getRecentScrapeRuns(limit: number): Promise<ScrapeRun[]> {
    return await this.db.select()
      .from(scrapeRuns)
      .orderBy(desc(scrapeRuns.startedAt))
      .limit(limit);
  }

  // System log methods
  async createSystemLog(log: InsertSystemLog): Promise<SystemLog> {
    const [newLog] = await this.db.insert(systemLogs).values({
      ...log,
      timestamp: new Date()
    }).returning();
    return newLog;
  }

  async getRecentSystemLogs(limit: number): Promise<SystemLog[]> {
    return await this.db.select()
      .from(systemLogs)
      .orderBy(desc(systemLogs.timestamp))
      .limit(limit);
  }
}

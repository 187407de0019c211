import { randomUUID } from "crypto";
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
import type { IStorage } from "./storage";

function contains(value: string | null, fragment: string): boolean {
  return value !== null && value.toLowerCase().includes(fragment.toLowerCase());
}

function topCounts(values: Array<string | null>, limit?: number, nullKey?: string): Record<string, number> {
  const counts = new Map<string, number>();
  for (const value of values) {
    const key = value ?? nullKey;
    if (key === undefined) continue;
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }

  const sorted = Array.from(counts.entries()).sort((a, b) => b[1] - a[1]);
  return Object.fromEntries(limit === undefined ? sorted : sorted.slice(0, limit));
}

/**
 * In-process storage with the same merge semantics as the Postgres backend.
 * Used for dry runs and tests.
 */
export class MemStorage implements IStorage {
  private attorneys = new Map<string, Attorney>();
  private idsByNaturalKey = new Map<string, string>();
  private practiceAreas = new Map<string, PracticeArea>();
  private runs = new Map<string, ScrapeRun>();
  private logs: SystemLog[] = [];

  async upsertAttorney(record: AttorneyRecord): Promise<UpsertResult> {
    const { practiceAreas: _areas, ...columns } = record;
    const now = new Date();

    const naturalKey = columns.barNumber === null ? null : `${columns.state}:${columns.barNumber}`;
    const existingId = naturalKey === null ? undefined : this.idsByNaturalKey.get(naturalKey);
    const existing = existingId === undefined ? undefined : this.attorneys.get(existingId);

    if (existing) {
      // Same columns the database backend overwrites on conflict
      this.attorneys.set(existing.id, {
        ...existing,
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
        updatedAt: now
      });
      return { id: existing.id, outcome: 'updated' };
    }

    const id = randomUUID();
    this.attorneys.set(id, { ...columns, id, createdAt: now, updatedAt: now });
    if (naturalKey !== null) {
      this.idsByNaturalKey.set(naturalKey, id);
    }
    return { id, outcome: 'inserted' };
  }

  async attachPracticeAreas(attorneyId: string, areas: string[]): Promise<void> {
    areas.forEach((area, index) => {
      const practiceArea = area.trim();
      if (!practiceArea) return;

      const key = `${attorneyId}:${practiceArea}`;
      if (this.practiceAreas.has(key)) return;

      this.practiceAreas.set(key, {
        id: randomUUID(),
        attorneyId,
        practiceArea,
        isPrimary: index === 0
      });
    });
  }

  async getAttorney(id: string): Promise<Attorney | undefined> {
    return this.attorneys.get(id);
  }

  async getPracticeAreas(attorneyId: string): Promise<PracticeArea[]> {
    return Array.from(this.practiceAreas.values())
      .filter(area => area.attorneyId === attorneyId)
      .sort((a, b) => Number(b.isPrimary) - Number(a.isPrimary) || a.practiceArea.localeCompare(b.practiceArea));
  }

  async searchAttorneys(filters: AttorneySearchFilters): Promise<Attorney[]> {
    const { state, practiceArea, city, firm, status, name, limit } = filters;

    const results = Array.from(this.attorneys.values()).filter(attorney => {
      if (state && attorney.state !== state) return false;
      if (city && !contains(attorney.city, city)) return false;
      if (firm && !contains(attorney.firmName, firm)) return false;
      if (status && attorney.status !== status) return false;
      if (name && !contains(attorney.fullName, name) && !contains(attorney.lastName, name)) return false;
      if (practiceArea) {
        const areas = Array.from(this.practiceAreas.values())
          .filter(area => area.attorneyId === attorney.id);
        if (!areas.some(area => contains(area.practiceArea, practiceArea))) return false;
      }
      return true;
    });

    results.sort((a, b) =>
      (a.lastName ?? '').localeCompare(b.lastName ?? '') ||
      (a.firstName ?? '').localeCompare(b.firstName ?? '')
    );

    return limit ? results.slice(0, limit) : results;
  }

  async getAttorneyStats(): Promise<AttorneyStats> {
    const all = Array.from(this.attorneys.values());

    return {
      totalAttorneys: all.length,
      byState: topCounts(all.map(attorney => attorney.state)),
      byStatus: topCounts(all.map(attorney => attorney.status), undefined, 'Unknown'),
      topPracticeAreas: topCounts(Array.from(this.practiceAreas.values()).map(area => area.practiceArea), 20),
      topFirms: topCounts(all.map(attorney => attorney.firmName || null), 20)
    };
  }

  async createScrapeRun(state: string): Promise<string> {
    const id = randomUUID();
    this.runs.set(id, {
      id,
      state,
      status: 'running',
      startedAt: new Date(),
      completedAt: null,
      attorneysFound: 0,
      attorneysAdded: 0,
      attorneysUpdated: 0,
      errors: 0,
      notes: null,
      metadata: null
    });
    return id;
  }

  async updateScrapeRun(id: string, updates: ScrapeRunUpdate): Promise<void> {
    const run = this.runs.get(id);
    if (!run) {
      throw new Error(`Scrape run ${id} not found`);
    }
    this.runs.set(id, { ...run, ...updates });
  }

  async getScrapeRun(id: string): Promise<ScrapeRun | undefined> {
    return this.runs.get(id);
  }

  async getRecentScrapeRuns(limit: number): Promise<ScrapeRun[]> {
    return Array.from(this.runs.values())
      .sort((a, b) => b.startedAt.getTime() - a.startedAt.getTime())
      .slice(0, limit);
  }

  async createSystemLog(log: InsertSystemLog): Promise<SystemLog> {
    const entry: SystemLog = {
      id: randomUUID(),
      level: log.level,
      message: log.message,
      component: log.component,
      metadata: log.metadata ?? null,
      timestamp: new Date()
    };
    this.logs.push(entry);
    return entry;
  }

  async getRecentSystemLogs(limit: number): Promise<SystemLog[]> {
    return this.logs.slice(-limit).reverse();
  }
}

import { describe, it, expect } from 'vitest';

import type { AttorneyRecord } from '@shared/schema';
import { MemStorage } from '../server/memory-storage';

function record(overrides: Partial<AttorneyRecord> = {}): AttorneyRecord {
  return {
    state: 'TX',
    barNumber: '24001234',
    firstName: 'Jane',
    lastName: 'Roe',
    fullName: 'Jane Roe',
    status: 'Active',
    admissionDate: null,
    firmName: null,
    city: 'Austin',
    county: null,
    address: null,
    email: null,
    phone: null,
    website: null,
    lawSchool: null,
    graduationYear: null,
    practiceAreas: [],
    ...overrides,
  };
}

describe('MemStorage upsert', () => {
  it('updates in place when the same jurisdiction and bar number arrive twice', async () => {
    const storage = new MemStorage();

    const first = await storage.upsertAttorney(record());
    const second = await storage.upsertAttorney(record({ firmName: 'Roe Law PLLC' }));

    expect(first.outcome).toBe('inserted');
    expect(second).toEqual({ id: first.id, outcome: 'updated' });
    expect(await storage.searchAttorneys({})).toHaveLength(1);
    expect((await storage.getAttorney(first.id))?.firmName).toBe('Roe Law PLLC');
  });

  it('keeps the same bar number in different jurisdictions apart', async () => {
    const storage = new MemStorage();

    await storage.upsertAttorney(record());
    const other = await storage.upsertAttorney(record({ state: 'OK' }));

    expect(other.outcome).toBe('inserted');
  });

  it('always inserts records without a bar number', async () => {
    const storage = new MemStorage();

    const first = await storage.upsertAttorney(record({ barNumber: null }));
    const second = await storage.upsertAttorney(record({ barNumber: null }));

    expect(second.outcome).toBe('inserted');
    expect(second.id).not.toBe(first.id);
  });
});

describe('MemStorage practice areas', () => {
  it('flags only the first area as primary and ignores re-attachment', async () => {
    const storage = new MemStorage();
    const { id } = await storage.upsertAttorney(record());

    await storage.attachPracticeAreas(id, ['Litigation', 'Family Law']);
    await storage.attachPracticeAreas(id, ['Litigation', 'Family Law']);

    const areas = await storage.getPracticeAreas(id);
    expect(areas.map(area => [area.practiceArea, area.isPrimary])).toEqual([
      ['Litigation', true],
      ['Family Law', false],
    ]);
  });
});

describe('MemStorage queries', () => {
  it('filters and orders search results by last then first name', async () => {
    const storage = new MemStorage();
    await storage.upsertAttorney(record({ barNumber: '1', fullName: 'Zed Adams', firstName: 'Zed', lastName: 'Adams' }));
    const { id } = await storage.upsertAttorney(record({ barNumber: '2', fullName: 'Amy Adams', firstName: 'Amy', lastName: 'Adams' }));
    await storage.upsertAttorney(record({ barNumber: '3', fullName: 'Bo Cole', firstName: 'Bo', lastName: 'Cole', city: 'Dallas' }));
    await storage.attachPracticeAreas(id, ['Tax Law']);

    const austin = await storage.searchAttorneys({ city: 'aus' });
    const tax = await storage.searchAttorneys({ practiceArea: 'tax' });

    expect(austin.map(attorney => attorney.fullName)).toEqual(['Amy Adams', 'Zed Adams']);
    expect(tax.map(attorney => attorney.fullName)).toEqual(['Amy Adams']);
  });

  it('counts a missing status as Unknown in statistics', async () => {
    const storage = new MemStorage();
    await storage.upsertAttorney(record({ barNumber: '1', firmName: 'Roe Law PLLC' }));
    await storage.upsertAttorney(record({ barNumber: '2', status: null, firmName: 'Roe Law PLLC' }));

    const stats = await storage.getAttorneyStats();

    expect(stats).toEqual({
      totalAttorneys: 2,
      byState: { TX: 2 },
      byStatus: { Active: 1, Unknown: 1 },
      topPracticeAreas: {},
      topFirms: { 'Roe Law PLLC': 2 },
    });
  });

  it('tracks scrape runs and rejects updates to unknown runs', async () => {
    const storage = new MemStorage();
    const id = await storage.createScrapeRun('TX');

    await storage.updateScrapeRun(id, { attorneysFound: 4, status: 'completed' });

    expect(await storage.getScrapeRun(id)).toMatchObject({ state: 'TX', attorneysFound: 4, status: 'completed' });
    await expect(storage.updateScrapeRun('missing', { errors: 1 })).rejects.toThrow('Scrape run missing not found');
  });
});

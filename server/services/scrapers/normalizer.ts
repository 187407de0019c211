import type { AttorneyRecord } from '@shared/schema';
import { CANDIDATE_FIELDS, emptyCandidateFields, type CandidateFields, type CandidateRecord } from './types';

/**
 * Trim and collapse whitespace runs. Absent text stays null; text that was
 * only whitespace becomes an empty string.
 */
export function cleanText(value: string | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  return value.replace(/\s+/g, ' ').trim();
}

/**
 * First token is the first name, the rest is the last name. "Mary Ann Smith"
 * therefore splits as "Mary" / "Ann Smith"; consumers rely on this split.
 */
export function splitName(fullName: string): { firstName: string; lastName: string } {
  const tokens = fullName.split(' ').filter(Boolean);
  if (tokens.length === 0) return { firstName: '', lastName: '' };
  if (tokens.length === 1) return { firstName: '', lastName: tokens[0] };
  return { firstName: tokens[0], lastName: tokens.slice(1).join(' ') };
}

export function titleCase(value: string): string {
  return value.toLowerCase().replace(/(^|[\s\-'])([a-z])/g, (_match, separator: string, letter: string) => separator + letter.toUpperCase());
}

export class RecordNormalizer {
  private canonicalCities: Map<string, string>;

  constructor(knownCities: readonly string[] = []) {
    this.canonicalCities = new Map(
      knownCities.map(city => [titleCase(city.trim()), city.trim()])
    );
  }

  /**
   * Allowlisted cities take the allowlist's spelling; anything else is kept.
   */
  normalizeCity(city: string | null): string | null {
    if (!city) return city;
    return this.canonicalCities.get(titleCase(city)) ?? city;
  }

  normalize(candidate: CandidateRecord, jurisdiction: string): AttorneyRecord | null {
    const fields: CandidateFields = emptyCandidateFields();
    for (const field of CANDIDATE_FIELDS) {
      fields[field] = cleanText(candidate.fields[field]);
    }

    const fullName = fields.name;
    if (!fullName) return null;

    const { firstName, lastName } = splitName(fullName);

    return {
      state: jurisdiction,
      barNumber: fields.barNumber || null,
      firstName,
      lastName,
      fullName,
      status: fields.status,
      admissionDate: fields.admissionDate,
      firmName: fields.firm,
      city: this.normalizeCity(fields.city),
      county: null,
      address: fields.address,
      email: fields.email,
      phone: fields.phone,
      website: fields.website,
      lawSchool: fields.lawSchool,
      graduationYear: fields.graduationYear,
      practiceAreas: normalizePracticeAreas(candidate.practiceAreas),
    };
  }
}

export function normalizePracticeAreas(areas: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const area of areas) {
    const cleaned = cleanText(area);
    if (!cleaned || seen.has(cleaned)) continue;
    seen.add(cleaned);
    result.push(cleaned);
  }
  return result;
}

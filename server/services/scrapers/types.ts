export type SearchDimension = 'city' | 'letter';

/**
 * One seed query against a jurisdiction's search endpoint (a city, or a
 * last-name initial). Built from static configuration and consumed once.
 */
export interface SearchContext {
  readonly jurisdiction: string;
  readonly dimension: SearchDimension;
  readonly value: string;
  readonly label: string;
}

export type HttpMethod = 'GET' | 'POST';

export interface PageRequest {
  url: string;
  method: HttpMethod;
  params?: Record<string, string>;
  headers?: Record<string, string>;
}

export const CANDIDATE_FIELDS = [
  'name',
  'barNumber',
  'city',
  'firm',
  'status',
  'address',
  'phone',
  'email',
  'website',
  'admissionDate',
  'lawSchool',
  'graduationYear',
] as const;

export type CandidateField = typeof CANDIDATE_FIELDS[number];

export type CandidateFields = Record<CandidateField, string | null>;

/**
 * Raw, unvalidated output of one result block.
 */
export interface CandidateRecord {
  fields: CandidateFields;
  practiceAreas: string[];
}

export function emptyCandidateFields(): CandidateFields {
  return {
    name: null,
    barNumber: null,
    city: null,
    firm: null,
    status: null,
    address: null,
    phone: null,
    email: null,
    website: null,
    admissionDate: null,
    lawSchool: null,
    graduationYear: null,
  };
}

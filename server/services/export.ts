import { stringify } from 'csv-stringify/sync';
import type { Attorney } from '@shared/schema';

export const EXPORT_COLUMNS = [
  { key: 'fullName', header: 'full_name' },
  { key: 'firstName', header: 'first_name' },
  { key: 'lastName', header: 'last_name' },
  { key: 'barNumber', header: 'bar_number' },
  { key: 'state', header: 'state' },
  { key: 'status', header: 'status' },
  { key: 'admissionDate', header: 'admission_date' },
  { key: 'firmName', header: 'firm_name' },
  { key: 'city', header: 'city' },
  { key: 'address', header: 'address' },
  { key: 'phone', header: 'phone' },
  { key: 'email', header: 'email' },
  { key: 'website', header: 'website' },
  { key: 'lawSchool', header: 'law_school' },
] as const satisfies ReadonlyArray<{ key: keyof Attorney; header: string }>;

/**
 * CSV with a header row; absent values are empty cells.
 */
export const attorneysToCsv = (rows: Attorney[]): string =>
  stringify(rows, {
    header: true,
    columns: EXPORT_COLUMNS.map(column => ({ key: column.key, header: column.header })),
  });

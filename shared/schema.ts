import { sql } from "drizzle-orm";
import { pgTable, text, varchar, timestamp, integer, boolean, jsonb, index, uniqueIndex } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

export const attorneys = pgTable(
  "attorneys",
  {
    id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
    barNumber: text("bar_number"),
    state: text("state").notNull(), // jurisdiction code, e.g. TX
    firstName: text("first_name"),
    lastName: text("last_name"),
    fullName: text("full_name").notNull(),
    status: text("status"),
    admissionDate: text("admission_date"),
    firmName: text("firm_name"),
    city: text("city"),
    county: text("county"),
    address: text("address"),
    email: text("email"),
    phone: text("phone"),
    website: text("website"),
    lawSchool: text("law_school"),
    graduationYear: text("graduation_year"),
    createdAt: timestamp("created_at").notNull().defaultNow(),
    updatedAt: timestamp("updated_at").notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex("attorneys_bar_number_state_key").on(table.barNumber, table.state),
    index("idx_attorneys_state").on(table.state),
    index("idx_attorneys_status").on(table.status),
    index("idx_attorneys_firm").on(table.firmName),
    index("idx_attorneys_city").on(table.city),
    index("idx_attorneys_name").on(table.lastName, table.firstName),
  ]
);

export const practiceAreas = pgTable(
  "practice_areas",
  {
    id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
    attorneyId: varchar("attorney_id").notNull().references(() => attorneys.id),
    practiceArea: text("practice_area").notNull(),
    isPrimary: boolean("is_primary").notNull().default(false),
  },
  (table) => [
    uniqueIndex("practice_areas_attorney_area_key").on(table.attorneyId, table.practiceArea),
    index("idx_practice_areas_area").on(table.practiceArea),
  ]
);

export const scrapeRuns = pgTable("scrape_runs", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  state: text("state").notNull(),
  status: text("status").notNull().default("running"), // running, completed, failed
  startedAt: timestamp("started_at").notNull().defaultNow(),
  completedAt: timestamp("completed_at"),
  attorneysFound: integer("attorneys_found").notNull().default(0),
  attorneysAdded: integer("attorneys_added").notNull().default(0),
  attorneysUpdated: integer("attorneys_updated").notNull().default(0),
  errors: integer("errors").notNull().default(0),
  notes: text("notes"),
  metadata: jsonb("metadata"),
});

export const systemLogs = pgTable("system_logs", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  level: text("level").notNull(), // info, warning, error, success
  message: text("message").notNull(),
  component: text("component").notNull(), // request-client, pagination, scheduler, etc.
  metadata: jsonb("metadata"),
  timestamp: timestamp("timestamp").notNull().defaultNow(),
});

// Insert schemas
export const insertAttorneySchema = createInsertSchema(attorneys).omit({
  id: true,
  createdAt: true,
  updatedAt: true,
});

// Types
export type Attorney = typeof attorneys.$inferSelect;

export type PracticeArea = typeof practiceAreas.$inferSelect;

export type ScrapeRun = typeof scrapeRuns.$inferSelect;
export type ScrapeRunStatus = 'running' | 'completed' | 'failed';

export type InsertSystemLog = Omit<typeof systemLogs.$inferInsert, 'id' | 'timestamp'>;
export type SystemLog = typeof systemLogs.$inferSelect;

/**
 * One normalized attorney as handed to storage. Every column of `attorneys`
 * except the generated ones, plus the ordered practice-area list (first entry
 * is the primary area).
 */
export interface AttorneyRecord {
  state: string;
  barNumber: string | null;
  firstName: string;
  lastName: string;
  fullName: string;
  status: string | null;
  admissionDate: string | null;
  firmName: string | null;
  city: string | null;
  county: string | null;
  address: string | null;
  email: string | null;
  phone: string | null;
  website: string | null;
  lawSchool: string | null;
  graduationYear: string | null;
  practiceAreas: string[];
}

export type UpsertOutcome = 'inserted' | 'updated';

export interface UpsertResult {
  id: string;
  outcome: UpsertOutcome;
}

/**
 * Fields a run update may carry. Any subset is accepted.
 */
export interface ScrapeRunUpdate {
  status?: ScrapeRunStatus;
  attorneysFound?: number;
  attorneysAdded?: number;
  attorneysUpdated?: number;
  errors?: number;
  notes?: string | null;
  completedAt?: Date;
  metadata?: ScrapeRunMetadata;
}

export interface ScrapeRunMetadata {
  contextsAttempted: number;
  contextsCompleted: number;
  contextsFailed: number;
  contextsCancelled: number;
  pagesFetched: number;
}

export interface AttorneySearchFilters {
  state?: string;
  practiceArea?: string;
  city?: string;
  firm?: string;
  status?: string;
  name?: string;
  limit?: number;
}

export const attorneySearchFiltersSchema = z.object({
  state: z.string().trim().min(1).optional(),
  practiceArea: z.string().trim().min(1).optional(),
  city: z.string().trim().min(1).optional(),
  firm: z.string().trim().min(1).optional(),
  status: z.string().trim().min(1).optional(),
  name: z.string().trim().min(1).optional(),
  limit: z.coerce.number().int().positive().max(10000).optional(),
});

export interface AttorneyStats {
  totalAttorneys: number;
  byState: Record<string, number>;
  byStatus: Record<string, number>;
  topPracticeAreas: Record<string, number>;
  topFirms: Record<string, number>;
}

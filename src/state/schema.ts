/**
 * Zod schemas for the persisted ledger document.
 * Defaults let older documents with missing keys load.
 */
import { z } from "zod";
import { WIRE_STATUSES } from "./status.js";

const wireStatus = z.enum(WIRE_STATUSES);
const timestamp = z.string().nullable().default(null);
const counter = z.number().int().nonnegative().default(0);

export const unitWireSchema = z.object({
  id: z.string().optional(),
  title: z.string().default(""),
  status: wireStatus.default("pending"),
  error: z.string().nullable().default(null),
  started_at: timestamp,
  completed_at: timestamp,
  failed_at: timestamp,
});

export const courseWireSchema = z.object({
  id: z.string().optional(),
  title: z.string().default(""),
  status: wireStatus.default("pending"),
  error: z.string().nullable().default(null),
  learning_path_ids: z.array(z.string()).optional(),
  /** Single-owner field written by earlier versions */
  learning_path_id: z.string().nullable().optional(),
  started_at: timestamp,
  completed_at: timestamp,
  failed_at: timestamp,
  units: z.record(z.string(), unitWireSchema).default({}),
});

export const learningPathWireSchema = z.object({
  id: z.string().optional(),
  title: z.string().default(""),
  status: wireStatus.default("in_progress"),
  total_courses: counter,
  completed_courses: counter,
  failed_courses: counter,
  started_at: timestamp,
  completed_at: timestamp,
});

export const errorWireSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("course"),
    id: z.string(),
    title: z.string().default(""),
    error: z.string(),
    timestamp: z.string(),
  }),
  z.object({
    type: z.literal("unit"),
    course_id: z.string(),
    unit_id: z.string(),
    title: z.string().default(""),
    error: z.string(),
    timestamp: z.string(),
  }),
]);

export const statisticsWireSchema = z.object({
  total_courses: counter,
  completed_courses: counter,
  failed_courses: counter,
  total_units: counter,
  completed_units: counter,
  failed_units: counter,
});

const metadataWireSchema = z.object({ version: z.string() });

export const ledgerWireSchema = z.object({
  started_at: timestamp,
  last_updated: timestamp,
  learning_paths: z.record(z.string(), learningPathWireSchema).default({}),
  courses: z.record(z.string(), courseWireSchema).default({}),
  errors: z.array(errorWireSchema).default([]),
  statistics: statisticsWireSchema.default({
    total_courses: 0,
    completed_courses: 0,
    failed_courses: 0,
    total_units: 0,
    completed_units: 0,
    failed_units: 0,
  }),
  metadata: metadataWireSchema.optional(),
  /** Metadata key written by earlier versions */
  _metadata: metadataWireSchema.optional(),
});

export type LedgerWire = z.infer<typeof ledgerWireSchema>;
export type CourseWire = z.infer<typeof courseWireSchema>;
export type UnitWire = z.infer<typeof unitWireSchema>;
export type LearningPathWire = z.infer<typeof learningPathWireSchema>;
export type ErrorWire = z.infer<typeof errorWireSchema>;

/**
 * Shape written to disk. Optional legacy keys are never emitted.
 */
export interface LedgerDocument {
  started_at: string | null;
  last_updated: string | null;
  learning_paths: Record<string, Omit<LearningPathWire, "id"> & { id: string }>;
  courses: Record<
    string,
    Omit<CourseWire, "id" | "learning_path_id" | "learning_path_ids" | "units"> & {
      id: string;
      learning_path_ids: string[];
      units: Record<string, Omit<UnitWire, "id"> & { id: string }>;
    }
  >;
  errors: ErrorWire[];
  statistics: z.infer<typeof statisticsWireSchema>;
  metadata: { version: string };
}

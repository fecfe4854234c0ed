/**
 * Conversion between the in-memory ledger and the snake_case document on disk.
 */
import { type ErrorWire, type LedgerDocument, ledgerWireSchema } from "./schema.js";
import { fromWireStatus, toWireStatus } from "./status.js";
import type { CourseRecord, ErrorRecord, Ledger, LearningPathRecord, UnitRecord } from "./types.js";

export const LEDGER_VERSION = "2";

export type DecodeResult =
  | { success: true; ledger: Ledger; migrated: boolean }
  | { success: false; error: string };

/**
 * Validates and converts a parsed ledger document.
 * Legacy single-owner courses and `_metadata` are upgraded on the way in.
 */
export function decodeLedger(raw: unknown): DecodeResult {
  const parsed = ledgerWireSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join(".") : "";
    return {
      success: false,
      error: `Invalid ledger${where ? ` at ${where}` : ""}: ${issue?.message ?? "unknown issue"}`,
    };
  }

  const wire = parsed.data;
  let migrated = wire.metadata === undefined;

  const learningPaths = new Map<string, LearningPathRecord>();
  for (const [id, path] of Object.entries(wire.learning_paths)) {
    learningPaths.set(id, {
      id,
      title: path.title,
      status: fromWireStatus(path.status),
      totalCourses: path.total_courses,
      completedCourses: path.completed_courses,
      failedCourses: path.failed_courses,
      startedAt: path.started_at,
      completedAt: path.completed_at,
    });
  }

  const courses = new Map<string, CourseRecord>();
  for (const [id, course] of Object.entries(wire.courses)) {
    let learningPathIds = course.learning_path_ids ?? [];
    if (course.learning_path_ids === undefined) {
      migrated = true;
      learningPathIds = course.learning_path_id ? [course.learning_path_id] : [];
    }

    const units = new Map<string, UnitRecord>();
    for (const [unitId, unit] of Object.entries(course.units)) {
      units.set(unitId, {
        id: unitId,
        title: unit.title,
        status: fromWireStatus(unit.status),
        error: unit.error,
        startedAt: unit.started_at,
        completedAt: unit.completed_at,
        failedAt: unit.failed_at,
      });
    }

    courses.set(id, {
      id,
      title: course.title,
      status: fromWireStatus(course.status),
      error: course.error,
      learningPathIds: [...new Set(learningPathIds)],
      units,
      startedAt: course.started_at,
      completedAt: course.completed_at,
      failedAt: course.failed_at,
    });
  }

  return {
    success: true,
    migrated,
    ledger: {
      startedAt: wire.started_at,
      lastUpdated: wire.last_updated,
      learningPaths,
      courses,
      errors: wire.errors.map(decodeError),
      statistics: {
        totalCourses: wire.statistics.total_courses,
        completedCourses: wire.statistics.completed_courses,
        failedCourses: wire.statistics.failed_courses,
        totalUnits: wire.statistics.total_units,
        completedUnits: wire.statistics.completed_units,
        failedUnits: wire.statistics.failed_units,
      },
    },
  };
}

function decodeError(error: ErrorWire): ErrorRecord {
  if (error.type === "course") {
    return {
      type: "course",
      courseId: error.id,
      title: error.title,
      error: error.error,
      timestamp: error.timestamp,
    };
  }
  return {
    type: "unit",
    courseId: error.course_id,
    unitId: error.unit_id,
    title: error.title,
    error: error.error,
    timestamp: error.timestamp,
  };
}

/**
 * Converts the in-memory ledger to the document written to disk.
 */
export function encodeLedger(ledger: Ledger): LedgerDocument {
  const document: LedgerDocument = {
    started_at: ledger.startedAt,
    last_updated: ledger.lastUpdated,
    learning_paths: {},
    courses: {},
    errors: ledger.errors.map(encodeError),
    statistics: {
      total_courses: ledger.statistics.totalCourses,
      completed_courses: ledger.statistics.completedCourses,
      failed_courses: ledger.statistics.failedCourses,
      total_units: ledger.statistics.totalUnits,
      completed_units: ledger.statistics.completedUnits,
      failed_units: ledger.statistics.failedUnits,
    },
    metadata: { version: LEDGER_VERSION },
  };

  for (const path of ledger.learningPaths.values()) {
    document.learning_paths[path.id] = {
      id: path.id,
      title: path.title,
      status: toWireStatus(path.status),
      total_courses: path.totalCourses,
      completed_courses: path.completedCourses,
      failed_courses: path.failedCourses,
      started_at: path.startedAt,
      completed_at: path.completedAt,
    };
  }

  for (const course of ledger.courses.values()) {
    const units: LedgerDocument["courses"][string]["units"] = {};
    for (const unit of course.units.values()) {
      units[unit.id] = {
        id: unit.id,
        title: unit.title,
        status: toWireStatus(unit.status),
        error: unit.error,
        started_at: unit.startedAt,
        completed_at: unit.completedAt,
        failed_at: unit.failedAt,
      };
    }
    document.courses[course.id] = {
      id: course.id,
      title: course.title,
      status: toWireStatus(course.status),
      error: course.error,
      learning_path_ids: [...course.learningPathIds],
      started_at: course.startedAt,
      completed_at: course.completedAt,
      failed_at: course.failedAt,
      units,
    };
  }

  return document;
}

function encodeError(error: ErrorRecord): ErrorWire {
  if (error.type === "course") {
    return {
      type: "course",
      id: error.courseId,
      title: error.title,
      error: error.error,
      timestamp: error.timestamp,
    };
  }
  return {
    type: "unit",
    course_id: error.courseId,
    unit_id: error.unitId,
    title: error.title,
    error: error.error,
    timestamp: error.timestamp,
  };
}

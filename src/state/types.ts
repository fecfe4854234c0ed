import type { StatusType } from "./status.js";

export interface UnitRecord {
  id: string;
  title: string;
  status: StatusType;
  error: string | null;
  startedAt: string | null;
  completedAt: string | null;
  failedAt: string | null;
}

export interface CourseRecord {
  id: string;
  title: string;
  status: StatusType;
  error: string | null;
  /** Learning paths that include this course; a course may be shared */
  learningPathIds: string[];
  units: Map<string, UnitRecord>;
  startedAt: string | null;
  completedAt: string | null;
  failedAt: string | null;
}

export interface LearningPathRecord {
  id: string;
  title: string;
  status: StatusType;
  totalCourses: number;
  completedCourses: number;
  failedCourses: number;
  startedAt: string | null;
  completedAt: string | null;
}

export type ErrorRecord =
  | { type: "course"; courseId: string; title: string; error: string; timestamp: string }
  | {
      type: "unit";
      courseId: string;
      unitId: string;
      title: string;
      error: string;
      timestamp: string;
    };

export interface Statistics {
  totalCourses: number;
  completedCourses: number;
  failedCourses: number;
  totalUnits: number;
  completedUnits: number;
  failedUnits: number;
}

/**
 * In-memory ledger. The store is its only writer.
 */
export interface Ledger {
  startedAt: string | null;
  lastUpdated: string | null;
  learningPaths: Map<string, LearningPathRecord>;
  courses: Map<string, CourseRecord>;
  errors: ErrorRecord[];
  statistics: Statistics;
}

export function emptyStatistics(): Statistics {
  return {
    totalCourses: 0,
    completedCourses: 0,
    failedCourses: 0,
    totalUnits: 0,
    completedUnits: 0,
    failedUnits: 0,
  };
}

export function emptyLedger(): Ledger {
  return {
    startedAt: null,
    lastUpdated: null,
    learningPaths: new Map(),
    courses: new Map(),
    errors: [],
    statistics: emptyStatistics(),
  };
}

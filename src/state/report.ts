import { toWireStatus } from "./status.js";
import type { ErrorRecord, Ledger } from "./types.js";

const RECENT_ERROR_LIMIT = 10;

function describeError(error: ErrorRecord): string {
  const where = error.type === "course" ? error.courseId : `${error.courseId} > ${error.unitId}`;
  return `  [${error.timestamp}] ${error.type} "${error.title}" (${where}): ${error.error}`;
}

/**
 * Renders a plain-text progress report.
 */
export function formatReport(ledger: Ledger): string {
  const stats = ledger.statistics;
  const lines = [
    "Download Progress Report",
    "========================",
    `Started: ${ledger.startedAt ?? "never"}`,
    `Last updated: ${ledger.lastUpdated ?? "never"}`,
    "",
    `Courses: ${stats.totalCourses} total, ${stats.completedCourses} completed, ${stats.failedCourses} failed`,
    `Units: ${stats.totalUnits} total, ${stats.completedUnits} completed, ${stats.failedUnits} failed`,
  ];

  if (ledger.learningPaths.size > 0) {
    lines.push("", "Learning paths:");
    for (const path of ledger.learningPaths.values()) {
      lines.push(
        `  ${path.title || path.id}: ${path.completedCourses}/${path.totalCourses} courses completed, ${path.failedCourses} failed (${toWireStatus(path.status)})`
      );
    }
  }

  if (ledger.errors.length > 0) {
    const recent = ledger.errors.slice(-RECENT_ERROR_LIMIT);
    lines.push("", `Recent errors (${recent.length} of ${ledger.errors.length}):`);
    lines.push(...recent.map(describeError));
    const hidden = ledger.errors.length - recent.length;
    if (hidden > 0) {
      lines.push(`  ... and ${hidden} more errors`);
    }
  }

  return lines.join("\n");
}

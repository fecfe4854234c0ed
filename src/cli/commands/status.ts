import chalk from "chalk";
import { loadConfig } from "../../config/configManager.js";
import { pathExists } from "../../shared/fs.js";
import { createConsoleLogger } from "../../shared/logger.js";
import {
  CheckpointStore,
  type CourseRecord,
  parseWireStatus,
  Status,
  type StatusType,
  toWireStatus,
  WIRE_STATUSES,
} from "../../state/index.js";
import { resolveSettings } from "../settings.js";

export interface StatusOptions {
  checkpoint?: string;
  errors?: boolean;
}

export interface ListOptions {
  checkpoint?: string;
  status?: string;
}

const STATUS_ICONS: Record<StatusType, string> = {
  pending: "⏳",
  inProgress: "⬇️ ",
  completed: "✅",
  failed: "❌",
  skipped: "➖",
};

/**
 * Opens the ledger read-only, or returns null when nothing was recorded yet.
 */
export async function openExistingStore(checkpoint: string | undefined): Promise<CheckpointStore | null> {
  const { checkpointFile } = resolveSettings(loadConfig(), { checkpoint });
  if (!(await pathExists(checkpointFile))) {
    console.log(chalk.gray(`   No progress recorded at ${checkpointFile}`));
    console.log(chalk.gray("   Run 'coursekeep download <outline>' to start.\n"));
    return null;
  }
  return CheckpointStore.open(checkpointFile, { logger: createConsoleLogger() });
}

function describeCourse(course: CourseRecord): string {
  const units = [...course.units.values()];
  const done = units.filter((unit) => unit.status === Status.COMPLETED).length;
  const failed = units.filter((unit) => unit.status === Status.FAILED).length;
  const failedText = failed > 0 ? chalk.red(`, ${failed} failed`) : "";
  return `${course.title || course.id} ${chalk.gray(`(${done}/${units.length} units`)}${failedText}${chalk.gray(")")}`;
}

/**
 * Prints the progress report, optionally with every recorded failure.
 */
export async function statusCommand(options: StatusOptions): Promise<void> {
  console.log(chalk.blue("\n📊 Download Status\n"));

  const store = await openExistingStore(options.checkpoint);
  if (!store) return;

  console.log(store.generateReport());

  if (options.errors) {
    const courses = store.getFailedCourses();
    const units = store.getFailedUnits();
    if (courses.length === 0 && units.length === 0) {
      console.log(chalk.green("\n   No failures recorded."));
    }
    if (courses.length > 0) {
      console.log(chalk.red("\n   ❌ Failed courses:\n"));
      for (const course of courses) {
        console.log(chalk.red(`   • ${course.title || course.id}`));
        console.log(chalk.gray(`     ${course.error ?? "unknown error"}`));
      }
    }
    if (units.length > 0) {
      console.log(chalk.red("\n   ❌ Failed units:\n"));
      for (const { courseTitle, unit } of units) {
        console.log(chalk.red(`   • ${courseTitle} > ${unit.title}`));
        console.log(chalk.gray(`     ${unit.error ?? "unknown error"}`));
      }
    }
  }
  console.log();
}

/**
 * Lists recorded courses, optionally only those with one status.
 */
export async function listCommand(options: ListOptions): Promise<void> {
  let filter: StatusType | undefined;
  if (options.status !== undefined) {
    const parsed = parseWireStatus(options.status);
    if (!parsed) {
      throw new Error(`Unknown status "${options.status}". Use one of: ${WIRE_STATUSES.join(", ")}`);
    }
    filter = parsed;
  }

  console.log(chalk.blue("\n📚 Recorded Courses\n"));

  const store = await openExistingStore(options.checkpoint);
  if (!store) return;

  const courses = store.listCourses(filter);
  if (courses.length === 0) {
    console.log(chalk.gray("   No courses match.\n"));
    return;
  }

  for (const course of courses) {
    console.log(`   ${STATUS_ICONS[course.status]} ${describeCourse(course)}`);
    console.log(chalk.gray(`      ${course.id} · ${toWireStatus(course.status)}`));
  }
  console.log();
}

import chalk from "chalk";
import { loadConfig } from "../../config/configManager.js";
import { findCourseDir } from "../../orchestrator/layout.js";
import { getUrlPath } from "../../shared/url.js";
import type { CheckpointStore, CourseRecord } from "../../state/index.js";
import { resolveSettings } from "../settings.js";
import { openExistingStore } from "./status.js";

export interface MaintenanceFlags {
  checkpoint?: string;
  dryRun?: boolean;
}

export interface RetryFailedFlags extends MaintenanceFlags {
  course?: string;
}

export interface PruneFlags extends MaintenanceFlags {
  output?: string;
}

const ACTION_LABELS = {
  reset: { done: "Reset", planned: "Would reset" },
  remove: { done: "Removed", planned: "Would remove" },
} as const;

function printCourses(
  courses: CourseRecord[],
  action: keyof typeof ACTION_LABELS,
  dryRun: boolean | undefined
): void {
  if (courses.length === 0) {
    console.log(chalk.gray("   No matching courses.\n"));
    return;
  }
  const prefix = dryRun ? ACTION_LABELS[action].planned : ACTION_LABELS[action].done;
  console.log(chalk.white(`   ${prefix} ${courses.length} course(s):`));
  for (const course of courses) {
    console.log(chalk.gray(`   • ${course.title || course.id} (${course.id})`));
  }
  printBackupNote(dryRun);
}

function printBackupNote(dryRun: boolean | undefined): void {
  if (dryRun) {
    console.log(chalk.yellow("\n   Dry run: the ledger was not changed.\n"));
  } else {
    console.log(chalk.gray("\n   A backup of the previous ledger was written beside it.\n"));
  }
}

async function withStore(
  checkpoint: string | undefined,
  fn: (store: CheckpointStore) => Promise<void>
): Promise<void> {
  const store = await openExistingStore(checkpoint);
  if (store) {
    await fn(store);
  }
}

/**
 * Moves failed units and courses back to pending.
 */
export async function retryFailedCommand(options: RetryFailedFlags): Promise<void> {
  console.log(chalk.blue("\n🔁 Retry failed downloads\n"));

  await withStore(options.checkpoint, async (store) => {
    const { units, courses } = await store.retryFailed({
      courseId: options.course === undefined ? undefined : getUrlPath(options.course),
      dryRun: options.dryRun,
    });
    if (units.length === 0 && courses.length === 0) {
      console.log(chalk.green("   Nothing to retry.\n"));
      return;
    }

    const prefix = options.dryRun ? ACTION_LABELS.reset.planned : ACTION_LABELS.reset.done;
    console.log(chalk.white(`   ${prefix} ${units.length} unit(s) and ${courses.length} course(s)`));
    for (const { courseTitle, unit } of units) {
      console.log(chalk.gray(`   • ${courseTitle} > ${unit.title}`));
    }
    for (const course of courses) {
      console.log(chalk.gray(`   • ${course.title || course.id}`));
    }
    printBackupNote(options.dryRun);
  });
}

/**
 * Resets every course whose id or title contains the pattern.
 */
export async function resetCourseCommand(pattern: string, options: MaintenanceFlags): Promise<void> {
  console.log(chalk.blue(`\n♻️  Reset courses matching "${pattern}"\n`));

  await withStore(options.checkpoint, async (store) => {
    const courses = await store.resetCourses(pattern, { dryRun: options.dryRun });
    printCourses(courses, "reset", options.dryRun);
  });
}

/**
 * Deletes every course whose id or title contains the pattern from the ledger.
 */
export async function removeCourseCommand(pattern: string, options: MaintenanceFlags): Promise<void> {
  console.log(chalk.blue(`\n🗑️  Remove courses matching "${pattern}"\n`));

  await withStore(options.checkpoint, async (store) => {
    const courses = await store.removeCourses(pattern, { dryRun: options.dryRun });
    printCourses(courses, "remove", options.dryRun);
  });
}

/**
 * Removes completed courses whose archive folder no longer exists.
 */
export async function pruneCommand(options: PruneFlags): Promise<void> {
  const { outputDir } = resolveSettings(loadConfig(), { output: options.output });
  console.log(chalk.blue("\n🧹 Prune missing courses\n"));
  console.log(chalk.gray(`   Archive: ${outputDir}\n`));

  await withStore(options.checkpoint, async (store) => {
    const courses = await store.pruneCourses(
      async (course) => {
        const pathTitles = course.learningPathIds.flatMap((id) => {
          const title = store.getLearningPath(id)?.title;
          return title ? [title] : [];
        });
        return (await findCourseDir(outputDir, course.title || course.id, pathTitles)) !== null;
      },
      { dryRun: options.dryRun }
    );
    printCourses(courses, "remove", options.dryRun);
  });
}

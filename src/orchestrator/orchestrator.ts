/**
 * Walks learning paths, courses and units, consulting the checkpoint store
 * before every step. A failing unit is recorded and skipped; a failing course
 * is recorded and reported, and its siblings continue.
 */
import { join } from "node:path";
import delay from "delay";
import type { AcquisitionResult, VideoRequest } from "../downloader/pipeline.js";
import { MediaError, remediationHint } from "../downloader/shared/errors.js";
import { errorMessage, silentLogger, type Logger } from "../shared/logger.js";
import { type RetryOptions, withRetry } from "../shared/retry.js";
import { getUrlPath } from "../shared/url.js";
import {
  AccessDeniedError,
  type CourseInfo,
  type SiteAdapter,
  type UnitInfo,
  type UnitRef,
} from "../site/types.js";
import type { CheckpointStore } from "../state/index.js";
import { Status } from "../state/index.js";
import { type ArtifactSink, fileSink } from "./artifacts.js";
import {
  type CoursePlacement,
  findCourseDir,
  getCourseDir,
  getResourceFilename,
  getSectionDir,
  getUnitPaths,
  type UnitPaths,
} from "./layout.js";
import { renderReadings, renderSummary } from "./markdown.js";
import { SessionGuard } from "./sessionGuard.js";

// ============================================================================
// Types
// ============================================================================

export type VideoAcquirer = (request: VideoRequest) => Promise<AcquisitionResult>;

export interface OrchestratorOptions {
  adapter: SiteAdapter;
  store: CheckpointStore;
  /** Root folder of the archive */
  outputDir: string;
  acquire: VideoAcquirer;
  sink?: ArtifactSink;
  logger?: Logger;
  /** Replace videos and files that already exist (default: false) */
  overwrite?: boolean;
  /** Pause between units (default: 1500 ms) */
  unitDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  /** Retry settings for collecting records from the adapter */
  retry?: Pick<RetryOptions, "attempts" | "baseDelayMs" | "sleep">;
  /** Returns false once the run should stop */
  shouldContinue?: () => boolean;
}

export type CourseOutcome = "completed" | "skipped" | "copied" | "failed" | "interrupted";

export interface CourseResult {
  id: string;
  url: string;
  outcome: CourseOutcome;
  error?: string | undefined;
  failedUnits: number;
}

export interface RunSummary {
  title: string;
  completed: number;
  skipped: number;
  copied: number;
  failed: number;
  interrupted: boolean;
  courses: CourseResult[];
}

/**
 * Learning path context a course is processed under.
 */
export interface PathContext extends CoursePlacement {
  pathId: string;
  /** Title from the path listing, used when the course itself cannot load */
  courseTitle?: string;
}

export const DEFAULT_UNIT_DELAY_MS = 1500;

interface UnitTarget {
  ref: UnitRef;
  sectionDir: string;
  index: number;
}

// ============================================================================
// Orchestrator
// ============================================================================

export class Orchestrator {
  private readonly guard: SessionGuard;
  private readonly sink: ArtifactSink;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: OrchestratorOptions) {
    this.guard = new SessionGuard(options.adapter);
    this.sink = options.sink ?? fileSink;
    this.logger = options.logger ?? silentLogger;
    this.sleep = options.sleep ?? ((ms: number) => delay(ms));
  }

  private get store(): CheckpointStore {
    return this.options.store;
  }

  private shouldContinue(): boolean {
    return this.options.shouldContinue?.() ?? true;
  }

  /**
   * Processes a learning path or a single course, depending on the URL.
   */
  async run(url: string): Promise<RunSummary> {
    const kind = this.options.adapter.classifyUrl(url);
    if (kind === "learningPath") {
      return this.processLearningPath(url);
    }
    if (kind === "course") {
      const result = await this.processCourse(url);
      return summarize(result.id, [result], result.outcome === "interrupted");
    }
    throw new Error(`Not a course or learning path URL: ${url}`);
  }

  // ==========================================================================
  // Learning paths
  // ==========================================================================

  async processLearningPath(url: string): Promise<RunSummary> {
    await this.guard.ensureValid(url);

    const path = await this.collect("Loading learning path", () =>
      this.options.adapter.getLearningPath(url)
    );
    const pathId = getUrlPath(url);
    await this.store.startLearningPath(pathId, path.title, path.courses.length);
    this.logger.info(`Learning path: ${path.title} (${path.courses.length} courses)`);

    const results: CourseResult[] = [];
    let interrupted = false;

    for (const [index, ref] of path.courses.entries()) {
      if (!this.shouldContinue()) {
        interrupted = true;
        break;
      }
      this.logger.info(`[${index + 1}/${path.courses.length}] ${ref.title}`);
      const result = await this.processCourse(ref.url, {
        pathId,
        pathTitle: path.title,
        index,
        courseTitle: ref.title,
      });
      results.push(result);
      if (result.outcome === "interrupted") {
        interrupted = true;
        break;
      }
    }

    if (!interrupted) {
      await this.store.completeLearningPath(pathId);
    }
    return summarize(path.title, results, interrupted);
  }

  // ==========================================================================
  // Courses
  // ==========================================================================

  /**
   * Processes one course. Course-level failures are recorded and returned as
   * a failed outcome; only an invalid session is thrown.
   */
  async processCourse(url: string, context?: PathContext): Promise<CourseResult> {
    await this.guard.ensureValid(url);

    const id = getUrlPath(url);
    const result = (outcome: CourseOutcome, failedUnits = 0, error?: string): CourseResult => ({
      id,
      url,
      outcome,
      failedUnits,
      error,
    });

    if (!this.shouldContinue()) {
      return result("interrupted");
    }

    // Set when a copy failed: the new folder needs every unit again
    let redownload = false;
    if (this.store.shouldSkipCourse(id)) {
      if (!context || this.store.belongsToPath(id, context.pathId)) {
        this.logger.info("Course already completed (no pending units), skipping");
        return result("skipped");
      }
      this.logger.info("Course already downloaded in another learning path, copying");
      if (await this.copyCourse(id, context)) {
        return result("copied");
      }
      this.logger.info(`Copy failed, re-downloading course: ${url}`);
      redownload = true;
    } else if (this.store.hasPendingUnits(id)) {
      this.logger.info(`Re-processing course with pending units: ${url}`);
    }

    let course: CourseInfo;
    try {
      course = await this.collect("Loading course", () => this.options.adapter.getCourse(url));
    } catch (error) {
      const message = error instanceof AccessDeniedError ? "Access denied" : errorMessage(error);
      this.logger.error(`Could not load course ${url}: ${errorMessage(error)}`);
      await this.recordCourseFailure(id, context?.courseTitle ?? id, context, message);
      return result("failed", 0, message);
    }

    try {
      await this.store.startCourse(id, course.title, context?.pathId);
      const courseDir = getCourseDir(this.options.outputDir, course.title, context);
      const walk = await this.walkUnits(id, course, courseDir, redownload);

      if (walk.interrupted) {
        this.logger.warn(`Stopped inside ${course.title}; it resumes on the next run`);
        return result("interrupted", walk.failed);
      }

      await this.store.completeCourse(id);
      if (walk.failed > 0) {
        this.logger.warn(`${course.title}: ${walk.failed} unit(s) failed`);
      } else {
        this.logger.success(course.title);
      }
      return result("completed", walk.failed);
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error(`Error downloading course ${course.title}: ${message}`);
      await this.recordCourseFailure(id, course.title, context, message);
      return result("failed", 0, message);
    }
  }

  /**
   * Copies an archived course into the folder of a new learning path.
   * Returns false when the source folder is missing or the copy fails.
   */
  private async copyCourse(id: string, context: PathContext): Promise<boolean> {
    const record = this.store.getCourse(id);
    if (!record) return false;

    const pathTitles = record.learningPathIds.flatMap((pathId) => {
      const path = this.store.getLearningPath(pathId);
      return path ? [path.title] : [];
    });

    try {
      const source = await findCourseDir(this.options.outputDir, record.title, pathTitles);
      if (!source) {
        this.logger.warn(`Cannot find the archived folder of ${record.title}`);
        return false;
      }

      const destination = getCourseDir(this.options.outputDir, record.title, context);
      if (await this.sink.exists(destination)) {
        this.logger.info(`Destination already exists: ${destination}`);
      } else {
        await this.sink.copyDir(source, destination);
        this.logger.success(`Copied ${record.title} to ${context.pathTitle}`);
      }

      await this.store.startCourse(id, record.title, context.pathId);
      await this.store.completeCourse(id);
      return true;
    } catch (error) {
      this.logger.warn(`Error copying course: ${errorMessage(error)}`);
      return false;
    }
  }

  private async recordCourseFailure(
    id: string,
    title: string,
    context: PathContext | undefined,
    message: string
  ): Promise<void> {
    // Links the current path as an owner so its counters see the failure
    await this.store.startCourse(id, title, context?.pathId);
    await this.store.failCourse(id, message);
  }

  // ==========================================================================
  // Units
  // ==========================================================================

  private async walkUnits(
    courseId: string,
    course: CourseInfo,
    courseDir: string,
    redownload: boolean
  ): Promise<{ failed: number; interrupted: boolean }> {
    const targets: UnitTarget[] = course.sections.flatMap((section, sectionIndex) =>
      section.units.map((ref, index) => ({
        ref,
        index,
        sectionDir: getSectionDir(courseDir, sectionIndex, section.title),
      }))
    );

    let failed = 0;
    let processed = 0;

    for (const target of targets) {
      if (!this.shouldContinue()) {
        return { failed, interrupted: true };
      }

      const unitId = getUrlPath(target.ref.url);
      if (!redownload && this.store.isUnitCompleted(courseId, unitId)) {
        this.logger.debug(`Skipping unit (already completed): ${target.ref.title}`);
        continue;
      }
      this.announceRetry(courseId, unitId, target.ref.title);

      if (processed > 0) {
        await this.sleep(this.options.unitDelayMs ?? DEFAULT_UNIT_DELAY_MS);
      }
      processed += 1;

      await this.store.startUnit(courseId, unitId, target.ref.title);
      try {
        const unit = await this.collect("Loading unit", () =>
          this.options.adapter.getUnit(target.ref)
        );
        await this.processUnit(unit, getUnitPaths(target.sectionDir, target.index, unit.title));
        await this.store.completeUnit(courseId, unitId);
        this.logger.success(target.ref.title);
      } catch (error) {
        if (!this.shouldContinue()) {
          // Left in progress so the next run picks it up again
          return { failed, interrupted: true };
        }
        failed += 1;
        const message = errorMessage(error);
        const hint = error instanceof MediaError ? (error.hint ?? remediationHint(error.code)) : null;
        this.logger.error(`${target.ref.title}: ${message}${hint ? ` (${hint})` : ""}`);
        await this.store.failUnit(courseId, unitId, message);
      }
    }

    return { failed, interrupted: false };
  }

  private announceRetry(courseId: string, unitId: string, title: string): void {
    const previous = this.store.getCourse(courseId)?.units.get(unitId);
    if (!previous) return;

    if (previous.status === Status.FAILED) {
      this.logger.warn(`Retrying previously failed unit: ${title}`);
      this.logger.warn(`Previous error: ${previous.error ?? "unknown"}`);
    } else {
      this.logger.info(`Retrying unfinished unit: ${title}`);
    }
  }

  /**
   * Writes every artifact of one unit. Only the video and the lecture page
   * can fail the unit; subtitles and resources log a warning instead.
   */
  private async processUnit(unit: UnitInfo, paths: UnitPaths): Promise<void> {
    const overwrite = this.options.overwrite ?? false;
    const cookies = await this.options.adapter.getCookieHeader?.(unit.url);
    const fileOptions = { cookies, referer: unit.url, overwrite };

    if (unit.kind === "video") {
      await this.saveVideo(unit, paths.video, cookies);
    }

    for (const track of unit.subtitles) {
      await this.optional(`Subtitle ${track.lang}`, () =>
        this.sink.download(track.url, paths.subtitle(track.lang), fileOptions)
      );
    }

    if (unit.summaryHtml) {
      const html = unit.summaryHtml;
      await this.optional("Summary", async () => {
        await this.sink.writeText(paths.summary, renderSummary(unit.title, html));
        return { success: true };
      });
    }

    for (const resource of unit.resources) {
      const target = join(paths.resourcesDir, getResourceFilename(resource.title, resource.url));
      await this.optional(`Resource ${resource.title}`, () =>
        this.sink.download(resource.url, target, fileOptions)
      );
    }

    if (unit.readings.length > 0) {
      await this.optional("Readings", async () => {
        await this.sink.writeText(paths.readings, renderReadings(unit.readings));
        return { success: true };
      });
    }

    if (unit.kind === "lecture") {
      if (this.options.adapter.savePage) {
        await this.options.adapter.savePage(unit, paths.page);
      } else if (!unit.summaryHtml) {
        this.logger.warn(`Lecture ${unit.title} has no page saver and no summary`);
      }
    } else if (unit.kind === "quiz") {
      this.logger.debug(`Quiz ${unit.title} has no downloadable content`);
    }
  }

  private async saveVideo(unit: UnitInfo, outputPath: string, cookies: string | undefined): Promise<void> {
    if (!this.options.overwrite && (await this.sink.exists(outputPath))) {
      this.logger.info(`Video already exists, keeping it: ${outputPath}`);
      return;
    }

    const result = await this.options.acquire({
      pageUrl: unit.url,
      primary: unit.primary,
      fallback: unit.fallback,
      outputPath,
      cookies,
    });
    if (!result.success) {
      throw new MediaError(
        result.error ?? "Video download failed",
        result.errorCode ?? "DOWNLOAD_FAILED",
        undefined,
        result.details,
        result.hint
      );
    }
    if (result.strategy) {
      this.logger.debug(`Video saved via ${result.strategy}`);
    }
  }

  /**
   * Runs a secondary artifact step; failures are logged, never thrown.
   */
  private async optional(
    label: string,
    step: () => Promise<{ success: boolean; error?: string | undefined }>
  ): Promise<void> {
    try {
      const outcome = await step();
      if (!outcome.success) {
        this.logger.warn(`${label} failed: ${outcome.error ?? "unknown error"}`);
      }
    } catch (error) {
      this.logger.warn(`${label} failed: ${errorMessage(error)}`);
    }
  }

  private collect<T>(label: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(fn, {
      ...this.options.retry,
      label,
      logger: this.logger,
      shouldRetry: (error) => !(error instanceof AccessDeniedError),
    });
  }
}

function summarize(title: string, courses: CourseResult[], interrupted: boolean): RunSummary {
  const count = (outcome: CourseOutcome): number =>
    courses.filter((course) => course.outcome === outcome).length;
  return {
    title,
    completed: count("completed"),
    skipped: count("skipped"),
    copied: count("copied"),
    failed: count("failed"),
    interrupted,
    courses,
  };
}

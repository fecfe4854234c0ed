/**
 * Durable progress ledger for learning paths, courses and units.
 *
 * Every mutation updates the in-memory ledger first and then writes the whole
 * document atomically. Counters only move on a real status transition, so
 * repeating a start or complete call never counts twice.
 */
import { getBackupPath } from "../config/paths.js";
import { copyFile, pathExists, readJson, writeJsonAtomic } from "../shared/fs.js";
import { errorMessage, silentLogger, type Logger } from "../shared/logger.js";
import { decodeLedger, encodeLedger } from "./codec.js";
import { formatReport } from "./report.js";
import { isOpenStatus, Status, type StatusType } from "./status.js";
import {
  type CourseRecord,
  emptyLedger,
  type ErrorRecord,
  type Ledger,
  type LearningPathRecord,
  type Statistics,
  type UnitRecord,
} from "./types.js";

export interface CheckpointStoreOptions {
  logger?: Logger;
  /** Clock used for timestamps */
  now?: () => Date;
}

export interface MaintenanceOptions {
  /** Report what would change without touching the ledger */
  dryRun?: boolean;
}

export interface FailedUnitEntry {
  courseId: string;
  courseTitle: string;
  unit: UnitRecord;
}

export interface RetryFailedResult {
  units: FailedUnitEntry[];
  courses: CourseRecord[];
}

type CourseCounterKey = "completedCourses" | "failedCourses";
type UnitCounterKey = "completedUnits" | "failedUnits";

function courseCounterFor(status: StatusType): CourseCounterKey | null {
  if (status === Status.COMPLETED) return "completedCourses";
  if (status === Status.FAILED) return "failedCourses";
  return null;
}

function unitCounterFor(status: StatusType): UnitCounterKey | null {
  if (status === Status.COMPLETED) return "completedUnits";
  if (status === Status.FAILED) return "failedUnits";
  return null;
}

function decrement(value: number): number {
  return Math.max(0, value - 1);
}

function matchesPattern(course: CourseRecord, pattern: string): boolean {
  const needle = pattern.toLowerCase();
  return course.id.toLowerCase().includes(needle) || course.title.toLowerCase().includes(needle);
}

export class CheckpointStore {
  private ledger: Ledger = emptyLedger();
  private writeChain: Promise<unknown> = Promise.resolve();
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(
    readonly filePath: string,
    options: CheckpointStoreOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Creates a store and loads the ledger at filePath.
   */
  static async open(filePath: string, options: CheckpointStoreOptions = {}): Promise<CheckpointStore> {
    const store = new CheckpointStore(filePath, options);
    await store.load();
    return store;
  }

  // ============================================
  // Persistence
  // ============================================

  /**
   * Reads the ledger from disk. A missing or unreadable file yields an
   * empty ledger; this never throws.
   */
  async load(): Promise<void> {
    this.ledger = emptyLedger();

    if (!(await pathExists(this.filePath))) {
      this.logger.debug(`No ledger at ${this.filePath}, starting fresh`);
      return;
    }

    const raw = await readJson(this.filePath);
    if (raw === null) {
      this.logger.error(`Ledger ${this.filePath} is not valid JSON, starting fresh`);
      return;
    }

    const decoded = decodeLedger(raw);
    if (!decoded.success) {
      this.logger.error(`${decoded.error}. Starting fresh`);
      return;
    }

    this.ledger = decoded.ledger;
    if (decoded.migrated) {
      this.logger.info("Upgraded ledger from an earlier format");
    }
  }

  /**
   * Writes the full ledger. Failures are logged and reported as false;
   * the in-memory state stays authoritative.
   */
  async persist(): Promise<boolean> {
    this.ledger.lastUpdated = this.timestamp();
    const document = encodeLedger(this.ledger);
    const write = this.writeChain.then(async () => {
      try {
        await writeJsonAtomic(this.filePath, document);
        return true;
      } catch (error) {
        this.logger.error(`Could not save progress to ${this.filePath}: ${errorMessage(error)}`);
        return false;
      }
    });
    this.writeChain = write;
    return write;
  }

  /**
   * Waits for every queued write, then writes the current snapshot once more.
   */
  async flush(): Promise<boolean> {
    await this.writeChain;
    return this.persist();
  }

  /**
   * Copies the current ledger file next to itself before maintenance.
   * Returns the backup path, or null when there is nothing to back up.
   */
  async backup(): Promise<string | null> {
    if (!(await pathExists(this.filePath))) {
      return null;
    }
    const backupPath = getBackupPath(this.filePath);
    await copyFile(this.filePath, backupPath);
    return backupPath;
  }

  // ============================================
  // Session and learning paths
  // ============================================

  async startSession(): Promise<void> {
    if (!this.ledger.startedAt) {
      this.ledger.startedAt = this.timestamp();
      await this.persist();
    }
  }

  /**
   * Creates or refreshes a learning path. Its course aggregates are
   * recounted from the courses that already name it as owner.
   */
  async startLearningPath(id: string, title: string, totalCourses: number): Promise<void> {
    const existing = this.ledger.learningPaths.get(id);
    const path: LearningPathRecord = existing ?? {
      id,
      title,
      status: Status.IN_PROGRESS,
      totalCourses,
      completedCourses: 0,
      failedCourses: 0,
      startedAt: this.timestamp(),
      completedAt: null,
    };

    path.title = title || path.title;
    path.totalCourses = totalCourses;
    path.status = Status.IN_PROGRESS;
    path.completedAt = null;
    path.completedCourses = 0;
    path.failedCourses = 0;
    for (const course of this.ledger.courses.values()) {
      if (!course.learningPathIds.includes(id)) continue;
      const key = courseCounterFor(course.status);
      if (key) path[key] += 1;
    }

    this.ledger.learningPaths.set(id, path);
    await this.persist();
  }

  async completeLearningPath(id: string): Promise<void> {
    const path = this.ledger.learningPaths.get(id);
    if (!path) {
      this.logger.warn(`Unknown learning path ${id}, cannot mark it complete`);
      return;
    }
    path.status = Status.COMPLETED;
    path.completedAt = this.timestamp();
    await this.persist();
  }

  // ============================================
  // Courses
  // ============================================

  /**
   * Creates a course, or moves an existing one back to in-progress while
   * keeping its units. The owning path is merged into the course's owners.
   */
  async startCourse(id: string, title: string, learningPathId?: string): Promise<void> {
    let course = this.ledger.courses.get(id);

    if (!course) {
      course = {
        id,
        title,
        status: Status.IN_PROGRESS,
        error: null,
        learningPathIds: [],
        units: new Map(),
        startedAt: this.timestamp(),
        completedAt: null,
        failedAt: null,
      };
      this.ledger.courses.set(id, course);
      this.ledger.statistics.totalCourses += 1;
    } else {
      course.title = title || course.title;
      this.moveCourse(course, Status.IN_PROGRESS);
      course.startedAt = this.timestamp();
    }

    // Course is in progress here, so a new owner gets no terminal counter yet
    if (learningPathId && !course.learningPathIds.includes(learningPathId)) {
      course.learningPathIds.push(learningPathId);
    }

    await this.persist();
  }

  async completeCourse(id: string): Promise<void> {
    const course = this.requireCourse(id, "complete");
    if (!course) return;

    this.moveCourse(course, Status.COMPLETED);
    course.error = null;
    course.completedAt = this.timestamp();
    await this.persist();
  }

  async failCourse(id: string, error: string): Promise<void> {
    const course = this.requireCourse(id, "fail");
    if (!course) return;

    const failedAt = this.timestamp();
    const changed = this.moveCourse(course, Status.FAILED);
    course.error = error;
    course.failedAt = failedAt;
    if (changed) {
      this.ledger.errors.push({
        type: "course",
        courseId: id,
        title: course.title,
        error,
        timestamp: failedAt,
      });
    }
    await this.persist();
  }

  /**
   * Forces a course back to in-progress with every unit pending.
   * Counters drop by exactly the course's previous terminal contributions.
   */
  async resetCourse(id: string): Promise<boolean> {
    const course = this.ledger.courses.get(id);
    if (!course) {
      return false;
    }
    this.resetInMemory(course);
    await this.persist();
    return true;
  }

  // ============================================
  // Units
  // ============================================

  async startUnit(courseId: string, unitId: string, title: string): Promise<void> {
    const course = this.requireCourse(courseId, "start a unit of");
    if (!course) return;

    const unit = course.units.get(unitId);
    if (!unit) {
      course.units.set(unitId, {
        id: unitId,
        title,
        status: Status.IN_PROGRESS,
        error: null,
        startedAt: this.timestamp(),
        completedAt: null,
        failedAt: null,
      });
      this.ledger.statistics.totalUnits += 1;
    } else {
      unit.title = title || unit.title;
      this.moveUnit(unit, Status.IN_PROGRESS);
      unit.startedAt = this.timestamp();
    }

    await this.persist();
  }

  async completeUnit(courseId: string, unitId: string): Promise<void> {
    const unit = this.requireUnit(courseId, unitId, "complete");
    if (!unit) return;

    this.moveUnit(unit, Status.COMPLETED);
    unit.error = null;
    unit.completedAt = this.timestamp();
    await this.persist();
  }

  async failUnit(courseId: string, unitId: string, error: string): Promise<void> {
    const unit = this.requireUnit(courseId, unitId, "fail");
    if (!unit) return;

    const failedAt = this.timestamp();
    const changed = this.moveUnit(unit, Status.FAILED);
    unit.error = error;
    unit.failedAt = failedAt;
    if (changed) {
      this.ledger.errors.push({
        type: "unit",
        courseId,
        unitId,
        title: unit.title,
        error,
        timestamp: failedAt,
      });
    }
    await this.persist();
  }

  // ============================================
  // Queries
  // ============================================

  /**
   * A course is skipped only when it is completed and has no open units.
   */
  shouldSkipCourse(id: string): boolean {
    const course = this.ledger.courses.get(id);
    return course?.status === Status.COMPLETED && !this.hasPendingUnits(id);
  }

  hasPendingUnits(id: string): boolean {
    const course = this.ledger.courses.get(id);
    if (!course) return false;
    for (const unit of course.units.values()) {
      if (isOpenStatus(unit.status)) return true;
    }
    return false;
  }

  isUnitCompleted(courseId: string, unitId: string): boolean {
    return this.ledger.courses.get(courseId)?.units.get(unitId)?.status === Status.COMPLETED;
  }

  getUnitStatus(courseId: string, unitId: string): StatusType | null {
    return this.ledger.courses.get(courseId)?.units.get(unitId)?.status ?? null;
  }

  belongsToPath(courseId: string, learningPathId: string): boolean {
    return this.ledger.courses.get(courseId)?.learningPathIds.includes(learningPathId) ?? false;
  }

  getCourse(id: string): CourseRecord | undefined {
    return this.ledger.courses.get(id);
  }

  listCourses(status?: StatusType): CourseRecord[] {
    const courses = [...this.ledger.courses.values()];
    return status ? courses.filter((course) => course.status === status) : courses;
  }

  getLearningPath(id: string): LearningPathRecord | undefined {
    return this.ledger.learningPaths.get(id);
  }

  getLearningPaths(): LearningPathRecord[] {
    return [...this.ledger.learningPaths.values()];
  }

  getStatistics(): Statistics {
    return { ...this.ledger.statistics };
  }

  getErrors(): ErrorRecord[] {
    return [...this.ledger.errors];
  }

  getFailedUnits(): FailedUnitEntry[] {
    const failed: FailedUnitEntry[] = [];
    for (const course of this.ledger.courses.values()) {
      for (const unit of course.units.values()) {
        if (unit.status === Status.FAILED) {
          failed.push({ courseId: course.id, courseTitle: course.title, unit });
        }
      }
    }
    return failed;
  }

  getFailedCourses(): CourseRecord[] {
    return this.listCourses(Status.FAILED);
  }

  generateReport(): string {
    return formatReport(this.ledger);
  }

  // ============================================
  // Maintenance
  // ============================================

  /**
   * Moves failed units and courses back to pending and clears their errors,
   * optionally limited to one course.
   */
  async retryFailed(
    options: MaintenanceOptions & { courseId?: string } = {}
  ): Promise<RetryFailedResult> {
    const inScope = (courseId: string) => !options.courseId || courseId === options.courseId;
    const units = this.getFailedUnits().filter((entry) => inScope(entry.courseId));
    const courses = this.getFailedCourses().filter((course) => inScope(course.id));
    const result = { units, courses };

    if (options.dryRun || (units.length === 0 && courses.length === 0)) {
      return result;
    }

    await this.backup();
    for (const { unit } of units) {
      this.moveUnit(unit, Status.PENDING);
      unit.error = null;
    }
    for (const course of courses) {
      this.moveCourse(course, Status.PENDING);
      course.error = null;
    }
    this.ledger.errors = this.ledger.errors.filter((error) => !inScope(error.courseId));
    await this.persist();
    return result;
  }

  /**
   * Resets every course whose id or title contains pattern (case-insensitive).
   */
  async resetCourses(pattern: string, options: MaintenanceOptions = {}): Promise<CourseRecord[]> {
    const matched = this.listCourses().filter((course) => matchesPattern(course, pattern));
    if (options.dryRun || matched.length === 0) {
      return matched;
    }

    await this.backup();
    for (const course of matched) {
      this.resetInMemory(course);
    }
    await this.persist();
    return matched;
  }

  /**
   * Deletes every course whose id or title contains pattern, removing its
   * contribution from all counters.
   */
  async removeCourses(pattern: string, options: MaintenanceOptions = {}): Promise<CourseRecord[]> {
    const matched = this.listCourses().filter((course) => matchesPattern(course, pattern));
    return this.removeMatched(matched, options);
  }

  /**
   * Deletes completed courses whose archive no longer exists on disk.
   */
  async pruneCourses(
    exists: (course: CourseRecord) => Promise<boolean>,
    options: MaintenanceOptions = {}
  ): Promise<CourseRecord[]> {
    const missing: CourseRecord[] = [];
    for (const course of this.listCourses(Status.COMPLETED)) {
      if (!(await exists(course))) {
        missing.push(course);
      }
    }
    return this.removeMatched(missing, options);
  }

  // ============================================
  // Internals
  // ============================================

  private async removeMatched(
    matched: CourseRecord[],
    options: MaintenanceOptions
  ): Promise<CourseRecord[]> {
    if (options.dryRun || matched.length === 0) {
      return matched;
    }

    await this.backup();
    const stats = this.ledger.statistics;
    for (const course of matched) {
      this.moveCourse(course, Status.PENDING);
      for (const unit of course.units.values()) {
        this.moveUnit(unit, Status.PENDING);
        stats.totalUnits = decrement(stats.totalUnits);
      }
      stats.totalCourses = decrement(stats.totalCourses);
      this.ledger.courses.delete(course.id);
    }
    const removed = new Set(matched.map((course) => course.id));
    this.ledger.errors = this.ledger.errors.filter((error) => !removed.has(error.courseId));
    await this.persist();
    return matched;
  }

  private resetInMemory(course: CourseRecord): void {
    this.moveCourse(course, Status.IN_PROGRESS);
    course.error = null;
    course.completedAt = null;
    course.failedAt = null;
    for (const unit of course.units.values()) {
      this.moveUnit(unit, Status.PENDING);
      unit.error = null;
      unit.completedAt = null;
      unit.failedAt = null;
    }
  }

  /**
   * Sets a course status and adjusts global and per-path counters.
   * Returns false when the course already had that status.
   */
  private moveCourse(course: CourseRecord, to: StatusType): boolean {
    const from = course.status;
    if (from === to) return false;

    const stats = this.ledger.statistics;
    const paths = course.learningPathIds
      .map((pathId) => this.ledger.learningPaths.get(pathId))
      .filter((path): path is LearningPathRecord => path !== undefined);

    const leaving = courseCounterFor(from);
    if (leaving) {
      stats[leaving] = decrement(stats[leaving]);
      for (const path of paths) path[leaving] = decrement(path[leaving]);
    }
    const entering = courseCounterFor(to);
    if (entering) {
      stats[entering] += 1;
      for (const path of paths) path[entering] += 1;
    }

    course.status = to;
    return true;
  }

  private moveUnit(unit: UnitRecord, to: StatusType): boolean {
    const from = unit.status;
    if (from === to) return false;

    const stats = this.ledger.statistics;
    const leaving = unitCounterFor(from);
    if (leaving) stats[leaving] = decrement(stats[leaving]);
    const entering = unitCounterFor(to);
    if (entering) stats[entering] += 1;

    unit.status = to;
    return true;
  }

  private requireCourse(id: string, action: string): CourseRecord | undefined {
    const course = this.ledger.courses.get(id);
    if (!course) {
      this.logger.warn(`Unknown course ${id}, cannot ${action} it`);
    }
    return course;
  }

  private requireUnit(courseId: string, unitId: string, action: string): UnitRecord | undefined {
    const unit = this.ledger.courses.get(courseId)?.units.get(unitId);
    if (!unit) {
      this.logger.warn(`Unknown unit ${unitId} in ${courseId}, cannot ${action} it`);
    }
    return unit;
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}

/**
 * Records a site adapter hands to the orchestrator. The core reads only these
 * fields; how an adapter obtains them is its own business.
 */
import type { ManifestSource } from "../downloader/shared/types.js";

// ============================================================================
// Records
// ============================================================================

export type UrlKind = "learningPath" | "course" | "unknown";

export type UnitKind = "video" | "lecture" | "quiz";

export interface CourseRef {
  url: string;
  title: string;
}

export interface LearningPathInfo {
  url: string;
  title: string;
  courses: CourseRef[];
}

export interface UnitRef {
  url: string;
  title: string;
}

export interface SectionInfo {
  title: string;
  units: UnitRef[];
}

export interface CourseInfo {
  url: string;
  title: string;
  sections: SectionInfo[];
}

export interface SubtitleTrack {
  /** Language code used in the file name, e.g. "en" */
  lang: string;
  url: string;
}

export interface ResourceLink {
  title: string;
  url: string;
}

export interface UnitInfo {
  url: string;
  title: string;
  kind: UnitKind;
  primary: ManifestSource | null;
  fallback: ManifestSource | null;
  subtitles: SubtitleTrack[];
  /** Downloadable attachments */
  resources: ResourceLink[];
  /** Recommended reading links, saved as a list */
  readings: ResourceLink[];
  summaryHtml: string | null;
}

// ============================================================================
// Adapter
// ============================================================================

export interface SiteAdapter {
  classifyUrl(url: string): UrlKind;
  getLearningPath(url: string): Promise<LearningPathInfo>;
  /** Throws AccessDeniedError when the account cannot open the course */
  getCourse(url: string): Promise<CourseInfo>;
  getUnit(ref: UnitRef): Promise<UnitInfo>;
  validateSession(): Promise<boolean>;
  /** Cookie header sent with manifest and file requests */
  getCookieHeader?(url: string): Promise<string | undefined>;
  /** Archives a lecture page as it renders in the browser */
  savePage?(unit: UnitInfo, outputPath: string): Promise<void>;
}

// ============================================================================
// Errors
// ============================================================================

export class AccessDeniedError extends Error {
  constructor(
    readonly url: string,
    message = "Access denied"
  ) {
    super(message);
    this.name = "AccessDeniedError";
  }
}

export class SessionExpiredError extends Error {
  constructor(
    readonly url: string,
    readonly hint = `run \`coursekeep login ${url}\``
  ) {
    super(`Session is not valid for ${url}`);
    this.name = "SessionExpiredError";
  }
}

/**
 * Site adapter backed by a JSON outline. Structure comes from the outline;
 * manifests the outline leaves out are found by listening to the unit page.
 */
import { classifyManifestUrl } from "../browser/manifestSniffer.js";
import type { ManifestSource } from "../downloader/shared/types.js";
import { readJson } from "../shared/fs.js";
import { silentLogger, type Logger } from "../shared/logger.js";
import { getUrlPath } from "../shared/url.js";
import {
  type Outline,
  type OutlineCourse,
  type OutlineManifest,
  type OutlineUnit,
  parseOutline,
} from "./outlineSchema.js";
import {
  AccessDeniedError,
  type CourseInfo,
  type LearningPathInfo,
  type SiteAdapter,
  type UnitInfo,
  type UnitRef,
  type UrlKind,
} from "./types.js";

export interface SniffedManifests {
  primary: ManifestSource | null;
  fallback: ManifestSource | null;
}

/**
 * Browser-side operations the adapter delegates to. All are optional; without
 * them the adapter serves the outline as written.
 */
export interface OutlineSiteHooks {
  sniff?: (pageUrl: string) => Promise<SniffedManifests>;
  validateSession?: () => Promise<boolean>;
  getCookieHeader?: (url: string) => Promise<string>;
  savePage?: (pageUrl: string, outputPath: string) => Promise<void>;
}

export class OutlineSiteAdapter implements SiteAdapter {
  private readonly pathsById = new Map<string, Outline["learningPaths"][number]>();
  private readonly coursesById = new Map<string, OutlineCourse>();
  private readonly unitsById = new Map<string, OutlineUnit>();
  private readonly logger: Logger;

  readonly savePage?: (unit: UnitInfo, outputPath: string) => Promise<void>;

  constructor(
    readonly outline: Outline,
    private readonly hooks: OutlineSiteHooks = {},
    logger?: Logger
  ) {
    this.logger = logger ?? silentLogger;
    for (const path of outline.learningPaths) {
      this.pathsById.set(getUrlPath(path.url), path);
    }
    for (const course of outline.courses) {
      this.coursesById.set(getUrlPath(course.url), course);
      for (const unit of course.sections.flatMap((section) => section.units)) {
        this.unitsById.set(getUrlPath(unit.url), unit);
      }
    }

    const savePage = hooks.savePage;
    if (savePage) {
      this.savePage = (unit, outputPath) => savePage(unit.url, outputPath);
    }
  }

  /**
   * Reads and validates an outline file.
   */
  static async fromFile(
    path: string,
    hooks: OutlineSiteHooks = {},
    logger?: Logger
  ): Promise<OutlineSiteAdapter> {
    const data = await readJson(path);
    if (data === null) {
      throw new Error(`Cannot read outline ${path}`);
    }
    return new OutlineSiteAdapter(parseOutline(data), hooks, logger);
  }

  /** URL of the site root, used for login and session checks */
  get siteUrl(): string {
    return this.outline.site;
  }

  /** Every top-level entry: learning paths, then courses no path contains */
  entryUrls(): string[] {
    const inPaths = new Set(
      this.outline.learningPaths.flatMap((path) => path.courses.map(getUrlPath))
    );
    return [
      ...this.outline.learningPaths.map((path) => path.url),
      ...this.outline.courses
        .filter((course) => !inPaths.has(getUrlPath(course.url)))
        .map((course) => course.url),
    ];
  }

  classifyUrl(url: string): UrlKind {
    const id = getUrlPath(url);
    if (this.pathsById.has(id)) return "learningPath";
    if (this.coursesById.has(id)) return "course";
    return "unknown";
  }

  async getLearningPath(url: string): Promise<LearningPathInfo> {
    const path = this.pathsById.get(getUrlPath(url));
    if (!path) {
      throw new Error(`Learning path not in outline: ${url}`);
    }
    return {
      url: path.url,
      title: path.title,
      courses: path.courses.map((courseUrl) => ({
        url: courseUrl,
        title: this.coursesById.get(getUrlPath(courseUrl))?.title ?? getUrlPath(courseUrl),
      })),
    };
  }

  async getCourse(url: string): Promise<CourseInfo> {
    const course = this.coursesById.get(getUrlPath(url));
    if (!course) {
      throw new Error(`Course not in outline: ${url}`);
    }
    if (!course.hasAccess) {
      throw new AccessDeniedError(url);
    }
    return {
      url: course.url,
      title: course.title,
      sections: course.sections.map((section) => ({
        title: section.title,
        units: section.units.map((unit) => ({ url: unit.url, title: unit.title })),
      })),
    };
  }

  async getUnit(ref: UnitRef): Promise<UnitInfo> {
    const unit = this.unitsById.get(getUrlPath(ref.url));
    if (!unit) {
      throw new Error(`Unit not in outline: ${ref.url}`);
    }

    let primary = toManifestSource(unit.manifest);
    let fallback = toManifestSource(unit.fallbackManifest);
    if (unit.kind === "video" && !primary && this.hooks.sniff) {
      this.logger.debug(`Listening for manifests on ${unit.url}`);
      ({ primary, fallback } = await this.hooks.sniff(unit.url));
    }

    return {
      url: unit.url,
      title: unit.title,
      kind: unit.kind,
      primary,
      fallback,
      subtitles: unit.subtitles,
      resources: unit.resources,
      readings: unit.readings,
      summaryHtml: unit.summaryHtml ?? null,
    };
  }

  async validateSession(): Promise<boolean> {
    return this.hooks.validateSession ? this.hooks.validateSession() : true;
  }

  async getCookieHeader(url: string): Promise<string | undefined> {
    return this.hooks.getCookieHeader?.(url);
  }
}

/**
 * Manifest from the outline, with its format taken from the URL when the
 * outline does not name it.
 */
export function toManifestSource(manifest: OutlineManifest | undefined): ManifestSource | null {
  if (!manifest) return null;
  const format = manifest.format ?? classifyManifestUrl(manifest.url);
  return format ? { url: manifest.url, format } : null;
}

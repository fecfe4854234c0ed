/**
 * Zod schemas for the JSON outline the bundled site adapter reads.
 * Lists default to empty and units default to the video kind.
 */
import { z } from "zod";

// ============================================================================
// Units
// ============================================================================

const LinkSchema = z.object({
  title: z.string(),
  url: z.string().url(),
});

const ManifestSchema = z.object({
  url: z.string().url(),
  // Inferred from the URL extension when absent
  format: z.enum(["hls", "dash"]).optional(),
});

const UnitSchema = z.object({
  url: z.string().url(),
  title: z.string(),
  kind: z.enum(["video", "lecture", "quiz"]).default("video"),
  manifest: ManifestSchema.optional(),
  fallbackManifest: ManifestSchema.optional(),
  subtitles: z.array(z.object({ lang: z.string(), url: z.string().url() })).default([]),
  resources: z.array(LinkSchema).default([]),
  readings: z.array(LinkSchema).default([]),
  summaryHtml: z.string().optional(),
});

// ============================================================================
// Courses and learning paths
// ============================================================================

const SectionSchema = z.object({
  title: z.string(),
  units: z.array(UnitSchema),
});

const CourseSchema = z.object({
  url: z.string().url(),
  title: z.string(),
  hasAccess: z.boolean().default(true),
  sections: z.array(SectionSchema),
});

const LearningPathSchema = z.object({
  url: z.string().url(),
  title: z.string(),
  /** Course URLs in path order */
  courses: z.array(z.string().url()),
});

export const OutlineSchema = z.object({
  site: z.string().url(),
  loginUrl: z.string().url().optional(),
  learningPaths: z.array(LearningPathSchema).default([]),
  courses: z.array(CourseSchema).default([]),
});

export type Outline = z.infer<typeof OutlineSchema>;
export type OutlineCourse = z.infer<typeof CourseSchema>;
export type OutlineUnit = z.infer<typeof UnitSchema>;
export type OutlineManifest = z.infer<typeof ManifestSchema>;

/**
 * Validates raw JSON as an outline. Throws a readable error listing the
 * first problems found.
 */
export function parseOutline(data: unknown): Outline {
  const result = OutlineSchema.safeParse(data);
  if (!result.success) {
    const problems = result.error.issues
      .slice(0, 3)
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new Error(`Invalid outline: ${problems.join("; ")}`);
  }
  return result.data;
}

/**
 * Request and manifest schemas shared by the HTTP API and the CLI.
 */

import { z } from 'zod';

export const SegmentInputSchema = z.object({
  text: z.string(),
  start: z.string().min(1),
  end: z.string().min(1),
});

export const ImageAssignmentSchema = z.object({
  segmentIndex: z.number().int().nonnegative(),
  splitIndex: z.number().int().nonnegative(),
  images: z.array(z.string()),
});

export const ImageManifestSchema = z.array(ImageAssignmentSchema);

export const BuildTimelineRequestSchema = z.object({
  title: z.string().trim().min(1, 'title is required'),
  fps: z.number().int().positive().optional(),
  segments: z.array(SegmentInputSchema).min(1, 'at least one segment is required'),
  images: ImageManifestSchema.optional(),
});

export const CreateSessionFieldsSchema = z.object({
  title: z.string().trim().min(1, 'title is required'),
});

export const ExportRequestSchema = z.object({
  fps: z.number().int().positive().optional(),
});

export type BuildTimelineRequest = z.infer<typeof BuildTimelineRequestSchema>;
export type ImageManifest = z.infer<typeof ImageManifestSchema>;

/**
 * Flatten zod issues into a single message: `field: problem; field: problem`.
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

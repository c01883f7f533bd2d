import { z } from "zod";

/**
 * Record from the artifact index: one per group/artifact, describing its latest version.
 * Only `g` and `a` are required; a record with an unusable tag list is kept without tags.
 */
export const ArtifactDocSchema = z.object({
  g: z.string(),
  a: z.string(),
  latestVersion: z.string().optional(),
  ec: z.array(z.string()).optional().catch(undefined),
});

/** Record from the `gav` core: one per published version */
export const VersionDocSchema = z.object({
  g: z.string(),
  a: z.string(),
  v: z.string(),
  p: z.string().optional(),
  ec: z.array(z.string()).optional(),
});

export type ArtifactDoc = z.infer<typeof ArtifactDocSchema>;
export type VersionDoc = z.infer<typeof VersionDocSchema>;

/** Envelope shared by both cores; the docs are validated separately per core */
export const SearchResponseSchema = z.object({
  response: z.object({
    docs: z.array(z.unknown()),
  }),
});

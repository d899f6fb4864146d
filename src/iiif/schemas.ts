/**
 * Zod schemas for the parts of a IIIF Presentation 2 manifest we read.
 *
 * Manifests are untrusted input: every field is optional and a field of the
 * wrong type is treated as absent instead of failing the whole document.
 */
import { z } from "zod";

export const ImageResourceSchema = z
  .object({
    resource: z
      .object({ "@id": z.string().optional().catch(undefined) })
      .optional()
      .catch(undefined),
  })
  .catch({});

export const CanvasSchema = z
  .object({
    images: z.array(ImageResourceSchema).optional().catch(undefined),
  })
  .catch({});

export const SequenceSchema = z
  .object({
    canvases: z.array(CanvasSchema).optional().catch(undefined),
  })
  .catch({});

export const ManifestSchema = z
  .object({
    sequences: z.array(SequenceSchema).optional().catch(undefined),
  })
  .catch({});

export type ImageResource = z.infer<typeof ImageResourceSchema>;
export type Canvas = z.infer<typeof CanvasSchema>;
export type Sequence = z.infer<typeof SequenceSchema>;
export type Manifest = z.infer<typeof ManifestSchema>;

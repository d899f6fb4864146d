/**
 * Image → base64 payload for the vision model.
 */
import type { FormatEnum } from "sharp";
import type { Logger } from "../core/types.js";
import type { DecodedImage } from "./fetcher.js";

type OutputFormat = keyof FormatEnum;

/** Formats sharp can read but not write fall back to this. */
export const DEFAULT_OUTPUT_FORMAT: OutputFormat = "jpeg";

const WRITABLE_FORMATS: ReadonlySet<string> = new Set<OutputFormat>([
  "jpeg",
  "png",
  "webp",
  "gif",
  "tiff",
  "avif",
]);

function isOutputFormat(format: string): format is OutputFormat {
  return WRITABLE_FORMATS.has(format);
}

export function outputFormatFor(format: string | null): OutputFormat {
  return format !== null && isOutputFormat(format) ? format : DEFAULT_OUTPUT_FORMAT;
}

export function toBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("base64");
}

/** Re-serialize `image` in its source format and base64 it. */
export async function encodeImage(
  image: DecodedImage,
  logger: Logger = console,
): Promise<string> {
  const format = outputFormatFor(image.format);
  try {
    const bytes = await image.pipeline.clone().toFormat(format).toBuffer();
    return toBase64(bytes);
  } catch (err) {
    logger.error(`Failed to encode image to base64: ${String(err)}`);
    throw err;
  }
}

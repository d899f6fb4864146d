/**
 * Image download and decoding.
 */
import sharp, { type Sharp } from "sharp";
import { MalformedPayloadError } from "../core/exceptions.js";
import { withRetry, type RetryPolicy } from "../core/retry.js";
import type { Logger } from "../core/types.js";
import type { SessionManager } from "../http/session.js";

/** A decoded page image. Call close() once it is no longer needed. */
export class DecodedImage {
  readonly pipeline: Sharp;
  /** sharp's name for the source format, e.g. "jpeg" or "png"; null when unknown. */
  readonly format: string | null;
  readonly sourceUrl: string;
  private closed = false;

  constructor(pipeline: Sharp, format: string | null, sourceUrl: string) {
    this.pipeline = pipeline;
    this.format = format;
    this.sourceUrl = sourceUrl;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.pipeline.destroy();
  }
}

/** Decode `bytes` with sharp; rejects when the bytes are not an image. */
export async function decodeImage(
  bytes: Buffer,
  sourceUrl: string,
): Promise<DecodedImage> {
  const pipeline = sharp(bytes);
  const metadata = await pipeline.metadata();
  return new DecodedImage(pipeline, metadata.format ?? null, sourceUrl);
}

export class ImageFetcher {
  private sessions: SessionManager;
  private retry: RetryPolicy;
  private logger: Logger;

  constructor(opts: { sessions: SessionManager; retry: RetryPolicy; logger: Logger }) {
    this.sessions = opts.sessions;
    this.retry = opts.retry;
    this.logger = opts.logger;
  }

  /**
   * Download and decode one image. Network failures go through the retry
   * policy; a decode failure is raised at once.
   */
  async fetchImage(url: string): Promise<DecodedImage> {
    return withRetry(
      async () => {
        const bytes = await this.sessions.getSession().getBytes(url);
        try {
          return await decodeImage(bytes, url);
        } catch (err) {
          this.logger.error(`Failed to decode image from ${url}: ${String(err)}`);
          throw new MalformedPayloadError(`Cannot decode image from ${url}`, err);
        }
      },
      this.retry,
      { label: `image ${url}`, logger: this.logger },
    );
  }
}

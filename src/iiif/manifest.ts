/**
 * IIIF manifest resolution: identifier → ordered page-image URLs.
 */
import { withRetry, type RetryPolicy } from "../core/retry.js";
import type { Logger } from "../core/types.js";
import type { SessionManager } from "../http/session.js";
import {
  ManifestSchema,
  type Canvas,
  type ImageResource,
  type Manifest,
  type Sequence,
} from "./schemas.js";

export const DEFAULT_MANIFEST_URL_TEMPLATE =
  "https://repository.library.brown.edu/iiif/presentation/{identifier}/manifest.json";

/**
 * Extract image resource URLs from parsed manifest JSON.
 *
 * Only the first sequence is read. URLs come out in canvas order, then in
 * image order within each canvas; entries without a non-empty `@id` are
 * dropped. Never throws.
 */
export function parseManifestForImageUrls(data: unknown): string[] {
  const manifest: Manifest = ManifestSchema.parse(data);

  const sequence: Sequence | undefined = manifest.sequences?.[0];
  if (!sequence) return [];

  const canvases: Canvas[] = sequence.canvases ?? [];
  if (canvases.length === 0) return [];

  const urls: string[] = [];
  for (const canvas of canvases) {
    const images: ImageResource[] = canvas.images ?? [];
    for (const image of images) {
      const id = image.resource?.["@id"];
      if (id) urls.push(id);
    }
  }
  return urls;
}

export class ManifestResolver {
  private sessions: SessionManager;
  private retry: RetryPolicy;
  private urlTemplate: string;
  private logger: Logger;

  constructor(opts: {
    sessions: SessionManager;
    retry: RetryPolicy;
    logger: Logger;
    urlTemplate?: string;
  }) {
    this.sessions = opts.sessions;
    this.retry = opts.retry;
    this.logger = opts.logger;
    this.urlTemplate = opts.urlTemplate ?? DEFAULT_MANIFEST_URL_TEMPLATE;
  }

  manifestUrl(identifier: string): string {
    return this.urlTemplate.replaceAll("{identifier}", identifier);
  }

  /** Fetch the manifest for `identifier` and list its page images. */
  async fetchImageUrls(identifier: string): Promise<string[]> {
    const url = this.manifestUrl(identifier);

    const body = await withRetry(
      async () => {
        this.logger.info(`Fetching manifest: ${url}`);
        return this.sessions.getSession().getText(url);
      },
      this.retry,
      { label: `manifest ${identifier}`, logger: this.logger },
    );

    let data: unknown;
    try {
      data = JSON.parse(body);
    } catch (err) {
      this.logger.error(`Invalid JSON in manifest for ${identifier}: ${String(err)}`);
      return [];
    }

    const urls = parseManifestForImageUrls(data);
    this.logger.info(`Extracted ${urls.length} image URLs from ${identifier}`);
    return urls;
  }
}

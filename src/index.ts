/**
 * manuscript-ocr – batch OCR of IIIF manuscript pages with a local vision model.
 */
import { parseConfig } from "./config.js";
import { OcrPipeline, type ManifestSource } from "./core/pipeline.js";
import type { BatchResult, Logger, TranscriptionOutcome } from "./core/types.js";
import { SessionManager, type DispatcherSource } from "./http/session.js";
import { encodeImage } from "./images/encoder.js";
import { ImageFetcher } from "./images/fetcher.js";
import { ManifestResolver } from "./iiif/manifest.js";
import { fetchIdentifiersFromMetadata } from "./metadata/reader.js";
import { ResultSink } from "./output/sink.js";
import type { StorageBackend } from "./storage/backend.js";
import {
  TranscriptionEngine,
  type ChatClientFactory,
} from "./transcription/engine.js";

export * from "./core/exceptions.js";
export type { BatchResult, Logger, TranscriptionOutcome } from "./core/types.js";
export { parseManifestForImageUrls } from "./iiif/manifest.js";
export { extractIdentifier } from "./output/sink.js";
export { normalizeContent } from "./transcription/engine.js";

export interface ManuscriptOcrOptions {
  manifests: ManifestSource;
  pipeline: OcrPipeline;
  metadata: StorageBackend;
  identifierField?: string;
  maxIdentifiers?: number;
  sessions?: SessionManager;
  logger?: Logger;
}

/** Overrides for collaborators that talk to the outside world. */
export interface RuntimeOverrides {
  dispatcher?: DispatcherSource;
  clientFactory?: ChatClientFactory;
  emit?: (text: string) => void;
  logger?: Logger;
}

export class ManuscriptOcr {
  private manifests: ManifestSource;
  private pipeline: OcrPipeline;
  private metadata: StorageBackend;
  private identifierField: string | undefined;
  private maxIdentifiers: number | undefined;
  private sessions: SessionManager | null;
  private logger: Logger;

  constructor(opts: ManuscriptOcrOptions) {
    this.manifests = opts.manifests;
    this.pipeline = opts.pipeline;
    this.metadata = opts.metadata;
    this.identifierField = opts.identifierField;
    this.maxIdentifiers = opts.maxIdentifiers;
    this.sessions = opts.sessions ?? null;
    this.logger = opts.logger ?? console;
  }

  /** Construct from a configuration dict (validates with Zod). */
  static fromConfig(raw: unknown, overrides: RuntimeOverrides = {}): ManuscriptOcr {
    const { config, storage, metadata } = parseConfig(raw);
    const logger = overrides.logger ?? console;

    const sessions = new SessionManager(config.http, overrides.dispatcher);
    const manifests = new ManifestResolver({
      sessions,
      retry: config.retry,
      logger,
      urlTemplate: config.repository.manifestUrlTemplate,
    });
    const pipeline = new OcrPipeline({
      images: new ImageFetcher({ sessions, retry: config.retry, logger }),
      encoder: { encode: (image) => encodeImage(image, logger) },
      transcriber: new TranscriptionEngine({
        model: config.model,
        clientFactory: overrides.clientFactory,
        logger,
      }),
      sink: new ResultSink({ storage, logger, emit: overrides.emit }),
      logger,
    });

    return new ManuscriptOcr({
      manifests,
      pipeline,
      metadata,
      identifierField: config.metadata.identifierField,
      maxIdentifiers: config.batch.maxIdentifiers,
      sessions,
      logger,
    });
  }

  // ------------------------------------------------------------------
  // Public API
  // ------------------------------------------------------------------

  /** Transcribe a single image URL. Errors propagate to the caller. */
  async transcribeImage(imageUrl: string): Promise<TranscriptionOutcome> {
    return this.pipeline.run(imageUrl);
  }

  /**
   * Transcribe every page of every identifier, in order. Identifiers default
   * to those found in the metadata directory. Failures are logged and counted,
   * never thrown.
   */
  async processBatch(identifiers?: string[]): Promise<BatchResult> {
    let ids =
      identifiers ??
      (await fetchIdentifiersFromMetadata(this.metadata, {
        field: this.identifierField,
        logger: this.logger,
      }));

    const result: BatchResult = {
      identifiers: 0,
      processed: 0,
      failed: 0,
      skipped: 0,
      errors: [],
    };

    if (ids.length === 0) {
      this.logger.warn("No identifiers to process");
      return result;
    }

    if (this.maxIdentifiers !== undefined && ids.length > this.maxIdentifiers) {
      this.logger.info(`Limiting batch to the first ${this.maxIdentifiers} of ${ids.length} identifiers`);
      ids = ids.slice(0, this.maxIdentifiers);
    }
    result.identifiers = ids.length;

    for (const [idIndex, identifier] of ids.entries()) {
      this.logger.info(`Processing identifier ${idIndex + 1}/${ids.length}: ${identifier}`);

      let imageUrls: string[];
      try {
        imageUrls = await this.manifests.fetchImageUrls(identifier);
      } catch (exc) {
        this.logger.error(`Failed to fetch manifest for ${identifier}: ${String(exc)}`);
        result.failed++;
        result.errors.push(`${identifier}: ${String(exc)}`);
        continue;
      }

      if (imageUrls.length === 0) {
        this.logger.warn(`No images found for ${identifier}, skipping`);
        result.skipped++;
        continue;
      }

      for (const [imageIndex, imageUrl] of imageUrls.entries()) {
        this.logger.info(
          `Processing image ${imageIndex + 1}/${imageUrls.length} from ${identifier}: ${imageUrl}`,
        );
        try {
          await this.pipeline.run(imageUrl);
          result.processed++;
        } catch (exc) {
          this.logger.error(`Failed to process image ${imageUrl} from ${identifier}:`, exc);
          result.failed++;
          result.errors.push(`${imageUrl}: ${String(exc)}`);
        }
      }

      this.logger.info(`Completed processing all images for ${identifier}`);
    }

    this.logger.info(
      `Batch OCR complete. Processed: ${result.processed}, Failed: ${result.failed}`,
    );
    return result;
  }

  /** Release the pooled HTTP connections. */
  async close(): Promise<void> {
    await this.sessions?.close();
  }
}

/**
 * Per-image OCR pipeline – collaborator interfaces and the sequential runner.
 */
import type { DecodedImage } from "../images/fetcher.js";
import type { Logger, TranscriptionOutcome } from "./types.js";

// ---------------------------------------------------------------------------
// Collaborator interfaces
// ---------------------------------------------------------------------------

/** Resolves a repository identifier to its ordered page-image URLs. */
export interface ManifestSource {
  fetchImageUrls(identifier: string): Promise<string[]>;
}

export interface ImageSource {
  fetchImage(url: string): Promise<DecodedImage>;
}

export interface ImageEncoder {
  encode(image: DecodedImage): Promise<string>;
}

export interface Transcriber {
  transcribe(payload: string): Promise<string>;
}

export interface TranscriptionSink {
  publish(
    imageUrl: string,
    transcription: string,
  ): Promise<{ identifier: string | null; key: string | null }>;
}

// ---------------------------------------------------------------------------
// Pipeline runner
// ---------------------------------------------------------------------------

export class OcrPipeline {
  private images: ImageSource;
  private encoder: ImageEncoder;
  private transcriber: Transcriber;
  private sink: TranscriptionSink;
  private logger: Logger;

  constructor(opts: {
    images: ImageSource;
    encoder: ImageEncoder;
    transcriber: Transcriber;
    sink: TranscriptionSink;
    logger: Logger;
  }) {
    this.images = opts.images;
    this.encoder = opts.encoder;
    this.transcriber = opts.transcriber;
    this.sink = opts.sink;
    this.logger = opts.logger;
  }

  /** Fetch → encode → transcribe → publish one image. Errors propagate. */
  async run(imageUrl: string): Promise<TranscriptionOutcome> {
    this.logger.info(`Fetching image from ${imageUrl}`);
    const image = await this.images.fetchImage(imageUrl);

    try {
      this.logger.debug("Encoding image to base64");
      const payload = await this.encoder.encode(image);

      this.logger.info("Transcribing image text using vision model");
      const text = await this.transcriber.transcribe(payload);

      const { identifier, key } = await this.sink.publish(imageUrl, text);
      return { imageUrl, identifier, key, text };
    } finally {
      image.close();
    }
  }
}

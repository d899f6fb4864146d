/**
 * Persisting transcriptions under the numeric id found in the image URL.
 */
import type { Logger } from "../core/types.js";
import type { StorageBackend } from "../storage/backend.js";

export const IDENTIFIER_PATTERN = /bdr:(\d+)/;

/** The digits after the first `bdr:` marker in `url`, or null. */
export function extractIdentifier(url: string): string | null {
  const match = IDENTIFIER_PATTERN.exec(url);
  return match?.[1] ?? null;
}

export function transcriptionKey(identifier: string): string {
  return `${identifier}.txt`;
}

export class ResultSink {
  private storage: StorageBackend;
  private logger: Logger;
  private emit: (text: string) => void;

  constructor(opts: {
    storage: StorageBackend;
    logger: Logger;
    emit?: (text: string) => void;
  }) {
    this.storage = opts.storage;
    this.logger = opts.logger;
    this.emit = opts.emit ?? ((text) => process.stdout.write(`${text}\n`));
  }

  /** Write `transcription` to `<identifier>.txt`, overwriting. Returns the key. */
  async save(transcription: string, identifier: string): Promise<string> {
    const key = transcriptionKey(identifier);
    try {
      await this.storage.write(key, transcription);
    } catch (err) {
      this.logger.error(`Failed to write file ${this.storage.describe(key)}: ${String(err)}`);
      throw err;
    }
    this.logger.info(`Transcription saved to ${this.storage.describe(key)}`);
    return key;
  }

  /**
   * Save under the identifier derived from `imageUrl`; without one the text
   * goes to stdout instead. Returns the identifier and key used, if any.
   */
  async publish(
    imageUrl: string,
    transcription: string,
  ): Promise<{ identifier: string | null; key: string | null }> {
    const identifier = extractIdentifier(imageUrl);
    if (identifier === null) {
      this.logger.warn(`No identifier found in ${imageUrl}, displaying transcription:`);
      this.emit(transcription);
      return { identifier: null, key: null };
    }
    const key = await this.save(transcription, identifier);
    return { identifier, key };
  }
}

/**
 * Shared pipeline types.
 */

/** Minimal logging surface; `console` satisfies it. */
export interface Logger {
  debug(message: string, ...rest: unknown[]): void;
  info(message: string, ...rest: unknown[]): void;
  warn(message: string, ...rest: unknown[]): void;
  error(message: string, ...rest: unknown[]): void;
}

/** Result returned from processBatch(). */
export interface BatchResult {
  identifiers: number;
  processed: number;
  failed: number;
  skipped: number;
  errors: string[];
}

/** Where a single transcription ended up. */
export interface TranscriptionOutcome {
  imageUrl: string;
  identifier: string | null;
  key: string | null;
  text: string;
}

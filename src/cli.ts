#!/usr/bin/env node
/**
 * CLI entrypoint for manuscript-ocr.
 *
 * Usage:
 *   manuscript-ocr --image-url https://repository.example.org/iiif/image/bdr:123/full/full/0/default.jpg
 *   manuscript-ocr --batch --metadata-dir ./metadata --output-dir ./output
 */
import { readFile } from "node:fs/promises";
import { pathToFileURL } from "node:url";
import { parseArgs } from "node:util";
import { ManuscriptOcr } from "./index.js";

export const USAGE = `
manuscript-ocr: OCR for scanned manuscript images

Usage:
  manuscript-ocr --image-url <url>
  manuscript-ocr --batch [--metadata-dir <dir>] [--output-dir <dir>]

Options:
  --image-url <url>        Transcribe a single image
  --batch                  Transcribe every identifier in the metadata directory
  --metadata-dir <dir>     Metadata JSON directory    (default: ./metadata)
  --output-dir <dir>       Transcription directory    (default: ./output)
  --max-identifiers <n>    Stop after n identifiers
  --config <file>          JSON configuration file
  --help                   Show this help
`.trim();

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_INTERRUPTED = 130;

export interface CliOptions {
  imageUrl?: string;
  batch: boolean;
  metadataDir?: string;
  outputDir?: string;
  maxIdentifiers?: number;
  config?: string;
  help: boolean;
}

export function parseArguments(args: string[]): CliOptions {
  const { values } = parseArgs({
    args,
    options: {
      "image-url": { type: "string" },
      batch: { type: "boolean", default: false },
      "metadata-dir": { type: "string" },
      "output-dir": { type: "string" },
      "max-identifiers": { type: "string" },
      config: { type: "string" },
      help: { type: "boolean", short: "h", default: false },
    },
    strict: true,
  });

  let maxIdentifiers: number | undefined;
  if (values["max-identifiers"] !== undefined) {
    maxIdentifiers = Number(values["max-identifiers"]);
    if (!Number.isInteger(maxIdentifiers) || maxIdentifiers < 1) {
      throw new Error(`--max-identifiers must be a positive integer, got ${values["max-identifiers"]}`);
    }
  }

  return {
    imageUrl: values["image-url"],
    batch: values.batch ?? false,
    metadataDir: values["metadata-dir"],
    outputDir: values["output-dir"],
    maxIdentifiers,
    config: values.config,
    help: values.help ?? false,
  };
}

/** File config with command-line flags layered on top. */
export async function loadConfig(opts: CliOptions): Promise<Record<string, unknown>> {
  const file: unknown = opts.config
    ? JSON.parse(await readFile(opts.config, "utf-8"))
    : {};
  if (typeof file !== "object" || file === null || Array.isArray(file)) {
    throw new Error(`Config file ${opts.config} must contain a JSON object`);
  }

  const config: Record<string, unknown> = { ...file };
  if (opts.metadataDir !== undefined) {
    config.metadata = { ...asObject(config.metadata), path: opts.metadataDir };
  }
  if (opts.outputDir !== undefined) {
    config.storage = {
      ...asObject(config.storage),
      config: { ...asObject(asObject(config.storage).config), basePath: opts.outputDir },
    };
  }
  if (opts.maxIdentifiers !== undefined) {
    config.batch = { ...asObject(config.batch), maxIdentifiers: opts.maxIdentifiers };
  }
  return config;
}

function asObject(value: unknown): Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
    ? { ...value }
    : {};
}

export async function main(args: string[]): Promise<number> {
  let opts: CliOptions;
  try {
    opts = parseArguments(args);
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    console.error(USAGE);
    return EXIT_ERROR;
  }

  if (opts.help) {
    console.log(USAGE);
    return EXIT_OK;
  }
  if (!opts.imageUrl && !opts.batch) {
    console.error(USAGE);
    return EXIT_ERROR;
  }

  let ocr: ManuscriptOcr;
  try {
    ocr = ManuscriptOcr.fromConfig(await loadConfig(opts));
  } catch (err) {
    console.error(`Error: ${String(err)}`);
    return EXIT_ERROR;
  }

  const onInterrupt = (): void => {
    console.info("Batch processing interrupted by user");
    process.exit(EXIT_INTERRUPTED);
  };

  try {
    if (opts.imageUrl) {
      await ocr.transcribeImage(opts.imageUrl);
      return EXIT_OK;
    }

    process.once("SIGINT", onInterrupt);
    const result = await ocr.processBatch();
    console.log(
      `Processed ${result.processed} images from ${result.identifiers} identifiers (${result.failed} failed, ${result.skipped} skipped)`,
    );
    return EXIT_OK;
  } catch (err) {
    console.error(`Error: ${String(err)}`);
    return EXIT_ERROR;
  } finally {
    process.removeListener("SIGINT", onInterrupt);
    await ocr.close();
  }
}

const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
  process.exitCode = await main(process.argv.slice(2));
}

/**
 * Shared test fixtures: temp dirs, a recording logger, generated images,
 * an in-process HTTP stand-in and a fake chat client.
 */
import { mkdirSync, mkdtempSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import sharp from "sharp";
import { MockAgent } from "undici";
import { vi } from "vitest";

import { ManuscriptOcr } from "../src/index.js";
import type { RetryPolicy } from "../src/core/retry.js";
import type { ChatClient, ChatReply } from "../src/transcription/engine.js";

export function makeTmpDir(): string {
  return mkdtempSync(join(tmpdir(), "manuscript-ocr-test-"));
}

export function makeLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

/** Messages passed to one logger method, first argument only. */
export function messages(fn: { mock: { calls: unknown[][] } }): string[] {
  return fn.mock.calls.map((call) => String(call[0]));
}

/** Five attempts with no waiting between them. */
export const FAST_RETRY: RetryPolicy = {
  attempts: 5,
  factor: 1,
  minDelayMs: 0,
  maxDelayMs: 0,
};

export async function pngBytes(width = 4, height = 3): Promise<Buffer> {
  return sharp({
    create: {
      width,
      height,
      channels: 3,
      background: { r: 240, g: 232, b: 210 },
    },
  })
    .png()
    .toBuffer();
}

export function makeMockAgent(): MockAgent {
  const agent = new MockAgent();
  agent.disableNetConnect();
  return agent;
}

// ---------------------------------------------------------------------------
// IIIF
// ---------------------------------------------------------------------------

export const REPO_ORIGIN = "https://repo.test";
export const IMAGE_ORIGIN = "https://images.test";
export const MANIFEST_URL_TEMPLATE = `${REPO_ORIGIN}/iiif/presentation/{identifier}/manifest.json`;

export function manifestPath(identifier: string): string {
  return `/iiif/presentation/${identifier}/manifest.json`;
}

export function imagePath(numericId: string): string {
  return `/iiif/image/bdr:${numericId}/full/full/0/default.png`;
}

export function imageUrl(numericId: string): string {
  return `${IMAGE_ORIGIN}${imagePath(numericId)}`;
}

/** A one-sequence manifest with one image per canvas. */
export function makeManifest(urls: string[]): Record<string, unknown> {
  return {
    "@context": "http://iiif.io/api/presentation/2/context.json",
    "@type": "sc:Manifest",
    sequences: [
      {
        "@type": "sc:Sequence",
        canvases: urls.map((url, i) => ({
          "@id": `${REPO_ORIGIN}/canvas/${i + 1}`,
          "@type": "sc:Canvas",
          images: [
            {
              "@type": "oa:Annotation",
              resource: { "@id": url, "@type": "dctypes:Image", format: "image/png" },
            },
          ],
        })),
      },
    ],
  };
}

// ---------------------------------------------------------------------------
// Vision model
// ---------------------------------------------------------------------------

type ChatArgs = Parameters<ChatClient["chat"]>[0];

export class FakeChatClient implements ChatClient {
  requests: ChatArgs[] = [];
  private replies: Array<unknown>;

  /** Each call takes the next reply; an Error reply is thrown. The last one repeats. */
  constructor(...replies: unknown[]) {
    this.replies = replies;
  }

  async chat(request: ChatArgs): Promise<ChatReply> {
    this.requests.push(request);
    const next = this.replies.length > 1 ? this.replies.shift() : this.replies[0];
    if (next instanceof Error) throw next;
    return { message: { content: next } };
  }
}

export function connectionRefused(): TypeError {
  const cause = Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:11434"), {
    code: "ECONNREFUSED",
  });
  return new TypeError("fetch failed", { cause });
}

// ---------------------------------------------------------------------------
// Pre-configured ManuscriptOcr
// ---------------------------------------------------------------------------

export interface TestOcr {
  ocr: ManuscriptOcr;
  logger: ReturnType<typeof makeLogger>;
  emitted: string[];
  metadataDir: string;
  outputDir: string;
}

export function makeOcr(
  dir: string,
  agent: MockAgent,
  client: ChatClient,
  config: Record<string, unknown> = {},
): TestOcr {
  const logger = makeLogger();
  const emitted: string[] = [];
  const metadataDir = join(dir, "metadata");
  const outputDir = join(dir, "output");
  const ocr = ManuscriptOcr.fromConfig(
    {
      repository: { manifestUrlTemplate: MANIFEST_URL_TEMPLATE },
      retry: FAST_RETRY,
      metadata: { path: metadataDir },
      storage: { provider: "disk", config: { basePath: outputDir } },
      ...config,
    },
    {
      dispatcher: agent,
      clientFactory: () => client,
      emit: (text) => emitted.push(text),
      logger,
    },
  );
  return { ocr, logger, emitted, metadataDir, outputDir };
}

export function writeMetadata(metadataDir: string, records: Record<string, string[]>): void {
  mkdirSync(metadataDir, { recursive: true });
  for (const [name, ids] of Object.entries(records)) {
    writeFileSync(join(metadataDir, name), JSON.stringify({ mods_id_bdr_pid_ssim: ids }));
  }
}

/**
 * Vision-model transcription through a local Ollama server.
 */
import { Ollama, type ChatRequest } from "ollama";
import { z } from "zod";
import {
  MalformedPayloadError,
  ServiceUnavailableError,
  isTransientNetworkError,
} from "../core/exceptions.js";
import type { Logger } from "../core/types.js";

export const SYSTEM_PROMPT = `
You are an expert paleographer transcribing handwritten historical
correspondence from the late 19th and early 20th century. Writers of the
period often use archaic spelling and punctuation.

INSTRUCTIONS (MANDATORY):
1. OUTPUT ONLY the transcribed text: no headers, no headings, no inside address,
   no pagination, no footers, no notes, no explanations, no marginalia
2. Preserve original spelling, punctuation, line breaks and paragraph structure exactly
3. If a word is unclear, give your best reading IN-LINE without marking it
4. Do NOT correct archaic spellings or modernize the language
5. Do NOT add commentary, analysis or metadata
6. Do NOT include sections titled "Correction Notes", "Analysis" or similar
7. Your entire response must be the transcription itself

Any deviation from these rules makes the output invalid.
`;

export const USER_INSTRUCTION = "Transcribe text from this image.";

export interface ModelOptions {
  host: string;
  name: string;
  seed: number;
  temperature: number;
  topP: number;
  repeatPenalty: number;
  numPredict: number;
  stop: string[];
}

export const DEFAULT_MODEL_OPTIONS: ModelOptions = {
  host: "http://localhost:11434",
  name: "qwen2.5vl:3b",
  seed: 18900820,
  temperature: 0.0,
  topP: 0.05,
  repeatPenalty: 1.0,
  numPredict: 1048,
  stop: ["\n\nCorrection", "**Correction", "Notes:", "Analysis:"],
};

// ---------------------------------------------------------------------------
// Client seam
// ---------------------------------------------------------------------------

/** The part of a chat reply we read; content shape is checked at run time. */
export interface ChatReply {
  message: { content: unknown };
}

export interface ChatClient {
  chat(request: ChatRequest & { stream?: false }): Promise<ChatReply>;
}

export type ChatClientFactory = (host: string) => ChatClient;

export const ollamaClientFactory: ChatClientFactory = (host) =>
  new Ollama({ host });

// ---------------------------------------------------------------------------
// Response normalization
// ---------------------------------------------------------------------------

const TextFragmentSchema = z.object({ text: z.string() });
const ContentSchema = z.union([z.string(), z.array(z.unknown())]);

/**
 * Flatten a reply's content to text. Strings pass through; a list has its
 * string items and `{ text }` fragments joined with newlines.
 */
export function normalizeContent(content: unknown): string {
  const parsed = ContentSchema.safeParse(content);
  if (!parsed.success) {
    throw new MalformedPayloadError(
      `Unexpected response content type: ${content === null ? "null" : typeof content}`,
    );
  }
  if (typeof parsed.data === "string") return parsed.data;

  const parts: string[] = [];
  for (const item of parsed.data) {
    if (typeof item === "string") {
      parts.push(item);
      continue;
    }
    const fragment = TextFragmentSchema.safeParse(item);
    if (fragment.success) parts.push(fragment.data.text);
  }
  return parts.join("\n");
}

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

export class TranscriptionEngine {
  private options: ModelOptions;
  private factory: ChatClientFactory;
  private logger: Logger;
  private client: ChatClient | null = null;

  constructor(opts: {
    model?: ModelOptions;
    clientFactory?: ChatClientFactory;
    logger: Logger;
  }) {
    this.options = opts.model ?? DEFAULT_MODEL_OPTIONS;
    this.factory = opts.clientFactory ?? ollamaClientFactory;
    this.logger = opts.logger;
  }

  /** The chat request sent for one base64-encoded image. */
  buildRequest(payload: string): ChatRequest & { stream: false } {
    return {
      model: this.options.name,
      stream: false,
      messages: [
        { role: "system", content: SYSTEM_PROMPT },
        { role: "user", content: USER_INSTRUCTION, images: [payload] },
      ],
      options: {
        seed: this.options.seed,
        temperature: this.options.temperature,
        top_p: this.options.topP,
        repeat_penalty: this.options.repeatPenalty,
        num_predict: this.options.numPredict,
        stop: this.options.stop,
      },
    };
  }

  /**
   * Transcribe one image. Not retried: a failed call goes straight back to
   * the caller.
   */
  async transcribe(payload: string): Promise<string> {
    const client = this.getClient();

    let reply: ChatReply;
    try {
      reply = await client.chat(this.buildRequest(payload));
    } catch (err) {
      if (isTransientNetworkError(err)) {
        this.logger.error(
          `Ollama is unreachable at ${this.options.host}. Start it with: ollama serve`,
        );
        throw new ServiceUnavailableError(
          `Cannot connect to Ollama at ${this.options.host}: ${String(err)}`,
          err,
        );
      }
      this.logger.error(
        `Model invocation failed: ${String(err)} -> try: \`ollama pull ${this.options.name}\``,
      );
      throw err;
    }

    return normalizeContent(reply.message.content);
  }

  private getClient(): ChatClient {
    if (this.client !== null) return this.client;
    try {
      this.client = this.factory(this.options.host);
    } catch (err) {
      this.logger.error(
        "Failed to initialize Ollama client. Ensure Ollama is running with: ollama serve",
      );
      throw new ServiceUnavailableError(`Cannot connect to Ollama: ${String(err)}`, err);
    }
    return this.client;
  }
}

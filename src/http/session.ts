/**
 * Pooled HTTP access shared by the manifest resolver and the image fetcher.
 */
import { Agent, request, type Dispatcher } from "undici";
import {
  HttpStatusError,
  NetworkError,
  OcrError,
  RETRYABLE_HTTP_CODES,
  RetryableHttpError,
  isTransientNetworkError,
} from "../core/exceptions.js";

export interface HttpOptions {
  /** Maximum sockets kept per origin. */
  connections: number;
  connectTimeoutMs: number;
  readTimeoutMs: number;
  maxRedirections: number;
}

export const DEFAULT_HTTP_OPTIONS: HttpOptions = {
  connections: 20,
  connectTimeoutMs: 3_050,
  readTimeoutMs: 30_000,
  maxRedirections: 5,
};

export class HttpSession {
  private dispatcher: Dispatcher;
  private options: HttpOptions;

  constructor(options: HttpOptions, dispatcher?: Dispatcher) {
    this.options = options;
    this.dispatcher =
      dispatcher ??
      new Agent({
        connections: options.connections,
        connect: { timeout: options.connectTimeoutMs },
        headersTimeout: options.readTimeoutMs,
        bodyTimeout: options.readTimeoutMs,
        maxRedirections: options.maxRedirections,
      });
  }

  /** GET `url` and return the raw body. */
  async getBytes(url: string): Promise<Buffer> {
    return this.get(url, async (body) =>
      Buffer.from(await body.arrayBuffer()),
    );
  }

  /** GET `url` and return the body decoded as UTF-8. */
  async getText(url: string): Promise<string> {
    return this.get(url, (body) => body.text());
  }

  async close(): Promise<void> {
    await this.dispatcher.close();
  }

  /**
   * Retryable statuses are checked before the generic >= 400 check so a 503
   * surfaces as RetryableHttpError, never as HttpStatusError.
   */
  private async get<T>(
    url: string,
    read: (body: Dispatcher.ResponseData["body"]) => Promise<T>,
  ): Promise<T> {
    try {
      const res = await request(url, {
        method: "GET",
        dispatcher: this.dispatcher,
        headersTimeout: this.options.readTimeoutMs,
        bodyTimeout: this.options.readTimeoutMs,
      });

      if (RETRYABLE_HTTP_CODES.has(res.statusCode)) {
        await res.body.dump();
        throw new RetryableHttpError(res.statusCode, url);
      }
      if (res.statusCode >= 400) {
        await res.body.dump();
        throw new HttpStatusError(res.statusCode, url);
      }

      return await read(res.body);
    } catch (err) {
      if (err instanceof OcrError) throw err;
      if (isTransientNetworkError(err)) throw new NetworkError(url, err);
      throw err;
    }
  }
}

/** A dispatcher to use once, or a factory called for every new session. */
export type DispatcherSource = Dispatcher | (() => Dispatcher);

/**
 * Holds the one HttpSession of its owner. The session is built on first use
 * and every later call returns the same instance until `close()`.
 */
export class SessionManager {
  private options: HttpOptions;
  private dispatcher: DispatcherSource | undefined;
  private session: HttpSession | null = null;

  constructor(options: HttpOptions = DEFAULT_HTTP_OPTIONS, dispatcher?: DispatcherSource) {
    this.options = options;
    this.dispatcher = dispatcher;
  }

  getSession(): HttpSession {
    if (this.session === null) {
      const dispatcher =
        typeof this.dispatcher === "function" ? this.dispatcher() : this.dispatcher;
      this.session = new HttpSession(this.options, dispatcher);
    }
    return this.session;
  }

  /**
   * Close the current session and its dispatcher. An injected dispatcher
   * instance is closed with it, so later sessions get a pool of their own.
   */
  async close(): Promise<void> {
    if (this.session === null) return;
    const session = this.session;
    this.session = null;
    if (typeof this.dispatcher !== "function") this.dispatcher = undefined;
    await session.close();
  }
}

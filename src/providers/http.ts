// src/providers/http.ts
import http from "node:http";
import https from "node:https";
import axios, {
  type AxiosAdapter,
  type AxiosInstance,
  type AxiosRequestConfig,
} from "axios";
import { cfg } from "../config.js";
import { log, errMessage } from "../logger.js";
import {
  PermanentTransportError,
  TransientTransportError,
} from "../errors.js";

const DEFAULT_HEADERS = {
  "User-Agent":
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  Accept: "application/json, text/plain, */*",
  "Accept-Language": "zh-CN,zh;q=0.9,en;q=0.8",
  "Accept-Encoding": "gzip, deflate, br",
  Connection: "keep-alive",
};

const RETRY_STATUSES = new Set([429, 500, 502, 503, 504]);

export type Params = Record<string, string | number | undefined>;

export type SessionOptions = {
  /** Tag used in logs and errors, e.g. "sina" */
  source: string;
  headers?: Record<string, string>;
  timeoutMs?: number;
  /** Total attempts for transient failures (first try included). */
  maxAttempts?: number;
  /** Randomized throttle window between consecutive requests. */
  minDelayMs?: number;
  maxDelayMs?: number;
  /** Backoff before retry n is backoffBaseMs * 2^(n-1). */
  backoffBaseMs?: number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  now?: () => number;
  /** Replaces the network transport; tests hand in an in-process stand-in. */
  adapter?: AxiosAdapter;
};

const realSleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Map an axios / runtime failure onto the transport error taxonomy. */
export function classifyError(
  e: unknown,
  source: string,
  url: string
): TransientTransportError | PermanentTransportError {
  if (axios.isAxiosError(e)) {
    const status = e.response?.status;
    if (status === undefined) {
      if (e.code === "ERR_INVALID_URL" || e.code === "ERR_BAD_OPTION_VALUE") {
        return new PermanentTransportError(
          `invalid request ${url}: ${e.message}`,
          source,
          undefined,
          { cause: e }
        );
      }
      // timeout (ECONNABORTED / ETIMEDOUT) or connection-level failure
      return new TransientTransportError(
        `network error ${url}: ${e.code ?? e.message}`,
        source,
        undefined,
        { cause: e }
      );
    }
    if (RETRY_STATUSES.has(status) || status >= 500) {
      return new TransientTransportError(
        `HTTP ${status} from ${url}`,
        source,
        status,
        { cause: e }
      );
    }
    return new PermanentTransportError(
      `HTTP ${status} from ${url}`,
      source,
      status,
      { cause: e }
    );
  }
  if (e instanceof TypeError) {
    return new PermanentTransportError(
      `invalid request ${url}: ${e.message}`,
      source,
      undefined,
      { cause: e }
    );
  }
  return new TransientTransportError(
    `request failed ${url}: ${errMessage(e)}`,
    source,
    undefined,
    { cause: e }
  );
}

function retryAfterMs(e: TransientTransportError): number {
  const cause = e.cause;
  if (!axios.isAxiosError(cause)) return 0;
  const raw = cause.response?.headers?.["retry-after"];
  const secs = Number(raw);
  return Number.isFinite(secs) && secs > 0 ? secs * 1000 : 0;
}

/**
 * One HTTP session per adapter invocation: shared headers, keep-alive agents,
 * randomized throttling and bounded retry. Always close() it (see withSession).
 */
export class SourceSession {
  readonly source: string;
  private client: AxiosInstance;
  private httpAgent = new http.Agent({ keepAlive: true });
  private httpsAgent = new https.Agent({ keepAlive: true });
  private lastRequestAt = 0;
  private closed = false;

  private maxAttempts: number;
  private minDelayMs: number;
  private maxDelayMs: number;
  private backoffBaseMs: number;
  private sleep: (ms: number) => Promise<void>;
  private random: () => number;
  private now: () => number;

  constructor(opts: SessionOptions) {
    this.source = opts.source;
    this.maxAttempts = opts.maxAttempts ?? cfg.HTTP_MAX_RETRIES;
    this.minDelayMs = opts.minDelayMs ?? 1000;
    this.maxDelayMs = opts.maxDelayMs ?? 3000;
    this.backoffBaseMs = opts.backoffBaseMs ?? 1000;
    this.sleep = opts.sleep ?? realSleep;
    this.random = opts.random ?? Math.random;
    this.now = opts.now ?? Date.now;

    this.client = axios.create({
      timeout: opts.timeoutMs ?? cfg.HTTP_TIMEOUT_MS,
      headers: { ...DEFAULT_HEADERS, ...opts.headers },
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      adapter: opts.adapter,
    });
  }

  get isClosed() {
    return this.closed;
  }

  /** GET and return the parsed JSON body (unvalidated). */
  async getJson(url: string, params?: Params): Promise<unknown> {
    return this.request({ url, params, responseType: "json" });
  }

  /** GET and decode the body with the given charset (e.g. "gbk"). */
  async getText(
    url: string,
    params?: Params,
    encoding = "utf-8"
  ): Promise<string> {
    const data = await this.request({
      url,
      params,
      responseType: "arraybuffer",
    });
    if (typeof data === "string") return data;
    if (data instanceof ArrayBuffer || ArrayBuffer.isView(data)) {
      return new TextDecoder(encoding).decode(data);
    }
    return String(data ?? "");
  }

  private async throttle() {
    const elapsed = this.now() - this.lastRequestAt;
    if (this.lastRequestAt > 0 && elapsed < this.minDelayMs) {
      const delay =
        this.minDelayMs + this.random() * (this.maxDelayMs - this.minDelayMs);
      await this.sleep(delay);
    }
    this.lastRequestAt = this.now();
  }

  private async request(config: AxiosRequestConfig): Promise<unknown> {
    if (this.closed) {
      throw new PermanentTransportError("session closed", this.source);
    }
    const url = config.url ?? "";
    await this.throttle();

    for (let attempt = 1; ; attempt++) {
      try {
        const { data } = await this.client.request<unknown>(config);
        return data;
      } catch (e) {
        const err = classifyError(e, this.source, url);
        const retriable =
          err instanceof TransientTransportError && attempt < this.maxAttempts;
        if (!retriable) throw err;

        const backoff = Math.max(
          this.backoffBaseMs * 2 ** (attempt - 1),
          retryAfterMs(err)
        );
        log.warn(`[HTTP:${this.source}] transient failure, retrying`, {
          url,
          attempt,
          status: err.status,
          backoffMs: backoff,
        });
        await this.sleep(backoff);
      }
    }
  }

  /** Release keep-alive sockets. Safe to call twice. */
  close() {
    if (this.closed) return;
    this.closed = true;
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }
}

/** Run `fn` with a fresh session and close it on every exit path. */
export async function withSession<T>(
  opts: SessionOptions,
  fn: (session: SourceSession) => Promise<T>
): Promise<T> {
  const session = new SourceSession(opts);
  try {
    return await fn(session);
  } finally {
    session.close();
  }
}

/** Options every adapter passes through to its session. */
export type AdapterOptions = Omit<SessionOptions, "source" | "headers">;

import fetch, { type RequestInit } from 'node-fetch';
import type { BackendConfig } from '../config/index.js';
import type { BackendFailure, BackendResult, HttpMethod, JsonObject, JsonValue } from '../types/backend.types.js';
import { logger } from '../utils/logger.js';

const JSON_CONTENT_TYPE = /application\/json/i;

export const DEFAULT_BACKEND_CONFIG: BackendConfig = {
  baseUrl: 'http://localhost:5000',
  connectTimeoutMs: 5000,
  readTimeoutMs: 10000,
};

type Phase = 'connect' | 'read';

/**
 * Thin client for the sentiment backend.
 *
 * `get` and `post` never reject: connection errors, timeouts, non-200 answers,
 * non-JSON bodies and unparseable JSON all come back as a failed {@link BackendResult}.
 */
export class BackendClient {
  private readonly base: string;
  private readonly connectTimeoutMs: number;
  private readonly readTimeoutMs: number;

  constructor(cfg: Partial<BackendConfig> = {}) {
    const merged = { ...DEFAULT_BACKEND_CONFIG, ...cfg };
    this.base = merged.baseUrl.replace(/\/+$/, '');
    this.connectTimeoutMs = merged.connectTimeoutMs;
    this.readTimeoutMs = merged.readTimeoutMs;
  }

  get baseUrl() {
    return this.base;
  }

  get(path: string): Promise<BackendResult> {
    return this.request('GET', path);
  }

  post(path: string, payload: JsonObject): Promise<BackendResult> {
    return this.request('POST', path, {
      headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
      body: JSON.stringify(payload),
    });
  }

  health(): Promise<BackendResult> {
    return this.get('/health');
  }

  private async request(method: HttpMethod, path: string, init: RequestInit = {}): Promise<BackendResult> {
    const started = Date.now();
    const ctrl = new AbortController();
    let phase: Phase = 'connect';
    let timedOut = false;
    const arm = (ms: number) => setTimeout(() => { timedOut = true; ctrl.abort(); }, ms);
    let timer = arm(this.connectTimeoutMs);
    try {
      const res = await fetch(`${this.base}${path}`, { ...init, method, signal: ctrl.signal });
      clearTimeout(timer);
      phase = 'read';
      timer = arm(this.readTimeoutMs);
      const body = await res.text();
      const contentType = res.headers.get('content-type') || '';

      if (res.status !== 200 || !JSON_CONTENT_TYPE.test(contentType)) {
        return this.fail(method, path, started, {
          ok: false,
          errorMessage: `${method} ${path} -> ${res.status} ${res.statusText}`.trimEnd(),
          rawBody: body,
        }, res.status);
      }

      let data: JsonValue;
      try {
        data = JSON.parse(body);
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        return this.fail(method, path, started, {
          ok: false,
          errorMessage: `${method} ${path} -> invalid JSON body (${reason})`,
          rawBody: body,
        }, res.status);
      }
      logger.debug({ method, path, status: res.status, ms: Date.now() - started }, 'backend_request_ok');
      return { ok: true, data };
    } catch (err) {
      const errorMessage = timedOut
        ? `${method} ${path} -> timed out after ${phase === 'connect' ? this.connectTimeoutMs : this.readTimeoutMs}ms`
        : `${method} ${path} failed: ${err instanceof Error ? err.message : String(err)}`;
      return this.fail(method, path, started, { ok: false, errorMessage });
    } finally {
      clearTimeout(timer);
    }
  }

  private fail(method: HttpMethod, path: string, started: number, result: BackendFailure, status?: number): BackendFailure {
    logger.warn({ method, path, status, ms: Date.now() - started, error: result.errorMessage }, 'backend_request_failed');
    return result;
  }
}

// ═══════════════════════════════════════════════════════════
// TERMSAGE — LLM Client
// One prompt in, one completion out, via a local Ollama server
// ═══════════════════════════════════════════════════════════

import { BackendError, EmptyOutputError, TransportError } from './errors.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';

export const DEFAULT_GENERATE_TIMEOUT_MS = 30_000;
export const PROBE_TIMEOUT_MS = 5_000;

export interface GenerateOptions {
  model?: string;
  timeoutMs?: number;
  temperature?: number;
  /** Upper bound on generated tokens */
  maxTokens?: number;
}

export interface OllamaClientOptions {
  /** Base URL, e.g. http://localhost:11434 */
  baseUrl: string;
  model: string;
  temperature?: number;
  timeoutMs?: number;
  maxTokens?: number;
  fetch?: typeof fetch;
  logger?: Logger;
}

/** Request body of POST /api/generate */
export interface GenerateRequest {
  model: string;
  prompt: string;
  temperature: number;
  stream: false;
  options: {
    temperature: number;
    num_predict: number;
    top_k: number;
    top_p: number;
  };
}

/** Subset of the /api/generate and /api/tags payloads we read */
interface OllamaPayload {
  response?: unknown;
  error?: unknown;
  models?: unknown;
}

/** Accept both a bare server URL and the full generate endpoint */
export function normalizeBaseUrl(url: string): string {
  return url.trim().replace(/\/+$/, '').replace(/\/api\/generate$/, '');
}

/** `llama2` names the same model as `llama2:latest` */
export function modelMatches(name: string, model: string): boolean {
  return name === model || name === `${model}:latest`;
}

/** AbortSignal.timeout rejects with a DOMException named TimeoutError */
function isAbortError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('name' in error)) return false;
  return error.name === 'TimeoutError' || error.name === 'AbortError';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** What the controller needs from a model backend */
export interface ModelClient {
  readonly baseUrl: string;
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
  listModels(): Promise<string[]>;
  isReachable(): Promise<boolean>;
}

/**
 * Thin client for the Ollama HTTP API.
 *
 * `generate` makes exactly one request: no retries, no caching. Retrying is
 * left to whoever calls it.
 */
export class OllamaClient implements ModelClient {
  readonly baseUrl: string;
  readonly model: string;
  private readonly temperature: number;
  private readonly timeoutMs: number;
  private readonly maxTokens: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(options: OllamaClientOptions) {
    this.baseUrl = normalizeBaseUrl(options.baseUrl);
    this.model = options.model;
    this.temperature = options.temperature ?? 0.7;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_GENERATE_TIMEOUT_MS;
    this.maxTokens = options.maxTokens ?? 256;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? silentLogger;
  }

  buildRequest(prompt: string, options: GenerateOptions = {}): GenerateRequest {
    const temperature = options.temperature ?? this.temperature;
    return {
      model: options.model ?? this.model,
      prompt,
      temperature,
      stream: false,
      options: {
        temperature,
        num_predict: options.maxTokens ?? this.maxTokens,
        top_k: 40,
        top_p: 0.9,
      },
    };
  }

  /** Generate a completion; rejects with TransportError, BackendError or EmptyOutputError */
  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const body = this.buildRequest(prompt, options);
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    this.logger.debug(`POST ${this.baseUrl}/api/generate (model: ${body.model}, timeout: ${timeoutMs}ms)`);

    const payload = await this.request('/api/generate', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    }, timeoutMs);

    if (payload.error !== undefined && payload.error !== null && payload.error !== '') {
      throw new BackendError(String(payload.error));
    }

    const text = typeof payload.response === 'string' ? payload.response : '';
    if (text.length === 0) {
      throw new EmptyOutputError();
    }
    return text;
  }

  /** Names of the models the server has pulled */
  async listModels(): Promise<string[]> {
    const payload = await this.request('/api/tags', { method: 'GET' }, PROBE_TIMEOUT_MS);
    if (!Array.isArray(payload.models)) return [];

    return payload.models
      .map(model => (isRecord(model) && typeof model.name === 'string' ? model.name : null))
      .filter((name): name is string => name !== null);
  }

  /** Cheap liveness probe with its own short timeout */
  async isReachable(): Promise<boolean> {
    try {
      const res = await this.fetchImpl(`${this.baseUrl}/api/tags`, {
        method: 'GET',
        signal: AbortSignal.timeout(PROBE_TIMEOUT_MS),
      });
      return res.ok;
    } catch (error) {
      this.logger.debug(`Liveness probe failed: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }
  }

  /** Whether `model` (or `model:latest`) has been pulled */
  async hasModel(model: string = this.model): Promise<boolean> {
    const models = await this.listModels();
    return models.some(name => modelMatches(name, model));
  }

  private async request(path: string, init: RequestInit, timeoutMs: number): Promise<OllamaPayload> {
    const url = `${this.baseUrl}${path}`;

    let res: Response;
    try {
      res = await this.fetchImpl(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
    } catch (error) {
      if (isAbortError(error)) {
        throw new TransportError('timeout', `No answer from ${url} within ${timeoutMs}ms. Ollama may be busy or unresponsive.`, { cause: error });
      }
      throw new TransportError('connection_failed', `Failed to connect to Ollama at ${url}. Start it with 'ollama serve'.`, { cause: error });
    }

    let text: string;
    try {
      text = await res.text();
    } catch (error) {
      if (isAbortError(error)) {
        throw new TransportError('timeout', `Response from ${url} did not finish within ${timeoutMs}ms.`, { cause: error });
      }
      throw new TransportError('connection_failed', `Connection to ${url} dropped while reading the response.`, { cause: error });
    }

    const payload = this.parsePayload(text);

    if (!res.ok) {
      const message = payload && typeof payload.error === 'string' && payload.error
        ? payload.error
        : `HTTP ${res.status} ${res.statusText}`.trim();
      throw new BackendError(message, res.status);
    }

    if (text.trim().length === 0) {
      throw new EmptyOutputError('Empty response body from Ollama');
    }
    if (!payload) {
      throw new BackendError(`Unreadable response from ${url}`, res.status);
    }
    return payload;
  }

  private parsePayload(text: string): OllamaPayload | null {
    if (text.trim().length === 0) return null;
    try {
      const parsed: unknown = JSON.parse(text);
      return isRecord(parsed) ? parsed : null;
    } catch {
      return null;
    }
  }
}

/**
 * HTTP client for the model-serving daemon.
 *
 * Covers the handful of endpoints the supervisor needs: version (health),
 * installed models and model pull. Uses the global fetch of Node 20.
 */
import { ModelPullError } from "../shared/errors.js";

const DEFAULT_HOST = "127.0.0.1";
const DEFAULT_PORT = 11434;

export interface InferenceClientOptions {
  /** Daemon address in OLLAMA_HOST form ("host", "host:port" or a URL). */
  host: string;
  /** Path probed by isHealthy(). Defaults to "/api/version". */
  healthPath?: string;
  /** Timeout for health probes and metadata calls. Defaults to 2000. */
  requestTimeoutMs?: number;
  /** Injected for tests. */
  fetch?: typeof fetch;
}

export interface PullResult {
  model: string;
  /** Final status reported by the daemon ("success"), or "present". */
  status: string;
  /** True when the model was already installed and no pull happened. */
  skipped: boolean;
}

/**
 * Turn an OLLAMA_HOST-style value into a base URL.
 *
 * Without a scheme the daemon's own port (11434) is the default; with an
 * explicit http:// or https:// the scheme's port is. "0.0.0.0" means
 * "listen everywhere" to the daemon, which a client reaches via loopback.
 */
export function resolveBaseUrl(host: string): string {
  const trimmed = host.trim();
  const hasScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed);

  let raw = trimmed;
  if (!hasScheme) {
    const [hostPart = "", ...rest] = trimmed.split("/");
    const withHost = hostPart.startsWith(":") ? `${DEFAULT_HOST}${hostPart}` : hostPart || DEFAULT_HOST;
    const withPort = /:\d+$/.test(withHost) ? withHost : `${withHost}:${DEFAULT_PORT}`;
    raw = `http://${[withPort, ...rest].join("/")}`;
  }

  const url = new URL(raw);
  if (url.hostname === "0.0.0.0") {
    url.hostname = DEFAULT_HOST;
  }

  return url.toString().replace(/\/+$/, "");
}

/** Whether `installed` satisfies a requested model name. */
export function modelMatches(requested: string, installed: string): boolean {
  if (requested === installed) return true;
  return !requested.includes(":") && installed === `${requested}:latest`;
}

export class InferenceClient {
  readonly baseUrl: string;
  private readonly healthPath: string;
  private readonly requestTimeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: InferenceClientOptions) {
    this.baseUrl = resolveBaseUrl(options.host);
    this.healthPath = options.healthPath ?? "/api/version";
    this.requestTimeoutMs = options.requestTimeoutMs ?? 2_000;
    this.fetchImpl = options.fetch ?? fetch;
  }

  /** Full URL of the health endpoint. */
  get healthUrl(): string {
    return `${this.baseUrl}${this.healthPath}`;
  }

  /** True when the health endpoint answers 2xx in time. Never throws. */
  async isHealthy(): Promise<boolean> {
    try {
      const res = await this.fetchImpl(this.healthUrl, {
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
      // Drain the body so the socket is released.
      await res.arrayBuffer();
      return res.ok;
    } catch {
      return false;
    }
  }

  async version(): Promise<string> {
    const body = await this.getJson("/api/version");
    if (!isRecord(body) || typeof body.version !== "string") {
      throw new Error(`Unexpected /api/version response from ${this.baseUrl}`);
    }
    return body.version;
  }

  async listModels(): Promise<string[]> {
    const body = await this.getJson("/api/tags");
    if (!isRecord(body) || !Array.isArray(body.models)) {
      throw new Error(`Unexpected /api/tags response from ${this.baseUrl}`);
    }
    const names: string[] = [];
    for (const entry of body.models) {
      if (isRecord(entry) && typeof entry.name === "string") {
        names.push(entry.name);
      }
    }
    return names;
  }

  async hasModel(name: string): Promise<boolean> {
    const installed = await this.listModels();
    return installed.some((model) => modelMatches(name, model));
  }

  /**
   * Pull a model and wait for the daemon to finish (non-streaming).
   * No request timeout: large models take minutes.
   *
   * @throws ModelPullError when the daemon rejects the pull.
   */
  async pullModel(name: string, signal?: AbortSignal): Promise<PullResult> {
    const res = await this.fetchImpl(`${this.baseUrl}/api/pull`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ model: name, stream: false }),
      signal,
    });

    const text = await res.text();
    const body = parseJson(text);

    if (isRecord(body) && typeof body.error === "string") {
      throw new ModelPullError(name, body.error);
    }
    if (!res.ok) {
      throw new ModelPullError(name, `HTTP ${res.status}${text ? `: ${text.trim()}` : ""}`);
    }

    const status = isRecord(body) && typeof body.status === "string" ? body.status : "success";
    if (status !== "success") {
      throw new ModelPullError(name, `daemon reported status "${status}"`);
    }
    return { model: name, status, skipped: false };
  }

  private async getJson(pathname: string): Promise<unknown> {
    const res = await this.fetchImpl(`${this.baseUrl}${pathname}`, {
      signal: AbortSignal.timeout(this.requestTimeoutMs),
    });
    const text = await res.text();
    if (!res.ok) {
      throw new Error(`GET ${pathname} failed with HTTP ${res.status}`);
    }
    return parseJson(text);
  }
}

function parseJson(text: string): unknown {
  if (!text.trim()) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

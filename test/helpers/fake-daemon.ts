/**
 * In-process stand-in for the model-serving daemon's HTTP API.
 *
 * Serves /api/version, /api/tags and /api/pull on 127.0.0.1 with an
 * ephemeral port, and records every request it receives.
 */
import http from "node:http";

export interface RecordedRequest {
  method: string;
  url: string;
  body: string;
}

export interface PullReply {
  status: number;
  body: string;
}

export interface FakeDaemonOptions {
  version?: string;
  models?: string[];
  /** Answer the health endpoint with 503 this many times first. */
  unhealthyTimes?: number;
  /** Delay every response by this long. */
  responseDelayMs?: number;
  /** Custom /api/pull reply; defaults to a successful pull that installs the model. */
  pull?: (model: string, attempt: number) => PullReply;
}

export class FakeDaemon {
  readonly requests: RecordedRequest[] = [];
  private readonly options: FakeDaemonOptions;
  private readonly models: string[];
  private readonly server: http.Server;
  private unhealthyLeft: number;
  private pullAttempts = 0;
  private port = 0;

  constructor(options: FakeDaemonOptions = {}) {
    this.options = options;
    this.models = [...(options.models ?? [])];
    this.unhealthyLeft = options.unhealthyTimes ?? 0;
    this.server = http.createServer((req, res) => {
      const chunks: Buffer[] = [];
      req.on("data", (chunk: Buffer) => chunks.push(chunk));
      req.on("end", () => {
        const body = Buffer.concat(chunks).toString("utf-8");
        this.requests.push({ method: req.method ?? "GET", url: req.url ?? "/", body });
        const reply = () => this.handle(req.method ?? "GET", req.url ?? "/", body, res);
        if (this.options.responseDelayMs) {
          setTimeout(reply, this.options.responseDelayMs);
        } else {
          reply();
        }
      });
    });
  }

  /** `host:port` in OLLAMA_HOST form. */
  get host(): string {
    return `127.0.0.1:${this.port}`;
  }

  get installedModels(): readonly string[] {
    return this.models;
  }

  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.once("error", reject);
      this.server.listen(0, "127.0.0.1", () => {
        const address = this.server.address();
        if (address === null || typeof address === "string") {
          reject(new Error("fake daemon has no TCP address"));
          return;
        }
        this.port = address.port;
        resolve();
      });
    });
  }

  close(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.closeAllConnections();
      this.server.close((error) => (error ? reject(error) : resolve()));
    });
  }

  private handle(method: string, url: string, body: string, res: http.ServerResponse): void {
    if (method === "GET" && url === "/api/version") {
      if (this.unhealthyLeft > 0) {
        this.unhealthyLeft--;
        send(res, 503, JSON.stringify({ error: "starting" }));
        return;
      }
      send(res, 200, JSON.stringify({ version: this.options.version ?? "0.1.0-test" }));
      return;
    }

    if (method === "GET" && url === "/api/tags") {
      send(res, 200, JSON.stringify({ models: this.models.map((name) => ({ name, size: 1 })) }));
      return;
    }

    if (method === "POST" && url === "/api/pull") {
      this.pullAttempts++;
      const model = modelOf(body);
      if (this.options.pull) {
        const reply = this.options.pull(model, this.pullAttempts);
        send(res, reply.status, reply.body);
        return;
      }
      this.models.push(model);
      send(res, 200, JSON.stringify({ status: "success" }));
      return;
    }

    send(res, 404, "404 page not found");
  }
}

function send(res: http.ServerResponse, status: number, body: string): void {
  res.writeHead(status, { "content-type": "application/json" });
  res.end(body);
}

function modelOf(body: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return "";
  }
  if (typeof parsed === "object" && parsed !== null && "model" in parsed && typeof parsed.model === "string") {
    return parsed.model;
  }
  return "";
}

/** A loopback port with nothing listening on it. */
export async function unusedPort(): Promise<number> {
  const server = http.createServer();
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  const port = address !== null && typeof address !== "string" ? address.port : 0;
  await new Promise<void>((resolve) => server.close(() => resolve()));
  return port;
}

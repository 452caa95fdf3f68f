import { EventEmitter } from "node:events";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { silentLogger, testConfig } from "../../test/helpers/config.js";
import { FakeDaemon } from "../../test/helpers/fake-daemon.js";
import type { SupervisorConfig } from "../config/index.js";
import { InferenceClient } from "../inference/client.js";
import { DaemonProcess } from "../process/daemon.js";
import { ModelPullError } from "../shared/errors.js";
import { prefetchModel } from "./prefetch.js";

describe("prefetchModel", () => {
  let tmpDir: string;
  let fake: FakeDaemon | undefined;
  const signals = new EventEmitter();

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "bannerwatch-prefetch-test-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fake?.close();
    fake = undefined;
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  async function setup(options: ConstructorParameters<typeof FakeDaemon>[0] = {}): Promise<{
    config: SupervisorConfig;
    daemon: FakeDaemon;
  }> {
    fake = new FakeDaemon(options);
    await fake.start();
    const config = testConfig(tmpDir);
    // Prefetch always polls; a long fixed delay would show up as a timeout.
    config.readiness.delayMs = 60_000;
    config.daemon.host = fake.host;
    return { config, daemon: fake };
  }

  it("pulls a missing model and stops the daemon", async () => {
    const { config, daemon } = await setup();
    const stop = vi.spyOn(DaemonProcess.prototype, "stop");

    const result = await prefetchModel(config, { logger: silentLogger(), signals });

    expect(result).toEqual({ model: "llama3", status: "success", skipped: false });
    expect(daemon.requests.map((r) => `${r.method} ${r.url}`)).toEqual([
      "GET /api/version",
      "GET /api/tags",
      "POST /api/pull",
    ]);
    expect(daemon.installedModels).toEqual(["llama3"]);
    expect(stop).toHaveBeenCalledTimes(1);
    await expect(stop.mock.results[0]?.value).resolves.not.toBeNull();
  });

  it("skips the pull when the model is already installed", async () => {
    const { config, daemon } = await setup({ models: ["llama3:latest"] });

    const result = await prefetchModel(config, { logger: silentLogger(), signals });

    expect(result).toEqual({ model: "llama3", status: "present", skipped: true });
    expect(daemon.requests.some((r) => r.url === "/api/pull")).toBe(false);
  });

  it("pulls anyway when forced", async () => {
    const { config, daemon } = await setup({ models: ["llama3:latest"] });

    const result = await prefetchModel(config, { logger: silentLogger(), signals, force: true });

    expect(result.skipped).toBe(false);
    expect(daemon.requests.map((r) => r.url)).toEqual(["/api/version", "/api/pull"]);
  });

  it("pulls the requested model instead of the configured one", async () => {
    const { config, daemon } = await setup();

    await prefetchModel(config, { logger: silentLogger(), signals, model: "phi3:mini" });

    const pull = daemon.requests.find((r) => r.url === "/api/pull");
    expect(pull?.body).toBe(JSON.stringify({ model: "phi3:mini", stream: false }));
  });

  it("does not retry a pull the daemon rejected, and still stops the daemon", async () => {
    const { config, daemon } = await setup({
      pull: () => ({ status: 500, body: JSON.stringify({ error: "pull model manifest: file does not exist" }) }),
    });
    const stop = vi.spyOn(DaemonProcess.prototype, "stop");

    const error = await prefetchModel(config, { logger: silentLogger(), signals, retryDelayMs: 1 }).catch(
      (err: unknown) => err,
    );

    expect(error).toBeInstanceOf(ModelPullError);
    expect(error instanceof ModelPullError && error.message).toBe(
      'Failed to pull model "llama3": pull model manifest: file does not exist',
    );
    expect(daemon.requests.filter((r) => r.url === "/api/pull")).toHaveLength(1);
    expect(stop).toHaveBeenCalledTimes(1);
  });

  it("retries transport failures", async () => {
    const { config, daemon } = await setup();
    let dropped = 0;
    const flaky: typeof fetch = async (input, init) => {
      if (init?.method === "POST" && dropped < 2) {
        dropped++;
        throw new TypeError("fetch failed");
      }
      return fetch(input, init);
    };
    const client = new InferenceClient({ host: daemon.host, fetch: flaky });

    const result = await prefetchModel(config, { logger: silentLogger(), signals, client, retryDelayMs: 1 });

    expect(result.status).toBe("success");
    expect(dropped).toBe(2);
    expect(daemon.requests.filter((r) => r.url === "/api/pull")).toHaveLength(1);
  });

  it("gives up after the last retry with a ModelPullError", async () => {
    const { config, daemon } = await setup();
    const broken: typeof fetch = async (input, init) => {
      if (init?.method === "POST") throw new TypeError("fetch failed");
      return fetch(input, init);
    };
    const client = new InferenceClient({ host: daemon.host, fetch: broken });

    const error = await prefetchModel(config, {
      logger: silentLogger(),
      signals,
      client,
      maxRetries: 1,
      retryDelayMs: 1,
    }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ModelPullError);
    expect(error instanceof ModelPullError && error.message).toBe('Failed to pull model "llama3": fetch failed');
    expect(error instanceof ModelPullError && error.exitCode).toBe(69);
  });
});

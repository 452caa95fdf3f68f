/**
 * End-to-end supervisor runs: a Node script stands in for the daemon, a
 * second one for the main workload.
 */
import { EventEmitter } from "node:events";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { defaultConfig } from "../../src/config/index.js";
import { Supervisor } from "../../src/supervisor/index.js";
import { isAlive, silentLogger, testConfig } from "../helpers/config.js";
import { FakeDaemon } from "../helpers/fake-daemon.js";
import { RECORD_ARGV, writeScript } from "../helpers/scripts.js";

describe("supervisor flow", () => {
  const dirs: string[] = [];

  function makeTmpDir(): string {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "bannerwatch-flow-"));
    dirs.push(dir);
    return dir;
  }

  let tmpDir: string;
  let signals: EventEmitter;

  beforeEach(() => {
    tmpDir = makeTmpDir();
    signals = new EventEmitter();
  });

  afterEach(() => {
    for (const dir of dirs.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  /** Workload env plus the argv recording script. */
  function workload(dir: string, exitCode = 0): { argv: string[]; env: NodeJS.ProcessEnv; argvOut: string } {
    const script = writeScript(dir, "main", RECORD_ARGV);
    const argvOut = path.join(dir, "argv.json");
    return {
      argv: [process.execPath, script],
      env: { ...process.env, ARGV_OUT: argvOut, EXIT_CODE: String(exitCode) },
      argvOut,
    };
  }

  it("hands `microsoft.com` to the workload as its only argument", async () => {
    const config = testConfig(tmpDir);
    const { argv, env, argvOut } = workload(tmpDir);

    const result = await new Supervisor(config, { logger: silentLogger(), signals, workloadEnv: env }).run([
      ...argv,
      "microsoft.com",
    ]);

    expect(result.exitCode).toBe(0);
    expect(JSON.parse(fs.readFileSync(argvOut, "utf-8"))).toEqual(["microsoft.com"]);
  });

  it("runs the workload with zero arguments when given none", async () => {
    const config = testConfig(tmpDir);
    const { argv, env, argvOut } = workload(tmpDir);

    await new Supervisor(config, { logger: silentLogger(), signals, workloadEnv: env }).run(argv);

    expect(JSON.parse(fs.readFileSync(argvOut, "utf-8"))).toEqual([]);
  });

  it.each([1, 3, 42])("exits with the workload's status %i", async (code) => {
    const config = testConfig(tmpDir);
    const { argv, env } = workload(tmpDir, code);

    const result = await new Supervisor(config, { logger: silentLogger(), signals, workloadEnv: env }).run(argv);

    expect(result.exitCode).toBe(code);
  });

  it("writes the daemon log and starts the workload after the warm-up delay", async () => {
    const config = testConfig(tmpDir);
    config.readiness.delayMs = 200;
    const { argv, env } = workload(tmpDir);

    const result = await new Supervisor(config, { logger: silentLogger(), signals, workloadEnv: env }).run(argv);

    expect(result.readiness.strategy).toBe("fixed-delay");
    expect(result.workload).not.toBeNull();
    expect(result.workload?.startedAt ?? 0).toBeGreaterThanOrEqual(result.daemon.startedAt + 200);

    const log = fs.readFileSync(path.join(tmpDir, "logs", "ollama.log"), "utf-8");
    expect(log).toContain("daemon stdout\n");
    expect(log).toContain("listening on 127.0.0.1:11434\n");
  });

  it("creates the output and log directories", async () => {
    const config = testConfig(tmpDir);
    const { argv, env } = workload(tmpDir);

    await new Supervisor(config, { logger: silentLogger(), signals, workloadEnv: env }).run(argv);

    expect(fs.statSync(path.join(tmpDir, "output")).isDirectory()).toBe(true);
    expect(fs.statSync(path.join(tmpDir, "logs")).isDirectory()).toBe(true);
  });

  it("stops the daemon once the workload has exited", async () => {
    const config = testConfig(tmpDir);
    const { argv, env } = workload(tmpDir);

    const result = await new Supervisor(config, { logger: silentLogger(), signals, workloadEnv: env }).run(argv);

    expect(result.daemon.pid).toBeGreaterThan(0);
    expect(isAlive(result.daemon.pid)).toBe(false);
  });

  it("keeps two independent runs apart", async () => {
    const otherDir = makeTmpDir();
    const runs = [tmpDir, otherDir].map((dir) => {
      const { argv, env } = workload(dir);
      return new Supervisor(testConfig(dir), { logger: silentLogger(), signals, workloadEnv: env }).run([
        ...argv,
        path.basename(dir),
      ]);
    });

    const [first, second] = await Promise.all(runs);
    expect(first?.daemon.pid).not.toBe(second?.daemon.pid);
    for (const dir of [tmpDir, otherDir]) {
      expect(fs.existsSync(path.join(dir, "logs", "ollama.log"))).toBe(true);
      expect(JSON.parse(fs.readFileSync(path.join(dir, "argv.json"), "utf-8"))).toEqual([path.basename(dir)]);
    }
  });

  it("keeps the warm-up interval as a floor under the default poll strategy", async () => {
    const fake = new FakeDaemon();
    await fake.start();
    try {
      const config = testConfig(tmpDir);
      config.readiness.strategy = defaultConfig(tmpDir).readiness.strategy;
      config.readiness.delayMs = 400;
      config.daemon.host = fake.host;
      const { argv, env, argvOut } = workload(tmpDir);

      const result = await new Supervisor(config, { logger: silentLogger(), signals, workloadEnv: env }).run([
        ...argv,
        "microsoft.com",
      ]);

      expect(result.readiness).toMatchObject({ strategy: "poll", attempts: 1 });
      expect(result.workload?.startedAt ?? 0).toBeGreaterThanOrEqual(result.daemon.startedAt + 400);
      expect(JSON.parse(fs.readFileSync(argvOut, "utf-8"))).toEqual(["microsoft.com"]);
    } finally {
      await fake.close();
    }
  });

  it("polls the daemon's health endpoint before the hand-off", async () => {
    const fake = new FakeDaemon({ unhealthyTimes: 2 });
    await fake.start();
    try {
      const config = testConfig(tmpDir);
      config.readiness.strategy = "poll";
      config.daemon.host = fake.host;
      const { argv, env, argvOut } = workload(tmpDir);

      const result = await new Supervisor(config, { logger: silentLogger(), signals, workloadEnv: env }).run([
        ...argv,
        "example.org",
      ]);

      expect(result.readiness).toMatchObject({ strategy: "poll", attempts: 3 });
      expect(fake.requests.map((r) => r.url)).toEqual(["/api/version", "/api/version", "/api/version"]);
      expect(JSON.parse(fs.readFileSync(argvOut, "utf-8"))).toEqual(["example.org"]);
    } finally {
      await fake.close();
    }
  });
});

import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  DEFAULT_CONFIG,
  WatchdogConfigError,
  cooldownMs,
  isSupportedPlatform,
  loadConfig,
  resolveConfig,
} from "../config.js";

describe("resolveConfig", () => {
  it("returns defaults when nothing is given", () => {
    assert.deepEqual(resolveConfig(), DEFAULT_CONFIG);
    assert.equal(DEFAULT_CONFIG.checkFrequencyMinutes, 10);
  });

  it("applies overrides", () => {
    const config = resolveConfig({ checkFrequencyMinutes: 2, heartbeatFolder: "/var/log/nw" });
    assert.equal(config.checkFrequencyMinutes, 2);
    assert.equal(config.heartbeatFolder, "/var/log/nw");
    assert.equal(config.confirmationDelaySeconds, 30);
  });

  it("rejects a negative check frequency", () => {
    assert.throws(
      () => resolveConfig({ checkFrequencyMinutes: -1 }),
      (err: unknown) =>
        err instanceof WatchdogConfigError && err.message.includes("/checkFrequencyMinutes"),
    );
  });

  it("accepts zero frequency (monitoring disabled)", () => {
    assert.equal(resolveConfig({ checkFrequencyMinutes: 0 }).checkFrequencyMinutes, 0);
  });
});

describe("cooldownMs", () => {
  it("is the larger of interval and confirmation delay", () => {
    assert.equal(cooldownMs(resolveConfig({ checkFrequencyMinutes: 5, confirmationDelaySeconds: 30 })), 300_000);
    assert.equal(cooldownMs(resolveConfig({ checkFrequencyMinutes: 1, confirmationDelaySeconds: 90 })), 90_000);
  });
});

describe("isSupportedPlatform", () => {
  it("accepts linux and darwin by default", () => {
    assert.equal(isSupportedPlatform(DEFAULT_CONFIG, "linux"), true);
    assert.equal(isSupportedPlatform(DEFAULT_CONFIG, "darwin"), true);
    assert.equal(isSupportedPlatform(DEFAULT_CONFIG, "win32"), false);
  });
});

describe("loadConfig", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), "netwatch-config-test-"));
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it("reads the netwatch section and lets overrides win", () => {
    const path = join(tmpDir, "settings.json");
    writeFileSync(
      path,
      JSON.stringify({ netwatch: { checkFrequencyMinutes: 3, confirmationDelaySeconds: 45 } }),
    );
    const config = loadConfig(path, { confirmationDelaySeconds: 10 });
    assert.equal(config.checkFrequencyMinutes, 3);
    assert.equal(config.confirmationDelaySeconds, 10);
  });

  it("falls back to defaults for a missing file", () => {
    assert.deepEqual(loadConfig(join(tmpDir, "nope.json")), DEFAULT_CONFIG);
  });

  it("ignores a corrupt file", () => {
    const path = join(tmpDir, "settings.json");
    writeFileSync(path, "{not json");
    assert.deepEqual(loadConfig(path), DEFAULT_CONFIG);
  });

  it("ignores a section with wrongly typed fields", () => {
    const path = join(tmpDir, "settings.json");
    writeFileSync(path, JSON.stringify({ netwatch: { checkFrequencyMinutes: "often" } }));
    assert.deepEqual(loadConfig(path), DEFAULT_CONFIG);
  });
});

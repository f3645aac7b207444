import { strict as assert } from "assert";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { editConfigFile, readConfigFile } from "./configFile";
import { eventStreamUrlFor, normalizeConfigValue } from "./defaults";
import { resolveConfig } from "./resolve";

const KEY = "0x" + "ab".repeat(32);

describe("resolveConfig", () => {
  it("should fall back to the local server", () => {
    const { config, sources } = resolveConfig({ file: {}, env: {}, flags: {} });
    assert.deepEqual(config, {
      serverUrl: "http://localhost:8080",
      wsUrl: "ws://localhost:8080",
      privateKey: "",
    });
    assert.deepEqual(sources, { serverUrl: "default", wsUrl: "default", privateKey: "default" });
  });

  it("should layer file, environment and flags", () => {
    const { config, sources } = resolveConfig({
      file: { serverUrl: "https://arena.test/", privateKey: KEY },
      env: { RPS_SERVER_URL: "http://10.0.0.2:9000" },
      flags: { privateKey: "0x" + "CD".repeat(32) },
    });
    assert.equal(config.serverUrl, "http://10.0.0.2:9000");
    assert.equal(config.wsUrl, "ws://10.0.0.2:9000");
    assert.equal(config.privateKey, "0x" + "cd".repeat(32));
    assert.deepEqual(sources, { serverUrl: "env", wsUrl: "default", privateKey: "flag" });
  });

  it("should keep an explicit event stream URL", () => {
    const { config } = resolveConfig({
      file: { serverUrl: "https://arena.test", wsUrl: "wss://events.arena.test/" },
      env: {},
      flags: {},
    });
    assert.equal(config.wsUrl, "wss://events.arena.test");
  });

  it("should ignore empty values", () => {
    const { sources } = resolveConfig({ file: {}, env: { RPS_PRIVATE_KEY: "" }, flags: {} });
    assert.equal(sources.privateKey, "default");
  });

  it("should name the layer that holds a bad value", () => {
    assert.throws(
      () => resolveConfig({ file: {}, env: { RPS_SERVER_URL: "ftp://arena.test" }, flags: {} }),
      /^Error: serverUrl must use http or https \(from env\)$/,
    );
  });
});

describe("normalizeConfigValue", () => {
  it("should trim URLs and lower-case keys", () => {
    assert.equal(normalizeConfigValue("serverUrl", " http://arena.test/api/ "), "http://arena.test/api");
    assert.equal(normalizeConfigValue("privateKey", "0x" + "AB".repeat(32)), KEY);
  });

  it("should reject unusable values", () => {
    assert.throws(() => normalizeConfigValue("serverUrl", "arena"), /serverUrl must be a URL/);
    assert.throws(() => normalizeConfigValue("wsUrl", "http://arena.test"), /wsUrl must use ws or wss/);
    assert.throws(() => normalizeConfigValue("privateKey", "0x1234"), /privateKey must be a 0x-prefixed 32-byte hex key/);
  });

  it("should derive secure event streams from secure servers", () => {
    assert.equal(eventStreamUrlFor("https://arena.test"), "wss://arena.test");
  });
});

describe("config file", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "rps-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should store edits and skip unknown keys", async () => {
    const path = join(dir, "nested", "config.json");
    assert.deepEqual(await readConfigFile(path), {});

    await editConfigFile((data) => {
      data.serverUrl = "http://arena.test";
    }, path);
    await writeFile(path, JSON.stringify({ serverUrl: "http://arena.test", theme: "dark" }));

    assert.deepEqual(await readConfigFile(path), { serverUrl: "http://arena.test" });
  });

  it("should refuse a file that is not JSON", async () => {
    const path = join(dir, "config.json");
    await writeFile(path, "{ nope");
    await assert.rejects(readConfigFile(path), /is not valid JSON/);
  });
});

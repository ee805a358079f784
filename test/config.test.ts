import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { ConfigStore, loadConfig, parseConfig, type CaretakerConfigInput } from "../src/lib/config";
import { CliError } from "../src/lib/errors";
import { INSTANCE_ID } from "./fakes";

function minimalConfig(): CaretakerConfigInput {
  return {
    instance: { id: INSTANCE_ID },
    chat: {
      commandChannel: "server-commands",
      adminRole: "server-admin",
      userRole: "player",
      ownerId: "100000000000000000"
    },
    workloads: {
      alpha: {
        port: 25565,
        commands: { start: ["alpha-start"], stop: ["alpha-stop"], ping: ["alpha-ping"], playerCount: ["alpha-players"] }
      }
    }
  };
}

function tempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "caretaker-config-"));
}

test("parseConfig fills in defaults", () => {
  const config = parseConfig(minimalConfig());

  assert.equal(config.logLevel, "info");
  assert.equal(config.instance.region, "us-east-1");
  assert.deepEqual(config.retry, {
    sendAttempts: 20,
    sendDelayMs: 5_000,
    pollAttempts: 40,
    pollDelayMs: 1_000,
    commandAttempts: 40,
    commandDelayMs: 15_000
  });
  assert.deepEqual(config.stateWait, { intervalMs: 15_000, timeoutMs: 600_000 });
  assert.deepEqual(config.idle, { checkIntervalMs: 300_000, shutdownAfterMs: 1_800_000 });
  assert.equal(config.chat.prefix, "!");
  assert.equal(config.chat.timezone, "UTC");
  assert.deepEqual(config.chat.colors, { default: 0xf28c28, warning: 0xffcc00, error: 0xd62828 });
});

test("parseConfig accepts colors as hex strings", () => {
  const input = minimalConfig();
  input.chat.colors = { default: "#00ff00", warning: "0x0000ff", error: 16711680 };

  assert.deepEqual(parseConfig(input).chat.colors, { default: 0x00ff00, warning: 0x0000ff, error: 0xff0000 });
});

test("parseConfig lists every problem by path", () => {
  const input = minimalConfig();
  input.instance.id = "web-server-1";

  assert.throws(() => parseConfig(input, "config.json"), (error: unknown) => {
    assert.ok(error instanceof CliError);
    assert.equal(error.kind, "validation");
    assert.equal(error.message, "Invalid configuration in config.json");
    assert.equal(error.detail, "  instance.id: Expected an EC2 instance id such as i-0123456789abcdef0");
    return true;
  });
});

test("parseConfig rejects workload names that cannot be typed in chat", () => {
  const input = minimalConfig();
  const alpha = input.workloads.alpha;
  input.workloads = { "bad/name": alpha };

  assert.throws(() => parseConfig(input), (error: unknown) => {
    assert.ok(error instanceof CliError);
    assert.equal(
      error.detail,
      "  workloads.bad/name: Workload names must start with a letter or number and contain only letters, numbers, spaces, hyphens, and underscores."
    );
    return true;
  });
});

test("loadConfig reports a missing file with a hint", async () => {
  const configPath = path.join(tempDir(), "missing.json");

  await assert.rejects(loadConfig(configPath), (error: unknown) => {
    assert.ok(error instanceof CliError);
    assert.equal(error.kind, "not_found");
    assert.equal(error.message, `Config file not found: ${configPath}`);
    assert.equal(error.hint, "Copy config/caretaker.example.json there, or pass --config <path>.");
    return true;
  });
});

test("loadConfig reports malformed JSON", async () => {
  const configPath = path.join(tempDir(), "config.json");
  fs.writeFileSync(configPath, "{ not json", "utf8");

  await assert.rejects(loadConfig(configPath), (error: unknown) => {
    assert.ok(error instanceof CliError);
    assert.equal(error.kind, "validation");
    assert.equal(error.message, `Config file is not valid JSON: ${configPath}`);
    return true;
  });
});

test("ConfigStore.update validates and writes the new configuration", async () => {
  const configPath = path.join(tempDir(), "config.json");
  fs.writeFileSync(configPath, JSON.stringify(minimalConfig()), "utf8");
  const store = await ConfigStore.open(configPath);

  const next = await store.update((config) => ({ ...config, idle: { checkIntervalMs: 60_000, shutdownAfterMs: 600_000 } }));

  assert.deepEqual(next.idle, { checkIntervalMs: 60_000, shutdownAfterMs: 600_000 });
  assert.deepEqual(store.get().idle, next.idle);
  const reloaded = await loadConfig(configPath);
  assert.deepEqual(reloaded, next);
});

test("ConfigStore.update leaves the file alone when the result is invalid", async () => {
  const configPath = path.join(tempDir(), "config.json");
  const original = JSON.stringify(minimalConfig());
  fs.writeFileSync(configPath, original, "utf8");
  const store = await ConfigStore.open(configPath);

  await assert.rejects(
    store.update((config) => ({ ...config, idle: { checkIntervalMs: 10, shutdownAfterMs: 600_000 } })),
    CliError
  );
  assert.equal(fs.readFileSync(configPath, "utf8"), original);
  assert.equal(store.get().idle.checkIntervalMs, 300_000);
});

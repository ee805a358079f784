import test from "node:test";
import assert from "node:assert/strict";
import { IdleMonitor, type IdleCheckResult } from "../src/lib/idle-monitor";
import { createHarness, waitFor } from "./fakes";

test("the monitor runs checks until one asks it to stop", async () => {
  let checks = 0;
  const monitor = new IdleMonitor({
    intervalMs: 2,
    check: async () => {
      checks += 1;
      return checks >= 3 ? "stop" : "continue";
    },
    onError: async () => "stop"
  });

  monitor.start();
  assert.equal(monitor.active, true);
  await waitFor(() => !monitor.active);

  assert.equal(checks, 3);
});

test("stop cancels the next check", async () => {
  let checks = 0;
  const monitor = new IdleMonitor({
    intervalMs: 2,
    check: async () => {
      checks += 1;
      return "continue";
    },
    onError: async () => "stop"
  });

  monitor.start();
  await waitFor(() => checks >= 1);
  monitor.stop();
  const seen = checks;
  await new Promise((resolve) => setTimeout(resolve, 20));

  assert.equal(monitor.active, false);
  assert.equal(checks, seen);
});

test("a failed check is handed to onError, which decides whether to go on", async () => {
  const decisions: IdleCheckResult[] = ["continue", "stop"];
  const errors: unknown[] = [];
  const monitor = new IdleMonitor({
    intervalMs: 2,
    check: async () => {
      throw new Error("describe failed");
    },
    onError: async (error) => {
      errors.push(error);
      return decisions.shift() ?? "stop";
    }
  });

  monitor.start();
  await waitFor(() => !monitor.active);

  assert.equal(errors.length, 2);
});

test("a throwing error handler stops the monitor", async () => {
  const monitor = new IdleMonitor({
    intervalMs: 2,
    check: async () => {
      throw new Error("describe failed");
    },
    onError: async () => {
      throw new Error("notifier down");
    }
  });

  monitor.start();
  await waitFor(() => !monitor.active);
  assert.equal(monitor.active, false);
});

test("the orchestrator's monitor shuts down an empty workload exactly once", async () => {
  const { orchestrator, instanceApi, notifier } = createHarness({ idle: { checkIntervalMs: 5, shutdownAfterMs: 10 } });
  try {
    await orchestrator.start("alpha");
    await waitFor(() => !orchestrator.idleMonitorRunning);

    assert.equal(instanceApi.stopCalls, 1);
    assert.equal(instanceApi.state, "stopped");
    assert.equal(orchestrator.activeWorkload, undefined);
    assert.equal(notifier.announcements.length, 2);
  } finally {
    orchestrator.dispose();
  }
});

test("the orchestrator's monitor warns the operator and stops when the instance vanished", async () => {
  const { orchestrator, instanceApi, notifier } = createHarness({ idle: { checkIntervalMs: 5, shutdownAfterMs: 60_000 } });
  try {
    await orchestrator.start("alpha");
    instanceApi.state = "stopped";
    await waitFor(() => !orchestrator.idleMonitorRunning);

    assert.deepEqual(notifier.warnings, ["Idle monitor found the instance stopped while 'alpha' is recorded as active"]);
    assert.equal(instanceApi.stopCalls, 0);
  } finally {
    orchestrator.dispose();
  }
});

test("the orchestrator's monitor keeps going after an unexpected error", async () => {
  const { orchestrator, instanceApi, notifier } = createHarness({ idle: { checkIntervalMs: 5, shutdownAfterMs: 60_000 } });
  try {
    await orchestrator.start("alpha");
    instanceApi.describeError = new Error("throttled");
    await waitFor(() => notifier.errors.length >= 2);

    assert.equal(orchestrator.idleMonitorRunning, true);
    assert.deepEqual(notifier.errors.slice(0, 2), [
      "Unhandled error in the idle monitor",
      "Unhandled error in the idle monitor"
    ]);
  } finally {
    orchestrator.dispose();
  }
});

import test from "node:test";
import assert from "node:assert/strict";
import { isPreconditionError } from "../src/lib/errors";
import { OperationGate } from "../src/lib/gate";

test("a second caller is turned away while the gate is held", async () => {
  const gate = new OperationGate();
  let release: () => void = () => undefined;
  const held = gate.run("start", () => new Promise<string>((resolve) => {
    release = () => resolve("started");
  }));

  assert.equal(gate.busy, true);
  assert.equal(gate.currentOperation, "start");
  await assert.rejects(gate.run("stop", async () => "stopped"), (error: unknown) => {
    assert.ok(isPreconditionError(error, "operation_in_progress"));
    assert.equal(error.message, "Another operation (start) is in progress. Try again later.");
    return true;
  });

  release();
  assert.equal(await held, "started");
  assert.equal(gate.busy, false);
  assert.equal(await gate.run("stop", async () => "stopped"), "stopped");
});

test("the gate is released when the task fails", async () => {
  const gate = new OperationGate();

  await assert.rejects(gate.run("start", async () => {
    throw new Error("describe failed");
  }), { message: "describe failed" });

  assert.equal(gate.busy, false);
  assert.equal(gate.currentOperation, null);
});

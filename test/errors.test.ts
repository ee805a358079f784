import test from "node:test";
import assert from "node:assert/strict";
import {
  CliError,
  alreadyInTargetState,
  isPreconditionError,
  operationInProgress,
  renderCliError,
  toCliError
} from "../src/lib/errors";
import { InstanceStateTimeoutError } from "../src/lib/instance-control";
import { CommandExceededWaitTimeError } from "../src/lib/remote-command";
import { requireWorkload } from "../src/lib/workloads";
import { INSTANCE_ID, testWorkloads } from "./fakes";

test("toCliError preserves existing CliError", () => {
  const input = new CliError({
    kind: "validation",
    message: "bad input",
    hint: "try again"
  });
  const output = toCliError(input);
  assert.equal(output, input);
});

test("toCliError maps an unknown workload to not_found with the configured names", () => {
  let refusal: unknown;
  try {
    requireWorkload(testWorkloads(), "gamma");
  } catch (error) {
    refusal = error;
  }

  const mapped = toCliError(refusal);
  assert.equal(mapped.kind, "not_found");
  assert.equal(mapped.message, "Workload 'gamma' is not configured. Available workloads: alpha, beta");
  assert.equal(mapped.hint, "Configured workloads: alpha, beta");
});

test("toCliError maps other refusals to validation errors", () => {
  const mapped = toCliError(alreadyInTargetState("running"));
  assert.equal(mapped.kind, "validation");
  assert.equal(mapped.message, "The instance is already running.");
  assert.equal(mapped.hint, undefined);
});

test("toCliError lists the commands of a remote command failure", () => {
  const mapped = toCliError(new CommandExceededWaitTimeError(["systemctl start alpha", "echo ok"], 40));
  assert.equal(mapped.kind, "dependency");
  assert.equal(mapped.message, "Command failed to finish executing within 40 status queries");
  assert.equal(mapped.detail, "commands:\n  systemctl start alpha\n  echo ok");
});

test("toCliError points instance API failures at the config file", () => {
  const mapped = toCliError(new InstanceStateTimeoutError(INSTANCE_ID, "running", "pending", 40));
  assert.equal(mapped.kind, "dependency");
  assert.equal(mapped.message, `Instance ${INSTANCE_ID} did not become running after 40 checks (last state: pending)`);
  assert.equal(mapped.hint, "Check the instance id and region in the config file.");
});

test("toCliError wraps non-Error values", () => {
  const mapped = toCliError("socket hang up");
  assert.equal(mapped.kind, "runtime");
  assert.equal(mapped.message, "socket hang up");
});

test("isPreconditionError narrows by code", () => {
  const busy = operationInProgress("stop");
  assert.equal(isPreconditionError(busy), true);
  assert.equal(isPreconditionError(busy, "operation_in_progress"), true);
  assert.equal(isPreconditionError(busy, "invalid_state"), false);
  assert.equal(isPreconditionError(new Error("busy")), false);
});

test("renderCliError includes hint and detail on separate lines", () => {
  const err = new CliError({
    kind: "dependency",
    message: "instance unreachable",
    hint: "check the region",
    detail: "DescribeInstances timed out"
  });
  const rendered = renderCliError(err);
  assert.equal(rendered, "instance unreachable\nHint: check the region\nDescribeInstances timed out");
});

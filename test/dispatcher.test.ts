import test from "node:test";
import assert from "node:assert/strict";
import { ChatCommandDispatcher, parseCommand, type ChatRequest } from "../src/bot/dispatcher";
import type { ChatReply } from "../src/bot/messages";
import { createHarness, type Harness, type HarnessOptions } from "./fakes";

interface ChatOptions {
  roles?: string[];
  channel?: string;
  inGuild?: boolean;
}

interface ChatProbe {
  request: ChatRequest;
  replies: ChatReply[];
  deleted: ChatReply[];
}

function chat(content: string, options: ChatOptions = {}): ChatProbe {
  const replies: ChatReply[] = [];
  const deleted: ChatReply[] = [];
  const request: ChatRequest = {
    content,
    inGuild: options.inGuild ?? true,
    channelName: options.channel ?? "server-commands",
    authorRoles: options.roles ?? ["player"],
    reply: async (reply) => {
      replies.push(reply);
      return {
        delete: async () => {
          deleted.push(reply);
        }
      };
    }
  };
  return { request, replies, deleted };
}

function setup(options: HarnessOptions = {}): Harness & { dispatcher: ChatCommandDispatcher } {
  const harness = createHarness(options);
  const dispatcher = new ChatCommandDispatcher({
    orchestrator: harness.orchestrator,
    settings: {
      prefix: "!",
      commandChannel: "server-commands",
      adminRole: "server-admin",
      userRole: "player",
      timezone: "UTC"
    },
    workloadNames: ["alpha", "beta"],
    notifier: harness.notifier
  });
  return { ...harness, dispatcher };
}

const admin = { roles: ["server-admin"] };

test("parseCommand reads the subcommand case-insensitively and keeps the workload as typed", () => {
  assert.deepEqual(parseCommand("!server START alpha", "!"), { kind: "server", subcommand: "start", argument: "alpha" });
  assert.deepEqual(parseCommand("!server change Team Fortress", "!"), {
    kind: "server",
    subcommand: "change",
    argument: "Team Fortress"
  });
  assert.deepEqual(parseCommand("!server", "!"), { kind: "server", subcommand: undefined, argument: "" });
  assert.deepEqual(parseCommand("!help", "!"), { kind: "help" });
  assert.equal(parseCommand("!server reboot", "!"), null);
  assert.equal(parseCommand("!servers", "!"), null);
  assert.equal(parseCommand("server start alpha", "!"), null);
});

test("messages that are not commands are ignored", async () => {
  const { dispatcher } = setup();
  const probe = chat("anyone up for a game?");

  assert.equal(await dispatcher.handle(probe.request), false);
  assert.deepEqual(probe.replies, []);
});

test("private messages are ignored", async () => {
  const { dispatcher, instanceApi } = setup();
  const probe = chat("!server start alpha", { inGuild: false, channel: undefined });

  assert.equal(await dispatcher.handle(probe.request), false);
  assert.deepEqual(probe.replies, []);
  assert.equal(instanceApi.startCalls, 0);
});

test("members without a server role are told which roles they need", async () => {
  const { dispatcher } = setup();
  const probe = chat("!server start alpha", { roles: ["visitor"] });

  assert.equal(await dispatcher.handle(probe.request), true);
  assert.deepEqual(probe.replies, [{
    description: "You must have one of the following roles to run `!server start`: server-admin, player",
    tone: "error"
  }]);
});

test("maintenance commands need the admin role", async () => {
  const { dispatcher, orchestrator } = setup();
  const probe = chat("!server disable");

  await dispatcher.handle(probe.request);
  assert.deepEqual(probe.replies, [{
    description: "You must have one of the following roles to run `!server disable`: server-admin",
    tone: "error"
  }]);
  assert.equal(orchestrator.maintenance, false);
});

test("lifecycle commands outside the command channel are ignored", async () => {
  const { dispatcher, instanceApi } = setup();
  const probe = chat("!server start alpha", { channel: "general" });

  assert.equal(await dispatcher.handle(probe.request), false);
  assert.deepEqual(probe.replies, []);
  assert.equal(instanceApi.startCalls, 0);
});

test("a missing workload gets a usage reply with an example", async () => {
  const { dispatcher } = setup();
  const probe = chat("!server start");

  await dispatcher.handle(probe.request);
  assert.deepEqual(probe.replies, [{
    description: "The workload to start is missing. Example: `!server start alpha`",
    tone: "error"
  }]);
});

test("start posts progress, removes it, and replies with the address", async () => {
  const { dispatcher, orchestrator } = setup();
  const probe = chat("!server start alpha");
  try {
    assert.equal(await dispatcher.handle(probe.request), true);

    assert.deepEqual(probe.replies, [
      { description: "Starting the server..." },
      {
        description: "The server is now running alpha. Connect to `203.0.113.10:25565` to join the fun!",
        tone: "default"
      }
    ]);
    assert.deepEqual(probe.deleted, [{ description: "Starting the server..." }]);
    assert.equal(orchestrator.activeWorkload, "alpha");
  } finally {
    orchestrator.dispose();
  }
});

test("a progress message that cannot be posted does not stop the operation", async () => {
  const { dispatcher, orchestrator } = setup();
  const probe = chat("!server start alpha");
  const post = probe.request.reply;
  probe.request.reply = async (reply) => {
    if (reply.description === "Starting the server...") {
      throw new Error("Missing Permissions");
    }
    return post(reply);
  };
  try {
    assert.equal(await dispatcher.handle(probe.request), true);

    assert.deepEqual(probe.replies, [{
      description: "The server is now running alpha. Connect to `203.0.113.10:25565` to join the fun!",
      tone: "default"
    }]);
    assert.deepEqual(probe.deleted, []);
    assert.equal(orchestrator.activeWorkload, "alpha");
  } finally {
    orchestrator.dispose();
  }
});

test("refusals are explained without a progress message", async () => {
  const { dispatcher } = setup({ initialState: "running" });
  const probe = chat("!server start alpha");

  await dispatcher.handle(probe.request);
  assert.deepEqual(probe.replies, [{ description: "The server is already running.", tone: "error" }]);
  assert.deepEqual(probe.deleted, []);
});

test("an unknown workload lists the configured ones", async () => {
  const { dispatcher } = setup();
  const probe = chat("!server start gamma");

  await dispatcher.handle(probe.request);
  assert.deepEqual(probe.replies, [{
    description: "The workload _gamma_ isn't set up to run on the server. Available workloads: alpha, beta",
    tone: "error"
  }]);
});

test("changing a stopped server is refused", async () => {
  const { dispatcher } = setup();
  const probe = chat("!server change beta");

  await dispatcher.handle(probe.request);
  assert.deepEqual(probe.replies, [{
    description: "The workload cannot be changed unless the server is running.",
    tone: "error"
  }]);
});

test("maintenance mode blocks members until an admin lifts it", async () => {
  const { dispatcher } = setup();

  const disable = chat("!server disable", { ...admin, channel: "admin-lounge" });
  await dispatcher.handle(disable.request);
  assert.deepEqual(disable.replies, [{
    description: "Server commands have been temporarily disabled to allow for server maintenance."
  }]);

  const start = chat("!server start alpha");
  await dispatcher.handle(start.request);
  assert.deepEqual(start.replies, [{
    description: "Unable to run `!server start` as the server is currently undergoing maintenance. Please try again later.",
    tone: "error"
  }]);

  const enable = chat("!server enable", admin);
  await dispatcher.handle(enable.request);
  const again = chat("!server enable", admin);
  await dispatcher.handle(again.request);
  assert.deepEqual(enable.replies, [{ description: "Server maintenance has finished and the server is ready for games again!" }]);
  assert.deepEqual(again.replies, [{ description: "Server commands aren't currently disabled for maintenance." }]);
});

test("members get a one-line status", async () => {
  const { dispatcher, orchestrator } = setup({
    script: (commands) => (commands[0] === "alpha-players" ? { stdout: "1" } : {})
  });
  try {
    await orchestrator.start("alpha");
    const probe = chat("!server status");

    await dispatcher.handle(probe.request);
    assert.deepEqual(probe.replies, [{
      description: "The server is currently running alpha and there is 1 person playing. Connect to `203.0.113.10:25565` to join the fun!"
    }]);
  } finally {
    orchestrator.dispose();
  }
});

test("admins get a detailed status from any channel, even during maintenance", async () => {
  const { dispatcher, orchestrator } = setup();
  orchestrator.setMaintenance(true);
  const probe = chat("!server status", { ...admin, channel: "general" });

  assert.equal(await dispatcher.handle(probe.request), true);
  assert.equal(probe.replies.length, 1);
  assert.equal(probe.replies[0]?.title, "Status of ami-test");
  assert.deepEqual(probe.replies[0]?.fields?.[0], { name: "State", value: ":red_circle: Stopped" });
});

test("unexpected failures get a generic reply and are reported to the owner", async () => {
  const { dispatcher, instanceApi, notifier } = setup({ initialState: "running" });
  instanceApi.describeError = new Error("connect ETIMEDOUT");
  const probe = chat("!server stop");

  await dispatcher.handle(probe.request);
  assert.deepEqual(probe.replies, [{
    description: "An unexpected error was encountered while trying to run `!server stop`. The owner has been notified.",
    tone: "error"
  }]);
  assert.deepEqual(notifier.errors, ["Unhandled error in `!server stop`: connect ETIMEDOUT"]);
});

test("help lists the commands", async () => {
  const { dispatcher } = setup();
  const probe = chat("!help", { roles: [] });

  assert.equal(await dispatcher.handle(probe.request), true);
  assert.equal(probe.replies[0]?.title, "Server commands");
});

import test from "node:test";
import assert from "node:assert/strict";
import type { Command, CommandInvocation } from "../commands.js";
import { Dispatcher, type DispatcherOptions } from "../dispatcher.js";
import {
  CommandInvokeError,
  CommandNotFoundError,
  CommandOnCooldownError,
  DisabledCommandError,
  MissingAnyRoleError,
  MissingRequiredArgumentError,
  NotOwnerError,
  type CommandError,
} from "../errors.js";
import type { BotExtension } from "../extensions.js";
import { OWNER_ID, actor, flush, messageEvent } from "./helpers.js";

function makeDispatcher(overrides: Partial<DispatcherOptions> = {}): Dispatcher {
  return new Dispatcher({ prefix: "devt!", caseInsensitive: true, ownerIds: [OWNER_ID], ...overrides });
}

function replyCommand(name: string, reply: string, extra: Partial<Command> = {}): Command {
  return {
    name,
    description: `${name} command`,
    async execute(invocation) {
      await invocation.reply(reply);
    },
    ...extra,
  };
}

function collectErrors(dispatcher: Dispatcher): CommandError[] {
  const errors: CommandError[] = [];
  dispatcher.registerExtension({
    name: "errors",
    listeners: {
      commandError({ error }) {
        errors.push(error);
      },
    },
  });
  return errors;
}

test("commands from two extensions are both callable", async () => {
  const dispatcher = makeDispatcher();
  dispatcher.registerExtension({ name: "dice", commands: [replyCommand("roll", "rolled")] });
  dispatcher.registerExtension({ name: "ops", commands: [replyCommand("ops", "ops night")] });

  const roll = messageEvent("devt!roll");
  const ops = messageEvent("devt!ops");
  await dispatcher.dispatch(roll.event);
  await dispatcher.dispatch(ops.event);

  assert.deepEqual(roll.replies, ["rolled"]);
  assert.deepEqual(ops.replies, ["ops night"]);
});

test("the first extension to register a command name keeps it", async () => {
  const dispatcher = makeDispatcher();
  assert.deepEqual(dispatcher.registerExtension({ name: "first", commands: [replyCommand("roll", "first")] }), []);
  assert.deepEqual(
    dispatcher.registerExtension({ name: "second", commands: [replyCommand("ROLL", "second")] }),
    ["ROLL"]
  );

  const { event, replies } = messageEvent("devt!roll");
  await dispatcher.dispatch(event);

  assert.deepEqual(replies, ["first"]);
});

test("a built-in command takes precedence over an extension command", async () => {
  const dispatcher = makeDispatcher();
  dispatcher.registerExtension({ name: "rogue", commands: [replyCommand("close", "extension")] });
  dispatcher.addBuiltin(replyCommand("close", "built-in"));

  const { event, replies } = messageEvent("devt!close");
  await dispatcher.dispatch(event);

  assert.deepEqual(replies, ["built-in"]);
  assert.deepEqual(
    dispatcher.listCommands().map((c) => c.description),
    ["close command"]
  );
});

test("an event with no matching handler does nothing", async () => {
  const dispatcher = makeDispatcher();
  const unknown = messageEvent("devt!nothing");
  const chatter = messageEvent("just chatting");

  await dispatcher.dispatch(unknown.event);
  await dispatcher.dispatch(chatter.event);
  await dispatcher.dispatch({
    type: "reactionAdd",
    reaction: { messageId: "1", channelId: "2", emoji: "3", actor: actor("4") },
  });

  assert.deepEqual(unknown.replies, []);
  assert.deepEqual(chatter.replies, []);
});

test("unknown commands reach commandError listeners", async () => {
  const dispatcher = makeDispatcher();
  const errors = collectErrors(dispatcher);

  await dispatcher.dispatch(messageEvent("devt!nothing").event);

  assert.equal(errors.length, 1);
  const [error] = errors;
  assert.ok(error instanceof CommandNotFoundError);
  assert.equal(error.invokedWith, "nothing");
});

test("command names match case-insensitively only when configured", async () => {
  const insensitive = makeDispatcher();
  insensitive.registerExtension({ name: "x", commands: [replyCommand("ping", "pong")] });
  const loud = messageEvent("devt!PING");
  await insensitive.dispatch(loud.event);
  assert.deepEqual(loud.replies, ["pong"]);

  const sensitive = makeDispatcher({ caseInsensitive: false });
  sensitive.registerExtension({ name: "x", commands: [replyCommand("ping", "pong")] });
  const errors = collectErrors(sensitive);
  const again = messageEvent("devt!PING");
  await sensitive.dispatch(again.event);
  assert.deepEqual(again.replies, []);
  assert.ok(errors[0] instanceof CommandNotFoundError);
});

test("bots reach message listeners but cannot run commands", async () => {
  const dispatcher = makeDispatcher();
  const seen: string[] = [];
  dispatcher.registerExtension({
    name: "x",
    commands: [replyCommand("ping", "pong")],
    listeners: {
      message(message) {
        seen.push(message.content);
      },
    },
  });

  const { event, replies } = messageEvent("devt!ping", actor("500000000000000001", { isBot: true }));
  await dispatcher.dispatch(event);

  assert.deepEqual(seen, ["devt!ping"]);
  assert.deepEqual(replies, []);
});

test("listeners run in registration order and a failing one does not stop the rest", async () => {
  const dispatcher = makeDispatcher();
  const order: string[] = [];
  dispatcher.registerExtension({
    name: "a",
    listeners: {
      message() {
        order.push("a");
      },
    },
  });
  dispatcher.registerExtension({
    name: "broken",
    listeners: {
      message() {
        throw new Error("listener exploded");
      },
    },
  });
  dispatcher.registerExtension({
    name: "b",
    listeners: {
      async message() {
        order.push("b");
      },
    },
  });

  await dispatcher.dispatch(messageEvent("hello").event);

  assert.deepEqual(order, ["a", "b"]);
});

test("a command's own error handler wins over the extension and global handlers", async () => {
  const dispatcher = makeDispatcher();
  const handledBy: string[] = [];
  const errors = collectErrors(dispatcher);
  dispatcher.registerExtension({
    name: "x",
    commands: [
      {
        ...replyCommand("own", ""),
        execute() {
          throw new Error("own failure");
        },
        onError() {
          handledBy.push("command");
        },
      },
      {
        ...replyCommand("shared", ""),
        execute() {
          throw new Error("shared failure");
        },
      },
    ],
    onCommandError() {
      handledBy.push("extension");
    },
  });

  await dispatcher.dispatch(messageEvent("devt!own").event);
  await dispatcher.dispatch(messageEvent("devt!shared").event);

  assert.deepEqual(handledBy, ["command", "extension"]);
  assert.deepEqual(errors, []);
});

test("errors thrown by a command body are wrapped in CommandInvokeError", async () => {
  const dispatcher = makeDispatcher();
  const errors = collectErrors(dispatcher);
  const boom = new Error("boom");
  dispatcher.registerExtension({
    name: "x",
    commands: [
      {
        ...replyCommand("fail", ""),
        execute() {
          throw boom;
        },
      },
    ],
  });

  await dispatcher.dispatch(messageEvent("devt!fail").event);

  assert.equal(errors.length, 1);
  const [error] = errors;
  assert.ok(error instanceof CommandInvokeError);
  assert.equal(error.original, boom);
});

test("owner-only commands reject everyone else", async () => {
  const dispatcher = makeDispatcher();
  const errors = collectErrors(dispatcher);
  dispatcher.addBuiltin(replyCommand("secret", "ok", { ownerOnly: true }));

  const stranger = messageEvent("devt!secret");
  await dispatcher.dispatch(stranger.event);
  const owner = messageEvent("devt!secret", actor(OWNER_ID));
  await dispatcher.dispatch(owner.event);

  assert.deepEqual(stranger.replies, []);
  assert.ok(errors[0] instanceof NotOwnerError);
  assert.deepEqual(owner.replies, ["ok"]);
});

test("role, disabled and argument checks raise their errors", async () => {
  const dispatcher = makeDispatcher();
  const errors = collectErrors(dispatcher);
  dispatcher.registerExtension({
    name: "x",
    commands: [
      replyCommand("squad", "ok", { anyRole: ["Officer", "Squad Lead"] }),
      replyCommand("old", "ok", { enabled: false }),
      replyCommand("give", "ok", { args: [{ name: "role" }, { name: "member" }, { name: "note", optional: true }] }),
    ],
  });

  await dispatcher.dispatch(messageEvent("devt!squad").event);
  await dispatcher.dispatch(messageEvent("devt!old").event);
  await dispatcher.dispatch(messageEvent("devt!give Medic").event);
  const lead = messageEvent("devt!squad", actor("100000000000000003", { roles: ["Squad Lead"] }));
  await dispatcher.dispatch(lead.event);

  assert.equal(errors.length, 3);
  const [roleError, disabledError, argumentError] = errors;
  assert.ok(roleError instanceof MissingAnyRoleError);
  assert.deepEqual(roleError.missingRoles, ["Officer", "Squad Lead"]);
  assert.ok(disabledError instanceof DisabledCommandError);
  assert.ok(argumentError instanceof MissingRequiredArgumentError);
  assert.equal(argumentError.param, "member");
  assert.deepEqual(lead.replies, ["ok"]);
});

test("arguments are tokenized before the command runs", async () => {
  const dispatcher = makeDispatcher();
  const seen: CommandInvocation[] = [];
  dispatcher.registerExtension({
    name: "x",
    commands: [
      {
        ...replyCommand("echo", ""),
        execute(invocation) {
          seen.push(invocation);
        },
      },
    ],
  });

  await dispatcher.dispatch(messageEvent('devt!Echo alpha "bravo charlie"').event);

  const [invocation] = seen;
  assert.ok(invocation);
  assert.equal(invocation.invokedWith, "Echo");
  assert.equal(invocation.rawArgs, 'alpha "bravo charlie"');
  assert.deepEqual(invocation.args, ["alpha", "bravo charlie"]);
  assert.equal(invocation.command?.name, "echo");
});

test("cooldowns limit uses per user within the window", async () => {
  let now = 1_000;
  const dispatcher = makeDispatcher({ now: () => now });
  const errors = collectErrors(dispatcher);
  dispatcher.registerExtension({
    name: "x",
    commands: [replyCommand("roll", "rolled", { cooldown: { rate: 1, per: 10 } })],
  });

  const first = messageEvent("devt!roll");
  await dispatcher.dispatch(first.event);
  now = 4_000;
  const second = messageEvent("devt!roll");
  await dispatcher.dispatch(second.event);
  const otherUser = messageEvent("devt!roll", actor("100000000000000004"));
  await dispatcher.dispatch(otherUser.event);
  now = 11_000;
  const third = messageEvent("devt!roll");
  await dispatcher.dispatch(third.event);

  assert.deepEqual(first.replies, ["rolled"]);
  assert.deepEqual(second.replies, []);
  const [cooldownError] = errors;
  assert.ok(cooldownError instanceof CommandOnCooldownError);
  assert.equal(cooldownError.retryAfter, 7);
  assert.deepEqual(otherUser.replies, ["rolled"]);
  assert.deepEqual(third.replies, ["rolled"]);
});

test("expired cooldown windows are dropped", async () => {
  let now = 1_000;
  const dispatcher = makeDispatcher({ now: () => now });
  dispatcher.registerExtension({
    name: "x",
    commands: [replyCommand("roll", "rolled", { cooldown: { rate: 1, per: 10 } })],
  });

  await dispatcher.dispatch(messageEvent("devt!roll", actor("100000000000000004")).event);
  now = 2_000;
  await dispatcher.dispatch(messageEvent("devt!roll", actor("100000000000000005")).event);
  assert.equal(dispatcher.activeCooldowns, 2);

  now = 12_500;
  const late = messageEvent("devt!roll", actor("100000000000000006"));
  await dispatcher.dispatch(late.event);

  assert.deepEqual(late.replies, ["rolled"]);
  assert.equal(dispatcher.activeCooldowns, 1);
});

test("queued events are dispatched one at a time", async () => {
  const dispatcher = makeDispatcher();
  const log: string[] = [];
  let release: () => void = () => {};
  const gate = new Promise<void>((resolve) => {
    release = resolve;
  });
  const ext: BotExtension = {
    name: "x",
    commands: [
      {
        ...replyCommand("slow", ""),
        async execute() {
          await gate;
          log.push("slow done");
        },
      },
    ],
    listeners: {
      message(message) {
        log.push(`saw ${message.content}`);
      },
    },
  };
  dispatcher.registerExtension(ext);

  const slow = dispatcher.enqueue(messageEvent("devt!slow").event);
  const next = dispatcher.enqueue(messageEvent("after").event);
  await flush();
  assert.deepEqual(log, ["saw devt!slow"]);

  release();
  await Promise.all([slow, next]);
  assert.deepEqual(log, ["saw devt!slow", "slow done", "saw after"]);
});

test("clearExtensions keeps built-ins and drops everything else", async () => {
  const dispatcher = makeDispatcher();
  dispatcher.addBuiltin(replyCommand("help", "help text"));
  const ext: BotExtension = { name: "x", commands: [replyCommand("roll", "rolled")] };
  dispatcher.registerExtension(ext);

  assert.deepEqual(dispatcher.clearExtensions(), [ext]);
  assert.deepEqual(dispatcher.extensions, []);
  assert.deepEqual(
    dispatcher.listCommands().map((c) => c.name),
    ["help"]
  );
  assert.equal(dispatcher.resolve("roll"), undefined);
});

import { mkdtempSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { CommandInvocation, Command } from "../commands.js";
import { ForbiddenError } from "../errors.js";
import type { ChatGateway, InboundListener } from "../gateway.js";
import type { Actor, BotConfig, InboundEvent, InboundMessage, MessageRef } from "../types.js";

export const GUILD_ID = "200000000000000001";
export const CHANNEL_ID = "300000000000000001";
export const OWNER_ID = "100000000000000001";
export const MEMBER_ID = "100000000000000002";
export const BOT_USER_ID = "100000000000000099";

export function tempDir(): string {
  return mkdtempSync(join(tmpdir(), "digt-bot-test-"));
}

export function testConfig(overrides: Partial<BotConfig> = {}): BotConfig {
  return {
    workspace: tmpdir(),
    tokenFile: join(tmpdir(), "token.txt"),
    devVersion: true,
    prefix: "devt!",
    description: "",
    ownerIds: [OWNER_ID],
    caseInsensitive: true,
    activity: "Planetside 2",
    extensions: [],
    ...overrides,
  };
}

export function actor(id: string, overrides: Partial<Actor> = {}): Actor {
  return { id, tag: `user-${id.slice(-2)}`, isBot: false, roles: [], ...overrides };
}

export interface TestMessage {
  message: InboundMessage;
  replies: string[];
}

export function makeMessage(content: string, author: Actor = actor(MEMBER_ID)): TestMessage {
  const replies: string[] = [];
  const message: InboundMessage = {
    id: "400000000000000001",
    content,
    author,
    channel: { id: CHANNEL_ID, name: "general", guildId: GUILD_ID, guildName: "DIGT" },
    async reply(text) {
      replies.push(text);
    },
  };
  return { message, replies };
}

export function messageEvent(content: string, author?: Actor): TestMessage & { event: InboundEvent } {
  const made = makeMessage(content, author);
  return { ...made, event: { type: "message", message: made.message } };
}

export function makeInvocation(invokedWith: string, command?: Command): CommandInvocation {
  const { message } = makeMessage(`devt!${invokedWith}`);
  return {
    prefix: "devt!",
    invokedWith,
    rawArgs: "",
    args: [],
    actor: message.author,
    channel: message.channel,
    message,
    command,
    reply: (text) => message.reply(text),
  };
}

export interface RoleGrant {
  guildId: string;
  userId: string;
  roleId: string;
  reason?: string;
}

/**
 * In-process stand-in for the Discord client.
 */
export class FakeGateway implements ChatGateway {
  user: Actor | undefined;
  loginError: Error | undefined;
  tokens: string[] = [];
  activities: string[] = [];
  reactions: Array<{ messageId: string; emoji: string }> = [];
  roles: RoleGrant[] = [];
  destroyed = 0;
  forbidReactions = false;
  forbidRoles = false;
  private listener: InboundListener | undefined;
  private messages = new Map<string, MessageRef>();

  addMessage(ref: MessageRef): void {
    this.messages.set(`${ref.channelId}:${ref.id}`, ref);
  }

  deleteMessage(ref: MessageRef): void {
    this.messages.delete(`${ref.channelId}:${ref.id}`);
  }

  /** Push an event the way the client library would. */
  deliver(event: InboundEvent): void {
    this.listener?.(event);
  }

  onEvent(listener: InboundListener): void {
    this.listener = listener;
  }

  async login(token: string): Promise<void> {
    this.tokens.push(token);
    if (this.loginError) throw this.loginError;
    this.user = actor(BOT_USER_ID, { isBot: true, tag: "digt-bot" });
  }

  setActivity(name: string): void {
    this.activities.push(name);
  }

  async fetchMessage(channelId: string, messageId: string): Promise<MessageRef | undefined> {
    return this.messages.get(`${channelId}:${messageId}`);
  }

  async addReaction(message: MessageRef, emoji: string): Promise<void> {
    if (this.forbidReactions) throw new ForbiddenError();
    this.reactions.push({ messageId: message.id, emoji });
  }

  async addRole(guildId: string, userId: string, roleId: string, reason?: string): Promise<void> {
    if (this.forbidRoles) throw new ForbiddenError();
    this.roles.push({ guildId, userId, roleId, reason });
  }

  async destroy(): Promise<void> {
    this.destroyed++;
  }
}

/** Let every pending microtask settle. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

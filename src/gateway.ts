import type { Actor, InboundEvent, MessageRef } from "./types.js";

export type InboundListener = (event: InboundEvent) => void;

/**
 * Boundary to the chat service. The client library owns the connection and
 * delivers events through `onEvent`; the bot only reacts at that callback.
 */
export interface ChatGateway {
  /** The bot's own account, known once logged in. */
  readonly user: Actor | undefined;

  onEvent(listener: InboundListener): void;

  login(token: string): Promise<void>;

  setActivity(name: string): void;

  fetchMessage(channelId: string, messageId: string): Promise<MessageRef | undefined>;

  addReaction(message: MessageRef, emoji: string): Promise<void>;

  addRole(guildId: string, userId: string, roleId: string, reason?: string): Promise<void>;

  destroy(): Promise<void>;
}

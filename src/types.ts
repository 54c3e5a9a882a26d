export type ExtensionConfig =
  | string
  | {
      import: string;
      enabled?: boolean;
      options?: Record<string, unknown>;
    };

export interface BotConfig {
  workspace: string;
  tokenFile: string;
  devVersion: boolean;
  prefix: string;
  description: string;
  ownerIds: string[];
  caseInsensitive: boolean;
  activity: string;
  extensions: ExtensionConfig[];
}

export type BotState = "unauthenticated" | "connected" | "running" | "shutdown";

export interface Actor {
  id: string;
  tag: string;
  isBot: boolean;
  /** Role names the author holds in the guild the event came from. */
  roles: string[];
}

export interface ChannelRef {
  id: string;
  name: string;
  guildId?: string;
  guildName?: string;
}

export interface InboundMessage {
  id: string;
  content: string;
  author: Actor;
  channel: ChannelRef;
  reply(text: string): Promise<void>;
}

export interface ReactionEvent {
  messageId: string;
  channelId: string;
  guildId?: string;
  /** Custom emoji id, or the unicode character for standard emoji. */
  emoji: string;
  actor: Actor;
}

export interface ReadyEvent {
  user: Actor;
}

export type InboundEvent =
  | { type: "ready"; ready: ReadyEvent }
  | { type: "message"; message: InboundMessage }
  | { type: "reactionAdd"; reaction: ReactionEvent };

export interface MessageRef {
  id: string;
  channelId: string;
  guildId?: string;
}

import {
  ActivityType,
  Client,
  DiscordAPIError,
  Events,
  GatewayIntentBits,
  Partials,
  type GuildMember,
  type Message,
  type PartialUser,
  type User,
} from "discord.js";
import { ForbiddenError } from "./errors.js";
import type { ChatGateway, InboundListener } from "./gateway.js";
import type { Actor, InboundEvent, InboundMessage, MessageRef } from "./types.js";

export interface DiscordGatewayOptions {
  /** "Playing" status shown while connecting. */
  initialActivity: string;
}

function toActor(user: User | PartialUser, member?: GuildMember | null): Actor {
  return {
    id: user.id,
    tag: user.tag ?? user.id,
    isBot: user.bot ?? false,
    roles: member ? member.roles.cache.map((role) => role.name) : [],
  };
}

function toGatewayError(err: unknown): unknown {
  if (err instanceof DiscordAPIError && err.status === 403) {
    return new ForbiddenError(err.message, { cause: err });
  }
  return err;
}

function toInboundMessage(message: Message): InboundMessage {
  const channel = message.inGuild()
    ? {
        id: message.channelId,
        name: message.channel.name,
        guildId: message.guild.id,
        guildName: message.guild.name,
      }
    : { id: message.channelId, name: "Direct Messages" };

  return {
    id: message.id,
    content: message.content,
    author: toActor(message.author, message.member),
    channel,
    async reply(text) {
      try {
        await message.reply(text);
      } catch (err) {
        throw toGatewayError(err);
      }
    },
  };
}

/**
 * ChatGateway backed by a discord.js client.
 */
export function createDiscordGateway(options: DiscordGatewayOptions): ChatGateway {
  const client = new Client({
    intents: [
      GatewayIntentBits.Guilds,
      GatewayIntentBits.GuildMessages,
      GatewayIntentBits.GuildMessageReactions,
      GatewayIntentBits.MessageContent,
      GatewayIntentBits.DirectMessages,
    ],
    // Reactions on messages sent before startup arrive as partials.
    partials: [Partials.Message, Partials.Channel, Partials.Reaction],
    presence: {
      activities: [{ name: options.initialActivity, type: ActivityType.Playing }],
    },
    // No mass pings through the bot.
    allowedMentions: { parse: ["users"], repliedUser: false },
  });

  const listeners: InboundListener[] = [];
  const emit = (event: InboundEvent) => {
    for (const listener of listeners) listener(event);
  };

  client.once(Events.ClientReady, (ready) => {
    emit({ type: "ready", ready: { user: toActor(ready.user) } });
  });

  client.on(Events.MessageCreate, (message) => {
    emit({ type: "message", message: toInboundMessage(message) });
  });

  client.on(Events.MessageReactionAdd, (reaction, user) => {
    emit({
      type: "reactionAdd",
      reaction: {
        messageId: reaction.message.id,
        channelId: reaction.message.channelId,
        guildId: reaction.message.guildId ?? undefined,
        emoji: reaction.emoji.id ?? reaction.emoji.name ?? "",
        actor: toActor(user),
      },
    });
  });

  client.on(Events.Error, (err) => {
    console.error(`[digt-bot] Discord client error: ${err.message}`);
  });

  async function fetchDiscordMessage(channelId: string, messageId: string): Promise<Message | undefined> {
    try {
      const channel = await client.channels.fetch(channelId);
      if (!channel || !channel.isTextBased()) return undefined;
      return await channel.messages.fetch(messageId);
    } catch (err) {
      // Unknown, deleted or hidden: treated as absent.
      if (err instanceof DiscordAPIError) return undefined;
      throw err;
    }
  }

  return {
    get user() {
      return client.user ? toActor(client.user) : undefined;
    },

    onEvent(listener) {
      listeners.push(listener);
    },

    async login(token) {
      await client.login(token);
    },

    setActivity(name) {
      client.user?.setActivity(name, { type: ActivityType.Playing });
    },

    async fetchMessage(channelId, messageId): Promise<MessageRef | undefined> {
      const message = await fetchDiscordMessage(channelId, messageId);
      if (!message) return undefined;
      return { id: message.id, channelId: message.channelId, guildId: message.guildId ?? undefined };
    },

    async addReaction(ref, emoji) {
      const message = await fetchDiscordMessage(ref.channelId, ref.id);
      if (!message) throw new Error(`Message ${ref.id} is not available`);
      try {
        await message.react(emoji);
      } catch (err) {
        throw toGatewayError(err);
      }
    },

    async addRole(guildId, userId, roleId, reason) {
      try {
        const guild = await client.guilds.fetch(guildId);
        const member = await guild.members.fetch(userId);
        await member.roles.add(roleId, reason);
      } catch (err) {
        throw toGatewayError(err);
      }
    },

    async destroy() {
      await client.destroy();
    },
  };
}

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { z } from "zod";
import type { Command, CommandErrorHandler } from "../commands.js";
import {
  BadArgumentError,
  CommandInvokeError,
  ForbiddenError,
  MissingRequiredArgumentError,
  errorMessage,
} from "../errors.js";
import type { BotExtension, ExtensionContext } from "../extensions.js";
import type { ReactionEvent } from "../types.js";
import { describeCommandError } from "./error-handler.js";

const optionsSchema = z.object({
  storage: z.string().min(1).default("./text_files/reaction_roles.json"),
});

const settingsSchema = z.object({
  menu_msg_id: z.string().nullable().default(null),
  menu_chan_id: z.string().nullable().default(null),
  reaction_role_ids: z.record(z.string()).default({}),
});

export interface ReactionRoleSettings {
  menuMessageId: string | null;
  menuChannelId: string | null;
  /** Emoji id to role id. */
  reactionRoles: Map<string, string>;
}

const MESSAGE_LINK =
  /^<?https?:\/\/(?:(?:ptb|canary)\.)?discord(?:app)?\.com\/channels\/(?:\d+|@me)\/(\d+)\/(\d+)\/?>?$/;
const CHANNEL_MESSAGE_PAIR = /^(\d{15,20})-(\d{15,20})$/;
const SNOWFLAKE = /^\d{15,20}$/;

export function readSettings(path: string): ReactionRoleSettings {
  if (!existsSync(path)) {
    return { menuMessageId: null, menuChannelId: null, reactionRoles: new Map() };
  }
  const saved = settingsSchema.parse(JSON.parse(readFileSync(path, "utf-8")));
  return {
    menuMessageId: saved.menu_msg_id,
    menuChannelId: saved.menu_chan_id,
    reactionRoles: new Map(Object.entries(saved.reaction_role_ids)),
  };
}

export function writeSettings(path: string, settings: ReactionRoleSettings): void {
  mkdirSync(dirname(path), { recursive: true });
  const toSave: z.input<typeof settingsSchema> = {
    menu_msg_id: settings.menuMessageId,
    menu_chan_id: settings.menuChannelId,
    reaction_role_ids: Object.fromEntries(settings.reactionRoles),
  };
  writeFileSync(path, JSON.stringify(toSave, null, 2) + "\n");
}

/** Message link, `channelId-messageId`, or a bare message id in `channelId`. */
export function parseMessageTarget(arg: string, channelId: string): { channelId: string; messageId: string } {
  const link = MESSAGE_LINK.exec(arg) ?? CHANNEL_MESSAGE_PAIR.exec(arg);
  if (link) return { channelId: link[1], messageId: link[2] };
  if (SNOWFLAKE.test(arg)) return { channelId, messageId: arg };
  throw new BadArgumentError(`Message "${arg}" not found.`);
}

/** Role mention or id. */
export function parseRoleId(arg: string): string {
  const match = /^<@&(\d+)>$/.exec(arg);
  if (match) return match[1];
  if (SNOWFLAKE.test(arg)) return arg;
  throw new BadArgumentError(`Role "${arg}" not found.`);
}

/** Custom emoji (`<:name:id>`, `<a:name:id>`) or id. */
export function parseEmojiId(arg: string): string {
  const match = /^<a?:\w+:(\d+)>$/.exec(arg);
  if (match) return match[1];
  if (SNOWFLAKE.test(arg)) return arg;
  throw new BadArgumentError(`Emoji "${arg}" not found.`);
}

/**
 * Reaction menu granting roles. Meant for a single server.
 */
export function createReactionRoles(options: Record<string, unknown>, ctx: ExtensionContext): BotExtension {
  const { storage } = optionsSchema.parse(options);
  const storagePath = resolve(ctx.config.workspace, storage);
  const settings = readSettings(storagePath);
  const { gateway } = ctx;

  /** Write `next` to disk, then adopt it. */
  function commit(next: ReactionRoleSettings): void {
    writeSettings(storagePath, next);
    Object.assign(settings, next);
  }

  function boundMenu(): { channelId: string; messageId: string } | undefined {
    if (!settings.menuMessageId || !settings.menuChannelId) return undefined;
    return { channelId: settings.menuChannelId, messageId: settings.menuMessageId };
  }

  const bindingErrorHandler: CommandErrorHandler = async (invocation, error) => {
    if (error instanceof BadArgumentError) {
      await invocation.reply(">={ Give me a message ID or link");
      return;
    }
    const reply = describeCommandError(invocation, error, ctx.listCommands().map((c) => c.name));
    if (reply !== undefined) await invocation.reply(reply);
  };

  const addRoleErrorHandler: CommandErrorHandler = async (invocation, error) => {
    if (error instanceof BadArgumentError) {
      await invocation.reply(">={ I don't understand your arguments");
    } else if (error instanceof MissingRequiredArgumentError) {
      await invocation.reply(`I need more arguments. Missed argument: ${error.param}`);
    } else if (error instanceof CommandInvokeError) {
      console.error(`[digt-bot] add_reaction_role failed: ${errorMessage(error.original)}`);
      await invocation.reply("Internal error");
    } else {
      const reply = describeCommandError(invocation, error, ctx.listCommands().map((c) => c.name));
      if (reply !== undefined) await invocation.reply(reply);
    }
  };

  const commands: Command[] = [
    {
      name: "bind_message",
      description: "Set up the role menu message. Pass in a message ID or link.",
      ownerOnly: true,
      args: [{ name: "message" }],
      async execute(invocation) {
        if (boundMenu()) {
          await invocation.reply("Please unbind the current message first.");
          return;
        }

        const target = parseMessageTarget(invocation.args[0], invocation.channel.id);
        const message = await gateway.fetchMessage(target.channelId, target.messageId);
        if (!message) throw new BadArgumentError(`Message "${invocation.args[0]}" not found.`);

        try {
          for (const emoji of settings.reactionRoles.keys()) {
            await gateway.addReaction(message, emoji);
          }
        } catch (err) {
          console.error(`[digt-bot] Binding the role menu failed: ${errorMessage(err)}`);
          await invocation.reply("Failed to bind to the message.");
          return;
        }
        commit({ ...settings, menuMessageId: message.id, menuChannelId: message.channelId });
        await invocation.reply("Successfully bound the message.");
      },
      onError: bindingErrorHandler,
    },
    {
      name: "unbind_message",
      description: "Unbind the currently bound message.",
      ownerOnly: true,
      async execute(invocation) {
        if (!boundMenu()) {
          await invocation.reply("There is no bound message. Bind one with `bind_message`.");
          return;
        }
        commit({ ...settings, menuMessageId: null, menuChannelId: null });
        await invocation.reply("Unbound the message.");
      },
    },
    {
      name: "add_reaction_role",
      description: "Add a new reaction role. You may pass mentions or ids for role and emoji",
      ownerOnly: true,
      args: [{ name: "role" }, { name: "emoji" }],
      async execute(invocation) {
        const [roleArg, emojiArg] = invocation.args;
        const roleId = parseRoleId(roleArg);
        const emojiId = parseEmojiId(emojiArg);

        if (settings.reactionRoles.has(emojiId) || [...settings.reactionRoles.values()].includes(roleId)) {
          await invocation.reply(
            "That emoji or role is already registered. Unregister it with `remove_reaction_role`"
          );
          return;
        }

        const target = boundMenu();
        if (!target) {
          await invocation.reply("Bind a message with `bind_message` before using this command.");
          return;
        }

        const menu = await gateway.fetchMessage(target.channelId, target.messageId);
        if (!menu) {
          await invocation.reply("I can't find the bound message. Bind it again with `bind_message`.");
          return;
        }

        try {
          await gateway.addReaction(menu, emojiId);
        } catch (err) {
          if (err instanceof ForbiddenError) {
            await invocation.reply("Reaction failed. Check my permissions and retry.");
            return;
          }
          throw err;
        }

        commit({ ...settings, reactionRoles: new Map(settings.reactionRoles).set(emojiId, roleId) });
        await invocation.reply(`I have added ${emojiArg} as the reaction for the ${roleArg} role.`);
      },
      onError: addRoleErrorHandler,
    },
    {
      name: "remove_reaction_role",
      description: "Remove a reaction role by its emoji.",
      ownerOnly: true,
      args: [{ name: "emoji" }],
      async execute(invocation) {
        const emojiId = parseEmojiId(invocation.args[0]);
        if (!settings.reactionRoles.has(emojiId)) {
          await invocation.reply("That emoji is not registered.");
          return;
        }
        const reactionRoles = new Map(settings.reactionRoles);
        reactionRoles.delete(emojiId);
        commit({ ...settings, reactionRoles });
        await invocation.reply(`Removed ${invocation.args[0]} from the role menu.`);
      },
    },
  ];

  async function onReactionAdd(reaction: ReactionEvent): Promise<void> {
    if (reaction.actor.id === gateway.user?.id) return;

    const target = boundMenu();
    if (!target || reaction.messageId !== target.messageId) return;

    const roleId = settings.reactionRoles.get(reaction.emoji);
    if (!roleId) return;

    // Fetched every time so a deleted or hidden menu stops granting roles.
    const menu = await gateway.fetchMessage(target.channelId, target.messageId);
    if (!menu) return;

    const guildId = menu.guildId ?? reaction.guildId;
    if (!guildId) return;

    try {
      await gateway.addRole(guildId, reaction.actor.id, roleId, "Reacted on the role menu");
    } catch (err) {
      if (err instanceof ForbiddenError) {
        console.error(`[digt-bot] Missing permission to grant role ${roleId}`);
        return;
      }
      throw err;
    }
  }

  return {
    name: "reaction-roles",
    commands,
    listeners: { reactionAdd: onReactionAdd },
  };
}

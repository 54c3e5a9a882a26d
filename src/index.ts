export { loadConfig, parseConfig } from "./config.js";
export { loadCredential } from "./credential.js";
export { createBot, startBot } from "./bot.js";
export type { Bot, CreateBotOptions } from "./bot.js";
export { createDiscordGateway } from "./discord.js";
export { Dispatcher } from "./dispatcher.js";
export { loadExtensions } from "./extensions.js";
export type {
  BotEventMap,
  BotExtension,
  ExtensionCatalogue,
  ExtensionContext,
  ExtensionFactory,
  Listeners,
} from "./extensions.js";
export type { ChatGateway } from "./gateway.js";
export type { Command, CommandInvocation } from "./commands.js";
export * from "./errors.js";
export type {
  Actor,
  BotConfig,
  BotState,
  ChannelRef,
  ExtensionConfig,
  InboundEvent,
  InboundMessage,
  ReactionEvent,
} from "./types.js";

import type { ExtensionCatalogue } from "../extensions.js";
import { createErrorHandler } from "./error-handler.js";
import { createReactionRoles } from "./reaction-roles.js";

/** Extensions that ship with the bot, by the name used in config. */
export const builtinExtensions: ExtensionCatalogue = new Map([
  ["error-handler", createErrorHandler],
  ["reaction-roles", createReactionRoles],
]);

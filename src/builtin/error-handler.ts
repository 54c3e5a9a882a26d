/**
 * Replies to command errors that no command or extension handled itself.
 */
import { AssertionError } from "node:assert";
import {
  ArgumentParsingError,
  BadArgumentError,
  CheckFailureError,
  CommandInvokeError,
  CommandNotFoundError,
  CommandOnCooldownError,
  DisabledCommandError,
  ForbiddenError,
  MissingAnyRoleError,
  MissingRequiredArgumentError,
  NotOwnerError,
  type CommandError,
} from "../errors.js";
import type { CommandInvocation } from "../commands.js";
import type { BotExtension, ExtensionContext } from "../extensions.js";
import { article, closestMatch, listJoin } from "../utils/text.js";

function isForbidden(error: CommandError): boolean {
  return error instanceof ForbiddenError || (error instanceof CommandInvokeError && error.original instanceof ForbiddenError);
}

/**
 * The reply for `error`, or undefined when the error needs no reply.
 * Errors without a specific reply are logged.
 */
export function describeCommandError(
  invocation: CommandInvocation,
  error: CommandError,
  commandNames: string[]
): string | undefined {
  if (error instanceof CommandOnCooldownError) {
    return `Try again in ${Math.trunc(error.retryAfter)} seconds!`;
  }

  if (error instanceof CommandNotFoundError) {
    if (invocation.invokedWith.includes("@")) {
      return "How dare you try to use me to annoy others!";
    }
    const suggestion = closestMatch(invocation.invokedWith, commandNames);
    const notFound = `Command not found "\`${invocation.invokedWith}\`"`;
    return suggestion ? `${notFound} Did you mean \`${invocation.prefix}${suggestion}\`?` : notFound;
  }

  if (error instanceof MissingRequiredArgumentError) return "I need more arguments";

  if (error instanceof MissingAnyRoleError) {
    const roles = error.missingRoles;
    return `You need to be ${article(roles[0] ?? "")} ${listJoin(roles, "or")} to use that command!`;
  }

  if (error instanceof DisabledCommandError) return "Command in maintenance.";

  if (error instanceof NotOwnerError) return "Only admins can use that command.";

  if (error instanceof BadArgumentError) return "I don't understand your argument.";

  if (error instanceof ArgumentParsingError) return "There was a weird quote in your command.";

  if (isForbidden(error)) return "I can't access one or more of those channels TwT";

  if (error instanceof CommandInvokeError && error.original instanceof AssertionError) {
    return `My diagnostics report a failure in ${invocation.command?.name ?? invocation.invokedWith}. Please inform the admins.`;
  }

  // Custom checks report their own failures.
  if (error instanceof CheckFailureError) return undefined;

  console.error(`[digt-bot] Unhandled error in ${invocation.command?.name ?? invocation.invokedWith}:`, error.cause ?? error);
  return "Internal error.";
}

export function createErrorHandler(_options: Record<string, unknown>, ctx: ExtensionContext): BotExtension {
  return {
    name: "error-handler",
    listeners: {
      async commandError({ invocation, error }) {
        const names = ctx.listCommands().map((c) => c.name);
        const reply = describeCommandError(invocation, error, names);
        if (reply !== undefined) await invocation.reply(reply);
      },
    },
  };
}

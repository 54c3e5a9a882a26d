export class MissingCredentialError extends Error {
  constructor(
    readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(`No bot token found at ${path}`, options);
    this.name = "MissingCredentialError";
  }
}

export class ExtensionLoadError extends Error {
  constructor(
    readonly extensionName: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to load extension "${extensionName}": ${reason}`, options);
    this.name = "ExtensionLoadError";
  }
}

export class AuthenticationError extends Error {
  constructor(reason: string, options?: { cause?: unknown }) {
    super(`Could not log in to Discord: ${reason}`, options);
    this.name = "AuthenticationError";
  }
}

/** Discord refused the action (HTTP 403). */
export class ForbiddenError extends Error {
  constructor(message = "Missing permissions", options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ForbiddenError";
  }
}

// --- Command errors ---
// Raised while dispatching a command and routed to error handlers,
// never thrown out of dispatch.

export class CommandError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class CommandNotFoundError extends CommandError {
  constructor(readonly invokedWith: string) {
    super(`Command "${invokedWith}" is not found`);
  }
}

export class CheckFailureError extends CommandError {}

export class NotOwnerError extends CheckFailureError {
  constructor() {
    super("You do not own this bot.");
  }
}

export class MissingAnyRoleError extends CheckFailureError {
  constructor(readonly missingRoles: string[]) {
    super(`You are missing at least one of the required roles: ${missingRoles.join(", ")}`);
  }
}

export class DisabledCommandError extends CommandError {
  constructor(commandName: string) {
    super(`${commandName} command is disabled`);
  }
}

export class CommandOnCooldownError extends CommandError {
  constructor(readonly retryAfter: number) {
    super(`You are on cooldown. Try again in ${retryAfter.toFixed(2)}s`);
  }
}

export class UserInputError extends CommandError {}

export class MissingRequiredArgumentError extends UserInputError {
  constructor(readonly param: string) {
    super(`${param} is a required argument that is missing.`);
  }
}

export class BadArgumentError extends UserInputError {}

export class ArgumentParsingError extends UserInputError {}

export class UnexpectedQuoteError extends ArgumentParsingError {
  constructor(readonly quote: string) {
    super(`Unexpected quote mark, ${quote}, in non-quoted string`);
  }
}

export class ExpectedClosingQuoteError extends ArgumentParsingError {
  constructor(readonly closeQuote: string) {
    super(`Expected closing ${closeQuote}.`);
  }
}

/** Wraps anything other than a CommandError thrown by a command body. */
export class CommandInvokeError extends CommandError {
  constructor(readonly original: unknown) {
    super(
      `Command raised an exception: ${original instanceof Error ? `${original.name}: ${original.message}` : String(original)}`,
      { cause: original }
    );
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

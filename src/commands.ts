import {
  ArgumentParsingError,
  ExpectedClosingQuoteError,
  UnexpectedQuoteError,
  type CommandError,
} from "./errors.js";
import type { Actor, ChannelRef, InboundMessage } from "./types.js";

export interface ArgSpec {
  name: string;
  optional?: boolean;
}

export interface Cooldown {
  /** Uses allowed per window. */
  rate: number;
  /** Window length in seconds. */
  per: number;
}

export interface CommandInvocation {
  prefix: string;
  /** The word the user typed after the prefix, as typed. */
  invokedWith: string;
  /** Everything after the invoked word. */
  rawArgs: string;
  /** Tokenized arguments; filled in just before the command runs. */
  args: string[];
  actor: Actor;
  channel: ChannelRef;
  message: InboundMessage;
  command?: Command;
  reply(text: string): Promise<void>;
}

export type CommandHandler = (invocation: CommandInvocation) => void | Promise<void>;

export type CommandErrorHandler = (
  invocation: CommandInvocation,
  error: CommandError
) => void | Promise<void>;

export interface Command {
  name: string;
  description: string;
  args?: ArgSpec[];
  ownerOnly?: boolean;
  /** Role names; the actor needs at least one of them. */
  anyRole?: string[];
  /** Defaults to true. */
  enabled?: boolean;
  cooldown?: Cooldown;
  execute: CommandHandler;
  /** Handles this command's errors instead of the extension or global handlers. */
  onError?: CommandErrorHandler;
}

export function usage(prefix: string, command: Command): string {
  const params = (command.args ?? []).map((a) => (a.optional ? `[${a.name}]` : `<${a.name}>`));
  return [`${prefix}${command.name}`, ...params].join(" ");
}

/**
 * Split a message into the invoked word and the remaining text.
 * Returns undefined when the message does not start with `prefix` or no word
 * follows it directly.
 */
export function parseInvocation(
  content: string,
  prefix: string
): { invokedWith: string; rawArgs: string } | undefined {
  if (!content.startsWith(prefix)) return undefined;

  const match = /^(\S+)(?:\s+([\s\S]*))?$/.exec(content.slice(prefix.length));
  if (!match) return undefined;

  return { invokedWith: match[1], rawArgs: (match[2] ?? "").trim() };
}

function isSpace(ch: string): boolean {
  return /\s/.test(ch);
}

/**
 * Tokenize command arguments. Whitespace separates words, double quotes group
 * them and `\"` escapes a quote inside a quoted word.
 */
export function splitArgs(raw: string): string[] {
  const args: string[] = [];
  let i = 0;

  while (i < raw.length) {
    if (isSpace(raw[i])) {
      i++;
      continue;
    }

    if (raw[i] === '"') {
      let word = "";
      i++;
      let closed = false;
      while (i < raw.length) {
        const ch = raw[i];
        if (ch === "\\" && raw[i + 1] === '"') {
          word += '"';
          i += 2;
          continue;
        }
        if (ch === '"') {
          closed = true;
          i++;
          break;
        }
        word += ch;
        i++;
      }
      if (!closed) throw new ExpectedClosingQuoteError('"');
      if (i < raw.length && !isSpace(raw[i])) {
        throw new ArgumentParsingError(`Expected space after closing quotation but received ${raw[i]}`);
      }
      args.push(word);
      continue;
    }

    let word = "";
    while (i < raw.length && !isSpace(raw[i])) {
      if (raw[i] === '"') throw new UnexpectedQuoteError('"');
      word += raw[i];
      i++;
    }
    args.push(word);
  }

  return args;
}

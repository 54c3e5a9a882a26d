import {
  parseInvocation,
  splitArgs,
  type Command,
  type CommandInvocation,
} from "./commands.js";
import {
  CommandError,
  CommandInvokeError,
  CommandNotFoundError,
  CommandOnCooldownError,
  DisabledCommandError,
  MissingAnyRoleError,
  MissingRequiredArgumentError,
  NotOwnerError,
  errorMessage,
} from "./errors.js";
import {
  BOT_EVENTS,
  type BotEventMap,
  type BotEventName,
  type BotExtension,
  type Listener,
} from "./extensions.js";
import type { InboundEvent, InboundMessage } from "./types.js";
import { formatDayAndTime } from "./utils/text.js";

export interface DispatcherOptions {
  prefix: string;
  caseInsensitive: boolean;
  ownerIds: string[];
  now?: () => number;
}

interface CommandEntry {
  command: Command;
  /** Undefined for built-in administrative commands. */
  owner?: BotExtension;
}

interface ListenerEntry<K extends BotEventName> {
  owner: BotExtension;
  handler: Listener<K>;
}

type ListenerTable = { [K in BotEventName]: ListenerEntry<K>[] };

interface CooldownBucket {
  windowStart: number;
  windowMs: number;
  uses: number;
}

function emptyListenerTable(): ListenerTable {
  return { ready: [], message: [], reactionAdd: [], commandError: [] };
}

/**
 * Dispatch table for one bot: built-in commands, extension commands and
 * extension listeners. Inbound events are processed one at a time.
 */
export class Dispatcher {
  private builtins = new Map<string, Command>();
  private commands = new Map<string, CommandEntry>();
  private listeners: ListenerTable = emptyListenerTable();
  private loaded: BotExtension[] = [];
  private cooldowns = new Map<string, CooldownBucket>();
  private queue: Promise<void> = Promise.resolve();
  private readonly now: () => number;

  constructor(private readonly options: DispatcherOptions) {
    this.now = options.now ?? Date.now;
  }

  get prefix(): string {
    return this.options.prefix;
  }

  get extensions(): readonly BotExtension[] {
    return this.loaded;
  }

  private key(name: string): string {
    return this.options.caseInsensitive ? name.toLowerCase() : name;
  }

  isOwner(userId: string): boolean {
    return this.options.ownerIds.includes(userId);
  }

  addBuiltin(command: Command): void {
    this.builtins.set(this.key(command.name), command);
  }

  /**
   * Add an extension's commands and listeners. On a name collision the
   * command registered first keeps the name; the skipped names are returned.
   */
  registerExtension(ext: BotExtension): string[] {
    const skipped: string[] = [];

    for (const command of ext.commands ?? []) {
      const key = this.key(command.name);
      const existing = this.commands.get(key);
      if (existing) {
        skipped.push(command.name);
        console.error(
          `[digt-bot] Command "${command.name}" from ${ext.name} ignored: already registered by ${existing.owner?.name ?? "the bot"}`
        );
        continue;
      }
      if (this.builtins.has(key)) {
        console.log(`[digt-bot] Command "${command.name}" from ${ext.name} is shadowed by a built-in command`);
      }
      this.commands.set(key, { command, owner: ext });
    }

    for (const name of BOT_EVENTS) {
      this.addListener(ext, name);
    }

    this.loaded.push(ext);
    return skipped;
  }

  private addListener<K extends BotEventName>(owner: BotExtension, name: K): void {
    const handler: Listener<K> | undefined = owner.listeners?.[name];
    if (handler) this.listeners[name].push({ owner, handler });
  }

  /** Drop every extension command and listener. Built-ins stay. */
  clearExtensions(): BotExtension[] {
    const removed = this.loaded;
    this.loaded = [];
    this.commands.clear();
    this.listeners = emptyListenerTable();
    this.cooldowns.clear();
    return removed;
  }

  /** Built-ins take precedence over extension commands of the same name. */
  resolve(name: string): CommandEntry | undefined {
    const key = this.key(name);
    const builtin = this.builtins.get(key);
    if (builtin) return { command: builtin };
    return this.commands.get(key);
  }

  listCommands(): Command[] {
    const fromExtensions = [...this.commands.entries()]
      .filter(([key]) => !this.builtins.has(key))
      .map(([, entry]) => entry.command);
    return [...this.builtins.values(), ...fromExtensions];
  }

  /** Queue an inbound event behind everything already being dispatched. */
  enqueue(event: InboundEvent): Promise<void> {
    const run = this.queue
      .then(() => this.dispatch(event))
      .catch((err) => {
        console.error(`[digt-bot] Dispatch of ${event.type} failed: ${errorMessage(err)}`);
      });
    this.queue = run;
    return run;
  }

  async dispatch(event: InboundEvent): Promise<void> {
    switch (event.type) {
      case "ready":
        await this.emit("ready", event.ready);
        break;
      case "message":
        await this.handleMessage(event.message);
        break;
      case "reactionAdd":
        await this.emit("reactionAdd", event.reaction);
        break;
    }
  }

  /** Run the listeners for `name` in registration order, isolating failures. */
  async emit<K extends BotEventName>(name: K, event: BotEventMap[K]): Promise<void> {
    for (const { owner, handler } of [...this.listeners[name]]) {
      try {
        await handler(event);
      } catch (err) {
        console.error(`[digt-bot] ${owner.name} ${name} listener failed: ${errorMessage(err)}`);
      }
    }
  }

  private async handleMessage(message: InboundMessage): Promise<void> {
    await this.emit("message", message);

    if (message.author.isBot) return;

    const parsed = parseInvocation(message.content, this.options.prefix);
    if (!parsed) return;

    const invocation: CommandInvocation = {
      prefix: this.options.prefix,
      invokedWith: parsed.invokedWith,
      rawArgs: parsed.rawArgs,
      args: [],
      actor: message.author,
      channel: message.channel,
      message,
      reply: (text) => message.reply(text),
    };

    const entry = this.resolve(parsed.invokedWith);
    if (!entry) {
      await this.routeError(invocation, new CommandNotFoundError(parsed.invokedWith));
      return;
    }

    const { command, owner } = entry;
    invocation.command = command;

    try {
      this.prepare(invocation, command);
      this.logInvocation(invocation, command);
      await command.execute(invocation);
    } catch (err) {
      const error = err instanceof CommandError ? err : new CommandInvokeError(err);
      await this.routeError(invocation, error, owner);
    }
  }

  /** Checks, cooldown, then argument parsing. */
  private prepare(invocation: CommandInvocation, command: Command): void {
    if (command.enabled === false) throw new DisabledCommandError(command.name);

    if (command.ownerOnly && !this.isOwner(invocation.actor.id)) throw new NotOwnerError();

    if (command.anyRole && command.anyRole.length > 0) {
      const held = new Set(invocation.actor.roles);
      if (!command.anyRole.some((role) => held.has(role))) {
        throw new MissingAnyRoleError(command.anyRole);
      }
    }

    if (command.cooldown) this.consumeCooldown(invocation, command);

    const args = splitArgs(invocation.rawArgs);
    const params = command.args ?? [];
    for (let i = 0; i < params.length; i++) {
      if (i >= args.length && !params[i].optional) {
        throw new MissingRequiredArgumentError(params[i].name);
      }
    }
    invocation.args = args;
  }

  private consumeCooldown(invocation: CommandInvocation, command: Command): void {
    if (!command.cooldown) return;
    const { rate, per } = command.cooldown;
    const windowMs = per * 1000;
    const bucketKey = `${this.key(command.name)}:${invocation.actor.id}`;
    const now = this.now();
    this.sweepCooldowns(now);

    let bucket = this.cooldowns.get(bucketKey);
    if (!bucket) {
      bucket = { windowStart: now, windowMs, uses: 0 };
      this.cooldowns.set(bucketKey, bucket);
    }

    if (bucket.uses >= rate) {
      throw new CommandOnCooldownError((windowMs - (now - bucket.windowStart)) / 1000);
    }
    bucket.uses++;
  }

  /** Drop every bucket whose window has passed. */
  private sweepCooldowns(now: number): void {
    for (const [key, bucket] of this.cooldowns) {
      if (now - bucket.windowStart >= bucket.windowMs) this.cooldowns.delete(key);
    }
  }

  /** Number of cooldown windows still open. */
  get activeCooldowns(): number {
    return this.cooldowns.size;
  }

  private logInvocation(invocation: CommandInvocation, command: Command): void {
    const { day, time } = formatDayAndTime(new Date(this.now()));
    const guild = invocation.channel.guildName ?? "Direct Messages";
    console.log(
      `[digt-bot] Command: ${command.name} called in "${guild}".${invocation.channel.name} on ${day} at ${time}`
    );
  }

  /**
   * Command's own handler, then its extension's, then the global
   * `commandError` listeners.
   */
  private async routeError(
    invocation: CommandInvocation,
    error: CommandError,
    owner?: BotExtension
  ): Promise<void> {
    const command = invocation.command;
    try {
      if (command?.onError) {
        await command.onError(invocation, error);
        return;
      }
      if (owner?.onCommandError) {
        await owner.onCommandError(invocation, error);
        return;
      }
    } catch (err) {
      console.error(`[digt-bot] Error handler for ${command?.name ?? invocation.invokedWith} failed: ${errorMessage(err)}`);
      return;
    }

    if (this.listeners.commandError.length === 0) {
      if (!(error instanceof CommandNotFoundError)) {
        console.error(`[digt-bot] Ignoring exception in command ${command?.name ?? invocation.invokedWith}: ${error.message}`);
      }
      return;
    }

    await this.emit("commandError", { invocation, error });
  }
}

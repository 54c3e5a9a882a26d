import { createAdminCommands } from "./admin.js";
import { loadCredential } from "./credential.js";
import { createDiscordGateway } from "./discord.js";
import { Dispatcher } from "./dispatcher.js";
import { AuthenticationError, ExtensionLoadError, errorMessage } from "./errors.js";
import {
  loadExtensions,
  type BotExtension,
  type ExtensionCatalogue,
  type ExtensionContext,
  type LoadResult,
} from "./extensions.js";
import type { ChatGateway } from "./gateway.js";
import { setupGracefulShutdown } from "./shutdown.js";
import type { BotConfig, BotState, InboundEvent } from "./types.js";

export interface CreateBotOptions {
  gateway: ChatGateway;
  /** Named extensions available to config; defaults to the built-in ones. */
  catalogue?: ExtensionCatalogue;
  /** Called once shutdown has finished. The CLI exits the process here. */
  onExit?: (exitCode: number) => void;
  now?: () => number;
}

export interface Bot {
  readonly state: BotState;
  readonly config: BotConfig;
  readonly dispatcher: Dispatcher;
  readonly context: ExtensionContext;
  /** Load, initialise and register the configured extensions. */
  loadExtensions(): Promise<LoadResult>;
  /** Dispose every extension and load the configured list again. */
  reload(): Promise<LoadResult>;
  /** Authenticate with the chat service. */
  start(token: string): Promise<void>;
  /** Queue an inbound event; resolves once it has been dispatched. */
  handle(event: InboundEvent): Promise<void>;
  shutdown(exitCode?: number): Promise<void>;
}

function testingMarker(config: BotConfig): string {
  return config.devVersion ? " [TESTING]" : "";
}

export function startingActivity(config: BotConfig): string {
  return `Starting...${testingMarker(config)}`;
}

async function disposeAll(extensions: readonly BotExtension[]): Promise<void> {
  for (const ext of [...extensions].reverse()) {
    if (!ext.dispose) continue;
    try {
      await ext.dispose();
    } catch (err) {
      console.error(`[digt-bot] Extension "${ext.name}" dispose() failed: ${errorMessage(err)}`);
    }
  }
}

/**
 * Create the bot core: dispatch table, built-in admin commands and the
 * gateway wiring. Nothing connects until `start()`.
 */
export function createBot(config: BotConfig, options: CreateBotOptions): Bot {
  const { gateway, catalogue, onExit } = options;
  const dispatcher = new Dispatcher({
    prefix: config.prefix,
    caseInsensitive: config.caseInsensitive,
    ownerIds: config.ownerIds,
    now: options.now,
  });

  let state: BotState = "unauthenticated";
  let generation = 0;

  const context: ExtensionContext = {
    config,
    gateway,
    listCommands: () => dispatcher.listCommands(),
  };

  async function install(result: LoadResult): Promise<LoadResult> {
    const installed: BotExtension[] = [];
    const failures = [...result.failures];

    for (const ext of result.extensions) {
      try {
        await ext.init?.(context);
      } catch (err) {
        const failure = new ExtensionLoadError(ext.name, `init() failed: ${errorMessage(err)}`, { cause: err });
        console.error(`[digt-bot] ${failure.message}`);
        failures.push(failure);
        continue;
      }
      dispatcher.registerExtension(ext);
      installed.push(ext);
    }

    return { extensions: installed, failures };
  }

  const bot: Bot = {
    get state() {
      return state;
    },
    config,
    dispatcher,
    context,

    async loadExtensions() {
      return install(await loadExtensions(context, { generation, catalogue }));
    },

    async reload() {
      await disposeAll(dispatcher.clearExtensions());
      generation++;
      const result = await install(await loadExtensions(context, { generation, catalogue }));
      console.log(`[digt-bot] Reloaded ${result.extensions.length} extension(s)`);
      return result;
    },

    async start(token) {
      if (state !== "unauthenticated") {
        throw new Error(`Cannot start a bot that is ${state}`);
      }
      try {
        await gateway.login(token);
      } catch (err) {
        await gateway.destroy().catch((destroyErr: unknown) => {
          console.error(`[digt-bot] Gateway cleanup failed: ${errorMessage(destroyErr)}`);
        });
        throw new AuthenticationError(errorMessage(err), { cause: err });
      }
      if (state === "unauthenticated") state = "connected";
    },

    handle(event) {
      if (state === "shutdown") return Promise.resolve();

      if (event.type === "ready") {
        state = "running";
        gateway.setActivity(`${config.activity}${testingMarker(config)}`);
        console.log(`[digt-bot] Ready! Logged in as ${event.ready.user.tag} (${event.ready.user.id})`);
        if (config.devVersion) {
          console.log(
            "[digt-bot] WARNING: you are on the dev version. Set dev_version: false in the config if you're a user"
          );
        }
      }

      return dispatcher.enqueue(event);
    },

    async shutdown(exitCode = 0) {
      if (state === "shutdown") return;
      state = "shutdown";

      await disposeAll(dispatcher.clearExtensions());
      try {
        await gateway.destroy();
      } catch (err) {
        console.error(`[digt-bot] Gateway shutdown failed: ${errorMessage(err)}`);
      }

      console.log("[digt-bot] Shutdown complete");
      onExit?.(exitCode);
    },
  };

  for (const command of createAdminCommands({
    dispatcher,
    description: config.description,
    reload: () => bot.reload(),
    shutdown: (exitCode) => bot.shutdown(exitCode),
  })) {
    dispatcher.addBuiltin(command);
  }

  gateway.onEvent((event) => {
    void bot.handle(event);
  });

  return bot;
}

/**
 * Start the bot with graceful shutdown handling.
 */
export async function startBot(config: BotConfig): Promise<Bot> {
  const token = loadCredential(config.tokenFile);

  const bot = createBot(config, {
    gateway: createDiscordGateway({ initialActivity: startingActivity(config) }),
    onExit: (code) => process.exit(code),
  });

  const { extensions, failures } = await bot.loadExtensions();

  setupGracefulShutdown(() => bot.shutdown(0));

  console.log(`[digt-bot] Starting bot...`);
  console.log(`[digt-bot] Workspace: ${config.workspace}`);
  console.log(`[digt-bot] Prefix: ${config.prefix}`);
  console.log(
    `[digt-bot] Owners: ${config.ownerIds.length > 0 ? config.ownerIds.join(", ") : "(none, admin commands are unusable)"}`
  );
  console.log(
    `[digt-bot] Extensions: ${extensions.length > 0 ? extensions.map((e) => e.name).join(", ") : "(none)"}`
  );
  if (failures.length > 0) {
    console.error(`[digt-bot] Skipped extensions: ${failures.map((f) => f.extensionName).join(", ")}`);
  }

  await bot.start(token);
  return bot;
}

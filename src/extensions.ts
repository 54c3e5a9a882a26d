import { resolve as resolvePath } from "node:path";
import { existsSync, readdirSync, statSync } from "node:fs";
import { fileURLToPath, pathToFileURL } from "node:url";
import { builtinExtensions } from "./builtin/index.js";
import type { Command, CommandErrorHandler, CommandInvocation } from "./commands.js";
import { ExtensionLoadError, errorMessage, type CommandError } from "./errors.js";
import type { ChatGateway } from "./gateway.js";
import type {
  BotConfig,
  ExtensionConfig,
  InboundMessage,
  ReactionEvent,
  ReadyEvent,
} from "./types.js";

export interface CommandErrorEvent {
  invocation: CommandInvocation;
  error: CommandError;
}

export interface BotEventMap {
  ready: ReadyEvent;
  message: InboundMessage;
  reactionAdd: ReactionEvent;
  commandError: CommandErrorEvent;
}

export type BotEventName = keyof BotEventMap;

export const BOT_EVENTS: readonly BotEventName[] = ["ready", "message", "reactionAdd", "commandError"];

export type Listener<K extends BotEventName> = (event: BotEventMap[K]) => void | Promise<void>;

export type Listeners = { [K in BotEventName]?: Listener<K> };

export interface ExtensionContext {
  config: BotConfig;
  gateway: ChatGateway;
  /** Every command currently in the dispatch table, built-ins first. */
  listCommands(): Command[];
}

export interface BotExtension {
  name: string;
  commands?: Command[];
  listeners?: Listeners;

  /**
   * Handles errors from this extension's commands that have no `onError`
   * of their own. Global `commandError` listeners are skipped when present.
   */
  onCommandError?: CommandErrorHandler;

  /**
   * Optional startup hook. Called after registration, before login.
   */
  init?: (ctx: ExtensionContext) => void | Promise<void>;

  /**
   * Optional shutdown hook. Called on shutdown and before a reload.
   */
  dispose?: () => void | Promise<void>;
}

export type ExtensionFactory = (
  options: Record<string, unknown>,
  ctx: ExtensionContext
) => BotExtension | Promise<BotExtension>;

export interface LoadResult {
  extensions: BotExtension[];
  failures: ExtensionLoadError[];
}

function specifierOf(spec: ExtensionConfig): string {
  return typeof spec === "string" ? spec : spec.import;
}

function isFileLikeSpecifier(specifier: string): boolean {
  return (
    specifier.startsWith("file:") ||
    specifier.startsWith("./") ||
    specifier.startsWith("../") ||
    specifier.startsWith("/") ||
    specifier.endsWith(".js") ||
    specifier.endsWith(".mjs") ||
    specifier.endsWith(".ts")
  );
}

function toImportTarget(config: BotConfig, specifier: string, generation: number): string {
  if (specifier.startsWith("file:")) return specifier;

  if (isFileLikeSpecifier(specifier)) {
    const url = pathToFileURL(resolvePath(config.workspace, specifier));
    // A fresh query string makes `reload` evaluate the file again.
    if (generation > 0) url.searchParams.set("reload", String(generation));
    return url.href;
  }

  // Treat as a package specifier.
  return specifier;
}

function isBotExtension(value: unknown): value is BotExtension {
  if (typeof value !== "object" || value === null) return false;
  if (!("name" in value) || typeof value.name !== "string" || !value.name) return false;
  if ("commands" in value && value.commands !== undefined && !Array.isArray(value.commands)) {
    return false;
  }
  return true;
}

function pickExport(ns: unknown): unknown {
  if (typeof ns !== "object" || ns === null) return ns;
  if ("default" in ns && ns.default !== undefined) return ns.default;
  if ("extension" in ns && ns.extension !== undefined) return ns.extension;
  if ("createExtension" in ns && ns.createExtension !== undefined) return ns.createExtension;
  return ns;
}

export type ExtensionCatalogue = ReadonlyMap<string, ExtensionFactory>;

export interface LoadOptions {
  /** Bumped on every reload. */
  generation?: number;
  /** Named factories resolved before anything is imported. */
  catalogue?: ExtensionCatalogue;
}

async function instantiateExtension(
  spec: ExtensionConfig,
  ctx: ExtensionContext,
  generation: number,
  catalogue: ExtensionCatalogue
): Promise<BotExtension> {
  const importSpec = specifierOf(spec);
  const options = (typeof spec === "string" ? undefined : spec.options) ?? {};

  const named = catalogue.get(importSpec);
  if (named) return named(options, ctx);

  const ns: unknown = await import(toImportTarget(ctx.config, importSpec, generation));
  const exported = pickExport(ns);

  if (typeof exported === "function") {
    const created: unknown = await exported(options, ctx);
    if (!isBotExtension(created)) {
      throw new Error("factory did not return an extension object with a name");
    }
    return created;
  }

  if (isBotExtension(exported)) return exported;

  throw new Error("must export a default extension object or factory function");
}

/**
 * Expand extension specs: if a spec points to a directory, scan it for
 * .mjs/.js/.ts files.
 */
export function expandExtensionSpecs(config: BotConfig): ExtensionConfig[] {
  const expanded: ExtensionConfig[] = [];

  for (const spec of config.extensions) {
    const importSpec = specifierOf(spec);

    // Only expand file-like specifiers (not package or catalogue names).
    if (!isFileLikeSpecifier(importSpec) || importSpec.startsWith("file:")) {
      expanded.push(spec);
      continue;
    }

    const abs = resolvePath(config.workspace, importSpec);
    let isDir = false;
    try {
      isDir = statSync(abs).isDirectory();
    } catch {
      // Missing path: keep as-is, the import reports the failure.
      expanded.push(spec);
      continue;
    }

    if (!isDir) {
      expanded.push(spec);
      continue;
    }

    const files = readdirSync(abs)
      .filter((f) => (f.endsWith(".mjs") || f.endsWith(".js") || f.endsWith(".ts")) && !f.endsWith(".d.ts"))
      .sort();

    for (const file of files) {
      const filePath = resolvePath(abs, file);
      if (typeof spec === "string") {
        expanded.push(filePath);
      } else {
        // Propagate options/enabled from the directory spec to each file.
        expanded.push({ ...spec, import: filePath });
      }
    }
  }

  return expanded;
}

export interface ExtensionCheck {
  name: string;
  kind: "built-in" | "file" | "package";
  /** Packages are only resolved when the bot starts. */
  status: "ok" | "missing" | "unchecked";
  disabled: boolean;
}

/** Resolve each configured spec without importing it. */
export function checkExtensionSpecs(
  config: BotConfig,
  catalogue: ExtensionCatalogue = builtinExtensions
): ExtensionCheck[] {
  return expandExtensionSpecs(config).map((spec): ExtensionCheck => {
    const name = specifierOf(spec);
    const disabled = typeof spec !== "string" && spec.enabled === false;

    if (catalogue.has(name)) return { name, kind: "built-in", status: "ok", disabled };

    if (isFileLikeSpecifier(name)) {
      const path = name.startsWith("file:") ? fileURLToPath(name) : resolvePath(config.workspace, name);
      return { name, kind: "file", status: existsSync(path) ? "ok" : "missing", disabled };
    }

    return { name, kind: "package", status: "unchecked", disabled };
  });
}

/**
 * Load the configured extensions. A failing extension is logged and skipped;
 * the rest still load.
 */
export async function loadExtensions(
  ctx: ExtensionContext,
  options: LoadOptions = {}
): Promise<LoadResult> {
  const { generation = 0, catalogue = builtinExtensions } = options;
  const enabledSpecs = expandExtensionSpecs(ctx.config).filter(
    (s) => typeof s === "string" || s.enabled !== false
  );

  const extensions: BotExtension[] = [];
  const failures: ExtensionLoadError[] = [];
  const seen = new Set<string>();

  for (const spec of enabledSpecs) {
    const importSpec = specifierOf(spec);
    try {
      const ext = await instantiateExtension(spec, ctx, generation, catalogue);
      if (seen.has(ext.name)) {
        throw new ExtensionLoadError(ext.name, "an extension with that name is already loaded");
      }
      seen.add(ext.name);
      extensions.push(ext);
      console.log(`[digt-bot] Extension (${ext.name}) loaded successfully`);
    } catch (err) {
      const failure =
        err instanceof ExtensionLoadError
          ? err
          : new ExtensionLoadError(importSpec, errorMessage(err), { cause: err });
      failures.push(failure);
      console.error(`[digt-bot] ${failure.message}`);
    }
  }

  return { extensions, failures };
}

import { readFileSync, existsSync } from "node:fs";
import { resolve } from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import type { BotConfig } from "./types.js";

export const DEFAULT_CONFIG_FILE = "digt-bot.yaml";

const configSchema = z.object({
  workspace: z.string().min(1).default("."),
  token_file: z.string().min(1).default("./secrets/token.txt"),
  dev_version: z.boolean().default(true),
  prefix: z.string().min(1).default("silent_t!"),
  dev_prefix: z.string().min(1).default("devt!"),
  description: z.string().default(""),
  owner_ids: z
    .array(z.string().regex(/^\d+$/, "owner_ids must be quoted Discord user ids"))
    .default([]),
  case_insensitive: z.boolean().default(true),
  activity: z.string().min(1).default("Planetside 2"),
  extensions: z
    .array(
      z.union([
        z.string().min(1),
        z.object({
          import: z.string().min(1, "extensions[].import is required"),
          enabled: z.boolean().optional(),
          options: z.record(z.unknown()).optional(),
        }),
      ])
    )
    .default([]),
});

/**
 * Interpolate ${ENV_VAR} references in a string.
 */
function interpolateEnv(value: string): string {
  return value.replace(/\$\{(\w+)\}/g, (_, name: string) => {
    const val = process.env[name];
    if (val === undefined) {
      throw new Error(`Environment variable ${name} is not set`);
    }
    return val;
  });
}

/**
 * Recursively interpolate env vars in all string values.
 */
export function interpolateDeep(obj: unknown): unknown {
  if (typeof obj === "string") return interpolateEnv(obj);
  if (Array.isArray(obj)) return obj.map(interpolateDeep);
  if (obj !== null && typeof obj === "object") {
    // Use a null-prototype object to avoid prototype pollution via "__proto__".
    const result: Record<string, unknown> = Object.create(null);
    for (const [key, value] of Object.entries(obj)) {
      result[key] = interpolateDeep(value);
    }
    return result;
  }
  return obj;
}

/**
 * Validate an already parsed config document. `baseDir` anchors a relative
 * workspace.
 */
export function parseConfig(raw: unknown, baseDir = process.cwd()): BotConfig {
  const validated = configSchema.parse(interpolateDeep(raw ?? {}));

  const workspace = resolve(baseDir, validated.workspace);
  if (!existsSync(workspace)) {
    throw new Error(`Workspace directory does not exist: ${workspace}`);
  }

  return {
    workspace,
    tokenFile: resolve(workspace, validated.token_file),
    devVersion: validated.dev_version,
    prefix: validated.dev_version ? validated.dev_prefix : validated.prefix,
    description: validated.description,
    ownerIds: validated.owner_ids,
    caseInsensitive: validated.case_insensitive,
    activity: validated.activity,
    extensions: validated.extensions,
  };
}

/**
 * Load and validate config from a YAML file.
 */
export function loadConfig(configPath?: string): BotConfig {
  const resolvedPath = configPath
    ? resolve(configPath)
    : resolve(DEFAULT_CONFIG_FILE);

  if (!existsSync(resolvedPath)) {
    throw new Error(`Config file not found: ${resolvedPath}`);
  }

  const raw = readFileSync(resolvedPath, "utf-8");
  return parseConfig(yaml.load(raw), resolve(resolvedPath, ".."));
}

#!/usr/bin/env node

import { loadConfig } from "../src/config.js";
import { loadCredential } from "../src/credential.js";
import { startBot } from "../src/bot.js";
import { checkExtensionSpecs } from "../src/extensions.js";
import { runInit } from "../src/init.js";

const args = process.argv.slice(2);
const command = !args[0] || args[0] === "--config" ? "start" : args[0];

function getConfigPath(): string | undefined {
  const configIdx = args.indexOf("--config");
  if (configIdx !== -1 && args[configIdx + 1]) {
    return args[configIdx + 1];
  }
  return undefined;
}

async function cmdStart() {
  const config = loadConfig(getConfigPath());
  await startBot(config);
}

function cmdCheck() {
  console.log("[check] Validating config...");

  let config;
  try {
    config = loadConfig(getConfigPath());
    console.log(`  ✓ Config loaded`);
    console.log(`  ✓ Workspace: ${config.workspace}`);
    console.log(`  ✓ Prefix: ${config.prefix}${config.devVersion ? " (dev version)" : ""}`);
    console.log(`  ✓ Owners: ${config.ownerIds.length} user(s)`);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(`  ✗ Config error: ${msg}`);
    process.exit(1);
  }

  try {
    loadCredential(config.tokenFile);
    console.log(`  ✓ Token file: ${config.tokenFile}`);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(`  ✗ ${msg}`);
    process.exit(1);
  }

  const checks = checkExtensionSpecs(config);
  let missing = 0;
  for (const check of checks) {
    const mark = check.status === "ok" ? "✓" : check.status === "missing" ? "✗" : "?";
    const notes = [check.kind, check.status === "missing" ? "not found" : undefined, check.disabled ? "disabled" : undefined]
      .filter((n) => n !== undefined)
      .join(", ");
    const line = `  ${mark} Extension: ${check.name} (${notes})`;
    if (check.status === "missing") {
      missing++;
      console.error(line);
    } else {
      console.log(line);
    }
  }
  if (checks.length === 0) console.log("  ✓ Extensions: (none)");
  if (missing > 0) {
    console.error(`\n${missing} extension(s) could not be found.`);
    process.exit(1);
  }

  console.log("\nAll checks passed.");
}

// --- Main ---
switch (command) {
  case "start":
    cmdStart().catch((err) => {
      console.error("Fatal:", err instanceof Error ? err.message : err);
      process.exit(1);
    });
    break;

  case "check":
    cmdCheck();
    break;

  case "init":
    runInit(args[1] && !args[1].startsWith("--") ? args[1] : undefined).catch((err) => {
      console.error("Fatal:", err instanceof Error ? err.message : err);
      process.exit(1);
    });
    break;

  default:
    console.log(`digt-bot — Discord bot for the DIGT outfit

Usage:
  digt-bot [start] [--config path]   Start the bot
  digt-bot check [--config path]     Validate config, token file & extensions
  digt-bot init [dir]                Scaffold a bot workspace
`);
    if (command !== "help" && command !== "--help") {
      process.exit(1);
    }
    break;
}

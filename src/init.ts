import { createInterface } from "node:readline/promises";
import { stdin, stdout } from "node:process";
import { resolve, join } from "node:path";
import { existsSync, mkdirSync, writeFileSync } from "node:fs";
import { DEFAULT_CONFIG_FILE } from "./config.js";

export function configTemplate(ownerIds: string[], devVersion: boolean): string {
  return `token_file: ./secrets/token.txt
dev_version: ${devVersion}
prefix: "silent_t!"
dev_prefix: "devt!"
description: |
  This bot was designed for the DIGT Discord.
owner_ids:
${ownerIds.length > 0 ? ownerIds.map((id) => `  - "${id}"`).join("\n") : "  []"}
case_insensitive: true
activity: Planetside 2

extensions:
  - error-handler
  - import: reaction-roles
    options:
      storage: ./text_files/reaction_roles.json
  - ./extensions/    # auto-discover .mjs/.js files
`;
}

function exampleExtensionTemplate(): string {
  return `export default function createExtension(options, { gateway }) {
  return {
    name: "example",
    commands: [
      {
        name: "ping",
        description: "Ping the bot",
        async execute(invocation) {
          await invocation.reply("Pong!");
        },
      },
    ],
    listeners: {
      async ready({ user }) {
        console.log(\`[example] ready as \${user.tag}\`);
      },
    },
  };
}
`;
}

function gitignoreTemplate(): string {
  return `secrets/
text_files/
node_modules/
dist/
`;
}

export async function runInit(targetDir?: string): Promise<void> {
  const dir = resolve(targetDir || ".");
  const rl = createInterface({ input: stdin, output: stdout });

  try {
    console.log("[init] Setting up a digt-bot workspace\n");

    const configPath = join(dir, DEFAULT_CONFIG_FILE);
    if (existsSync(configPath)) {
      const overwrite = await rl.question(`${DEFAULT_CONFIG_FILE} already exists. Overwrite? (y/N) `);
      if (overwrite.toLowerCase() !== "y") {
        console.log("Aborted.");
        return;
      }
    }

    const token = (await rl.question("Bot token (leave empty to fill in secrets/token.txt later): ")).trim();

    const ownersAnswer = await rl.question("Owner user IDs (comma-separated): ");
    const ownerIds = ownersAnswer
      .split(",")
      .map((s) => s.trim())
      .filter((s) => /^\d+$/.test(s));

    if (ownerIds.length === 0) {
      console.log("  Warning: no owners, nobody will be able to use close or reload.");
    }

    const devAnswer = await rl.question("Run as the dev version? (Y/n) ");
    const devVersion = devAnswer.trim().toLowerCase() !== "n";

    mkdirSync(join(dir, "secrets"), { recursive: true });
    mkdirSync(join(dir, "extensions"), { recursive: true });

    writeFileSync(configPath, configTemplate(ownerIds, devVersion));
    console.log(`  Created ${DEFAULT_CONFIG_FILE}`);

    const tokenPath = join(dir, "secrets", "token.txt");
    if (token || !existsSync(tokenPath)) {
      writeFileSync(tokenPath, token ? `${token}\n` : "");
      console.log("  Wrote secrets/token.txt");
    }

    const examplePath = join(dir, "extensions", "example.mjs");
    if (!existsSync(examplePath)) {
      writeFileSync(examplePath, exampleExtensionTemplate());
      console.log("  Created extensions/example.mjs");
    } else {
      console.log("  Skipped extensions/example.mjs (already exists)");
    }

    const gitignorePath = join(dir, ".gitignore");
    if (!existsSync(gitignorePath)) {
      writeFileSync(gitignorePath, gitignoreTemplate());
      console.log("  Created .gitignore");
    } else {
      console.log("  Skipped .gitignore (already exists)");
    }

    console.log("\n--- Next steps ---");
    let step = 1;
    if (!token) console.log(`${step++}. Put the bot token in secrets/token.txt`);
    console.log(`${step++}. Validate: digt-bot check${targetDir ? ` --config ${configPath}` : ""}`);
    console.log(`${step++}. Start:    digt-bot start${targetDir ? ` --config ${configPath}` : ""}`);
  } finally {
    rl.close();
  }
}

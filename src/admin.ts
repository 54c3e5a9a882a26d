import { usage, type Command } from "./commands.js";
import type { Dispatcher } from "./dispatcher.js";
import type { LoadResult } from "./extensions.js";
import { listJoin } from "./utils/text.js";

export interface AdminHost {
  readonly dispatcher: Dispatcher;
  readonly description: string;
  reload(): Promise<LoadResult>;
  shutdown(exitCode?: number): Promise<void>;
}

function buildHelpText(host: AdminHost, builtins: Command[]): string {
  const { prefix } = host.dispatcher;
  const lines: string[] = [];
  if (host.description) lines.push(host.description, "");

  lines.push("Admin commands:");
  for (const c of builtins) lines.push(`${usage(prefix, c)} — ${c.description}`);

  const extra = host.dispatcher.listCommands().filter((c) => !builtins.includes(c));
  if (extra.length > 0) {
    lines.push("", "Extension commands:");
    for (const c of extra) lines.push(`${usage(prefix, c)} — ${c.description}`);
  }

  return lines.join("\n");
}

/**
 * Commands owned by the bot itself. They are registered as built-ins, so an
 * extension cannot replace them.
 */
export function createAdminCommands(host: AdminHost): Command[] {
  const builtins: Command[] = [
    {
      name: "close",
      description: "End me rightly.",
      ownerOnly: true,
      async execute(invocation) {
        await invocation.reply("Shutting down...");
        console.log(`[digt-bot] Bot closed by @${invocation.actor.tag}`);
        await host.shutdown(0);
      },
    },
    {
      name: "reload",
      description: "Reload every configured extension.",
      ownerOnly: true,
      async execute(invocation) {
        const { extensions, failures } = await host.reload();
        let reply = `Reloaded ${extensions.length} extension(s).`;
        if (failures.length > 0) {
          reply += ` Failed to load: ${listJoin(failures.map((f) => f.extensionName))}.`;
        }
        await invocation.reply(reply);
      },
    },
    {
      name: "extensions",
      description: "List the loaded extensions.",
      async execute(invocation) {
        const names = host.dispatcher.extensions.map((e) => e.name);
        await invocation.reply(
          names.length > 0 ? `Loaded extensions: ${names.join(", ")}` : "No extensions loaded."
        );
      },
    },
    {
      name: "help",
      description: "Show this message.",
      async execute(invocation) {
        await invocation.reply(buildHelpText(host, builtins));
      },
    },
  ];

  return builtins;
}

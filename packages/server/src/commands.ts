import type { ServerProcessState, OperationResult } from "@bedrock-herald/shared";
import { escapeHtml } from "./notifier.js";
import type { PlayerRegistry } from "./player-registry.js";
import type { CommandDispatch } from "./supervisor.js";

/** The part of the supervisor chat commands can reach. */
export interface SupervisorHandle {
  getState(): Promise<ServerProcessState>;
  start(): Promise<OperationResult>;
  stop(): Promise<OperationResult>;
  restart(): Promise<OperationResult>;
  sendCommand(text: string): Promise<CommandDispatch | null>;
}

export interface CommandContext {
  supervisor: SupervisorHandle;
  registry: PlayerRegistry;
}

export interface ChatCommand {
  name: string;
  usage: string;
  description: string;
  run: (args: string, ctx: CommandContext) => Promise<string>;
}

function describeResult(result: OperationResult): string {
  return `${result.ok ? "✅" : "❌"} ${escapeHtml(result.message)}`;
}

async function dispatch(text: string, ctx: CommandContext): Promise<string> {
  const sent = await ctx.supervisor.sendCommand(text);
  if (!sent) return "❌ Could not send the command (is the server running?)";
  // Delivery only: the console accepted the text, nothing confirms it ran.
  return `📨 Sent via ${sent.channel}: <code>${escapeHtml(sent.text)}</code>`;
}

export const chatCommands: readonly ChatCommand[] = [
  {
    name: "status",
    usage: "/status",
    description: "Server state and player count",
    run: async (_args, ctx) => {
      const state = await ctx.supervisor.getState();
      return `Server is <b>${state}</b>\nPlayers online: ${ctx.registry.size}`;
    },
  },
  {
    name: "players",
    usage: "/players",
    description: "Who is online",
    run: async (_args, ctx) => {
      const players = ctx.registry.list();
      if (players.length === 0) return "No players online";
      return [`Players online (${players.length}):`, ...players.map((p) => `• ${escapeHtml(p)}`)].join("\n");
    },
  },
  {
    name: "startserver",
    usage: "/startserver",
    description: "Start the server",
    run: async (_args, ctx) => describeResult(await ctx.supervisor.start()),
  },
  {
    name: "stop",
    usage: "/stop",
    description: "Stop the server",
    run: async (_args, ctx) => describeResult(await ctx.supervisor.stop()),
  },
  {
    name: "restart",
    usage: "/restart",
    description: "Stop, then start the server",
    run: async (_args, ctx) => describeResult(await ctx.supervisor.restart()),
  },
  {
    name: "cmd",
    usage: "/cmd <command>",
    description: "Type a command into the server console",
    run: async (args, ctx) => (args ? dispatch(args, ctx) : "Usage: /cmd &lt;command&gt;"),
  },
  {
    name: "say",
    usage: "/say <message>",
    description: "Broadcast a message in game",
    run: async (args, ctx) => (args ? dispatch(`say ${args}`, ctx) : "Usage: /say &lt;message&gt;"),
  },
  {
    name: "help",
    usage: "/help",
    description: "This list",
    run: async () => helpText(),
  },
];

export function helpText(): string {
  return [
    "<b>Commands</b>",
    ...chatCommands.map((c) => `${escapeHtml(c.usage)} - ${c.description}`),
  ].join("\n");
}

/** Split `/name@bot args` into its parts; `null` when the text is not a command. */
export function parseCommand(text: string): { name: string; args: string } | null {
  const match = /^\/([A-Za-z0-9_]+)(?:@\S+)?(?:\s+([\s\S]*))?$/.exec(text.trim());
  if (!match) return null;
  return { name: (match[1] ?? "").toLowerCase(), args: (match[2] ?? "").trim() };
}

/** Run a chat command and return the reply text. */
export async function handleCommand(text: string, ctx: CommandContext): Promise<string> {
  const parsed = parseCommand(text);
  if (!parsed) return "Commands start with /. Try /help";
  // Telegram clients send /start on their own when a chat first opens the bot.
  if (parsed.name === "start") return helpText();

  const command = chatCommands.find((c) => c.name === parsed.name);
  if (!command) return `Unknown command /${escapeHtml(parsed.name)}. Try /help`;

  console.log(`[BOT] /${command.name}${parsed.args ? ` ${parsed.args}` : ""}`);
  return command.run(parsed.args, ctx);
}

import path from "node:path";
import { fileURLToPath } from "node:url";
import { config as dotenvConfig } from "dotenv";
import Fastify from "fastify";
import fastifyWebSocket from "@fastify/websocket";
import {
  LOG_EVENT_KINDS,
  errorMessage,
  type LogEvent,
  type ServerProcessState,
  type ServerStatus,
} from "@bedrock-herald/shared";
import { TelegramClient, TelegramCommandSource, TelegramSink } from "@bedrock-herald/telegram";
import { loadConfig, type AppConfig } from "./config.js";
import { EventBus } from "./event-bus.js";
import { LogTailer } from "./log-tailer.js";
import { Monitor, type CommandChannel } from "./monitor.js";
import { Notifier } from "./notifier.js";
import { PlayerRegistry } from "./player-registry.js";
import { ShellProcessControl } from "./process-control.js";
import { ProcessSupervisor } from "./supervisor.js";

/** JSON messages sent from a WebSocket client to the server. */
export interface ClientMessage {
  type: "request_status";
}

/** JSON messages pushed to WebSocket clients. */
export type ServerMessage =
  | { type: "log_event"; event: LogEvent }
  | { type: "players"; players: string[] }
  | ({ type: "status" } & ServerStatus)
  | { type: "error"; message: string };

export function send(ws: { send: (data: string) => void }, msg: ServerMessage): void {
  ws.send(JSON.stringify(msg));
}

export function parseClientMessage(raw: string): ClientMessage | { error: string } {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return { error: "Invalid JSON" };
  }
  if (typeof data !== "object" || data === null || !("type" in data)) {
    return { error: "Message must be an object with a type" };
  }
  if (data.type === "request_status") return { type: "request_status" };
  return { error: `Unknown message type: ${String(data.type)}` };
}

export interface AppContext {
  bus: EventBus;
  registry: PlayerRegistry;
  supervisor: { getState(): Promise<ServerProcessState> };
}

async function currentStatus(ctx: AppContext): Promise<ServerStatus> {
  const players = ctx.registry.list();
  return { state: await ctx.supervisor.getState(), players, playerCount: players.length };
}

/** Create and configure the Fastify app (without starting it). */
export async function buildApp(ctx: AppContext) {
  const app = Fastify({ logger: false });
  await app.register(fastifyWebSocket);

  app.get("/api/health", async () => ({ ok: true }));

  app.get("/api/status", async () => currentStatus(ctx));

  app.get("/api/players", async () => ({ players: ctx.registry.list() }));

  app.get("/ws", { websocket: true }, (socket) => {
    console.log("[HTTP] WebSocket client connected");

    const unsubscribers = LOG_EVENT_KINDS.map((kind) =>
      ctx.bus.subscribe(kind, (event) => send(socket, { type: "log_event", event })),
    );
    const onPlayers = (players: string[]) => send(socket, { type: "players", players });
    ctx.registry.on("changed", onPlayers);

    const handle = async (raw: string): Promise<void> => {
      const msg = parseClientMessage(raw);
      if ("error" in msg) {
        send(socket, { type: "error", message: msg.error });
        return;
      }
      try {
        send(socket, { type: "status", ...(await currentStatus(ctx)) });
      } catch (err) {
        send(socket, { type: "error", message: `Status request failed: ${errorMessage(err)}` });
      }
    };

    socket.on("message", (raw) => {
      void handle(raw.toString());
    });

    socket.on("close", () => {
      console.log("[HTTP] WebSocket client disconnected");
      for (const unsubscribe of unsubscribers) unsubscribe();
      ctx.registry.off("changed", onPlayers);
    });
  });

  return app;
}

/**
 * Check the bot token and set up notifications and chat commands.
 * Resolves to `null` when Telegram is not configured or cannot be reached;
 * the rest of the monitor runs without it.
 */
export async function connectTelegram(config: AppConfig): Promise<CommandChannel | null> {
  const telegram = config.telegram;
  if (!telegram) {
    console.warn("[TELEGRAM] TELEGRAM_BOT_TOKEN or TELEGRAM_CHAT_ID not set, notifications and commands are off");
    return null;
  }

  const client = new TelegramClient(telegram.botToken);
  try {
    const me = await client.getMe();
    console.log(`[TELEGRAM] Connected as @${me.username ?? me.first_name}`);
  } catch (err) {
    console.error(`[TELEGRAM] Could not reach Telegram (${errorMessage(err)}), notifications and commands are off`);
    return null;
  }

  const sink = new TelegramSink(client, telegram.chatId);
  const source = new TelegramCommandSource(client);
  try {
    await source.skipBacklog();
  } catch (err) {
    console.warn(`[TELEGRAM] Could not skip queued updates: ${errorMessage(err)}`);
  }
  return { source, sink, allowed: telegram.allowedChatIds };
}

export interface Herald {
  monitor: Monitor;
  registry: PlayerRegistry;
  /** Stop the loops and the HTTP API and detach every listener. */
  shutdown(): Promise<void>;
}

/** Wire every component from `config` and start monitoring. */
export async function startHerald(config: AppConfig): Promise<Herald> {
  const bus = new EventBus();
  const registry = new PlayerRegistry();
  const detachRegistry = registry.attach(bus);

  const supervisor = new ProcessSupervisor({
    control: new ShellProcessControl({ portProtocol: config.portProtocol }),
    bus,
    serverDir: config.serverDir,
    executable: config.executable,
    processName: config.processName,
    sessionName: config.sessionName,
    port: config.port,
    logPath: config.logPath,
    settleMs: config.startSettleMs,
    gracefulStopChecks: config.stopTimeoutSeconds,
  });

  const commands = await connectTelegram(config);
  const notifier = commands ? new Notifier(commands.sink) : null;
  const detachNotifier = notifier?.attach(bus, registry);

  const monitor = new Monitor({
    tailer: new LogTailer(config.logPath),
    bus,
    registry,
    supervisor,
    commands: commands ?? undefined,
    logPollIntervalMs: config.logPollIntervalMs,
    reconcileIntervalMs: config.reconcileIntervalMs,
    autoStart: config.autoStart,
  });
  await monitor.start();

  const app = config.http ? await buildApp({ bus, registry, supervisor }) : null;
  if (app && config.http) {
    await app.listen({ port: config.http.port, host: config.http.host });
    console.log(`[HTTP] Listening on http://${config.http.host}:${config.http.port}`);
  }

  await notifier?.notify(`📡 Monitoring started (${registry.size} online)`);

  return {
    monitor,
    registry,
    async shutdown() {
      await monitor.stop();
      await app?.close();
      detachNotifier?.();
      detachRegistry();
    },
  };
}

async function main(): Promise<void> {
  dotenvConfig();
  const herald = await startHerald(loadConfig());

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      console.log(`[MONITOR] ${signal} received, shutting down`);
      herald.shutdown().catch((err) => {
        console.error("Shutdown failed:", err);
        process.exitCode = 1;
      });
    });
  }
}

// Only auto-start when this file is the entry point (not when imported by tests).
const isMain =
  process.argv[1] && path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url));

if (isMain) {
  main().catch((err) => {
    console.error("Failed to start:", err);
    process.exit(1);
  });
}

import path from "node:path";
import type { PortProtocol } from "./process-control.js";

export class ConfigError extends Error {
  constructor(
    readonly variable: string,
    message: string,
  ) {
    super(`${variable}: ${message}`);
    this.name = "ConfigError";
  }
}

export interface TelegramConfig {
  botToken: string;
  chatId: string;
  /** Chats whose commands are obeyed. */
  allowedChatIds: string[];
}

export interface AppConfig {
  serverDir: string;
  executable: string;
  processName: string;
  sessionName: string;
  port: number;
  portProtocol: PortProtocol;
  logPath: string;
  logPollIntervalMs: number;
  reconcileIntervalMs: number;
  startSettleMs: number;
  stopTimeoutSeconds: number;
  autoStart: boolean;
  /** `null` when credentials are missing; notifications and commands are then off. */
  telegram: TelegramConfig | null;
  /** `null` when `HTTP_PORT=0`. */
  http: { host: string; port: number } | null;
}

type Env = Record<string, string | undefined>;

function read(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readInt(env: Env, name: string, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
  const raw = read(env, name);
  if (raw === undefined) return fallback;
  if (!/^\d+$/.test(raw)) throw new ConfigError(name, `expected a whole number, got "${raw}"`);
  const value = Number(raw);
  if (value < min || value > max) throw new ConfigError(name, `must be between ${min} and ${max}, got ${value}`);
  return value;
}

function readBool(env: Env, name: string, fallback: boolean): boolean {
  const raw = read(env, name)?.toLowerCase();
  if (raw === undefined) return fallback;
  if (["1", "true", "yes", "on"].includes(raw)) return true;
  if (["0", "false", "no", "off"].includes(raw)) return false;
  throw new ConfigError(name, `expected true or false, got "${raw}"`);
}

function readProtocol(env: Env): PortProtocol {
  const raw = read(env, "SERVER_PORT_PROTOCOL")?.toLowerCase() ?? "udp";
  if (raw === "udp" || raw === "tcp") return raw;
  throw new ConfigError("SERVER_PORT_PROTOCOL", `expected udp or tcp, got "${raw}"`);
}

function readTelegram(env: Env): TelegramConfig | null {
  const botToken = read(env, "TELEGRAM_BOT_TOKEN");
  const chatId = read(env, "TELEGRAM_CHAT_ID");
  if (!botToken || !chatId) return null;

  const allowed = (read(env, "TELEGRAM_ALLOWED_CHAT_IDS") ?? chatId)
    .split(",")
    .map((id) => id.trim())
    .filter((id) => id.length > 0);
  return { botToken, chatId, allowedChatIds: allowed };
}

/** Read settings from the environment. Throws `ConfigError` on a malformed value. */
export function loadConfig(env: Env = process.env): AppConfig {
  const serverDir = path.resolve(read(env, "SERVER_DIR") ?? "/home/ubuntu/minecraft-bedrock");
  const httpPort = readInt(env, "HTTP_PORT", 8080, 0, 65535);

  return {
    serverDir,
    executable: read(env, "SERVER_EXECUTABLE") ?? "./bedrock_server",
    processName: read(env, "SERVER_PROCESS_NAME") ?? "bedrock_server",
    sessionName: read(env, "SESSION_NAME") ?? "minecraft",
    port: readInt(env, "SERVER_PORT", 19132, 1, 65535),
    portProtocol: readProtocol(env),
    logPath: path.resolve(serverDir, read(env, "LOG_PATH") ?? "logs.txt"),
    logPollIntervalMs: readInt(env, "LOG_POLL_INTERVAL_MS", 1000, 1),
    reconcileIntervalMs: readInt(env, "RECONCILE_INTERVAL_MS", 300_000, 1),
    startSettleMs: readInt(env, "START_SETTLE_MS", 5000, 0),
    stopTimeoutSeconds: readInt(env, "STOP_TIMEOUT_SECONDS", 10, 0),
    autoStart: readBool(env, "AUTO_START", false),
    telegram: readTelegram(env),
    http: httpPort === 0 ? null : { host: read(env, "HTTP_HOST") ?? "127.0.0.1", port: httpPort },
  };
}

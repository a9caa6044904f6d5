/** A structured event derived from one server log line or a supervisor action. */
export type LogEvent =
  | { readonly kind: "player_joined"; readonly name: string }
  | { readonly kind: "player_left"; readonly name: string }
  | { readonly kind: "chat_message"; readonly name: string; readonly text: string }
  | { readonly kind: "server_started" }
  | { readonly kind: "server_stopped" };

export type LogEventKind = LogEvent["kind"];

/** The member of the `LogEvent` union with the given kind. */
export type LogEventOf<K extends LogEventKind> = Extract<LogEvent, { kind: K }>;

export const LOG_EVENT_KINDS: readonly LogEventKind[] = [
  "player_joined",
  "player_left",
  "chat_message",
  "server_started",
  "server_stopped",
];

export function playerJoined(name: string): LogEvent {
  return Object.freeze({ kind: "player_joined", name });
}

export function playerLeft(name: string): LogEvent {
  return Object.freeze({ kind: "player_left", name });
}

export function chatMessage(name: string, text: string): LogEvent {
  return Object.freeze({ kind: "chat_message", name, text });
}

export const SERVER_STARTED: LogEvent = Object.freeze({ kind: "server_started" });
export const SERVER_STOPPED: LogEvent = Object.freeze({ kind: "server_stopped" });

/**
 * Normalise a player name taken from a log line: surrounding whitespace and a
 * trailing separator (`,` `;` `:`) are removed, case is kept.
 * Returns `null` when nothing is left.
 */
export function normalizePlayerName(raw: string): string | null {
  const name = raw.trim().replace(/[,;:]+$/, "").trim();
  return name.length > 0 ? name : null;
}

/** Lifecycle state of the supervised server process. */
export type ServerProcessState = "stopped" | "starting" | "running" | "stopping";

/** Outcome of a supervisor operation. */
export interface OperationResult {
  ok: boolean;
  message: string;
}

/** Snapshot served by the status API and the `/status` chat command. */
export interface ServerStatus {
  state: ServerProcessState;
  players: string[];
  playerCount: number;
}

/** Where notifications go. The core only looks at whether `send` succeeded. */
export interface NotificationSink {
  send(text: string, destination?: string): Promise<boolean>;
}

/** A slash command received from the chat, tagged with where to reply. */
export interface InboundCommand {
  id: number;
  text: string;
  destination: string;
  sender?: string;
}

/**
 * Yields inbound commands in order. Each `poll` acknowledges what it returned
 * by advancing a monotonic cursor, so a command is never delivered twice.
 */
export interface CommandSource {
  poll(signal?: AbortSignal): Promise<InboundCommand[]>;
}

/** Render anything thrown as a one-line message. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

import {
  chatMessage,
  normalizePlayerName,
  playerJoined,
  playerLeft,
  type LogEvent,
} from "@bedrock-herald/shared";

// Compiled once at module load; every tailed line goes through these.

/**
 * Leading header groups written by the server or a wrapper script:
 * `[2024-05-01 10:00:00:123 INFO]`, `[12:34:56] [Server thread/INFO]:`, `[INFO]`.
 * Only groups that start with a digit or carry a level word are headers, so
 * tags such as `[CHAT]` survive.
 */
const HEADER_RE =
  /^(?:\[(?:\d[^\]]*|[^\]]*\b(?:TRACE|DEBUG|INFO|WARN|WARNING|ERROR)\b[^\]]*)\]\s*:?\s*)+/;

// Names in the generic "joined/left the game" forms cannot contain these,
// which keeps chat such as "<Bob> I joined the game" out of the join path.
const NAME = "([^<>\\[\\]:]+?)";

// Variants are listed newest format first; the first match within a kind wins.
const JOIN_PATTERNS: readonly RegExp[] = [
  /Player connected:\s*(.+?)(?:,|$)/,
  /Player (.+?) has connected/,
  /(?:Player|Client) (.+?) connected/,
  new RegExp(`^${NAME} joined the game\\.?$`),
];

const LEAVE_PATTERNS: readonly RegExp[] = [
  /Player disconnected:\s*(.+?)(?:,|$)/,
  /Player (.+?) has disconnected/,
  /(?:Player|Client) (.+?) disconnected/,
  new RegExp(`^${NAME} left the game\\.?$`),
];

const CHAT_PATTERNS: readonly RegExp[] = [
  /\[CHAT\]\s*(.+?):\s(.*)$/,
  /^(.+?) says:\s(.*)$/,
  /^<(.+?)>\s(.*)$/,
];

/** Remove timestamp and level headers from the front of a log line. */
export function stripLogHeader(line: string): string {
  return line.trim().replace(HEADER_RE, "").trim();
}

function matchName(body: string, patterns: readonly RegExp[]): string | null {
  for (const pattern of patterns) {
    const match = pattern.exec(body);
    if (!match) continue;
    const name = normalizePlayerName(match[1] ?? "");
    if (name) return name;
  }
  return null;
}

function matchChat(body: string): { name: string; text: string } | null {
  for (const pattern of CHAT_PATTERNS) {
    const match = pattern.exec(body);
    if (!match) continue;
    const name = normalizePlayerName(match[1] ?? "");
    const text = (match[2] ?? "").trim();
    if (name && text) return { name, text };
  }
  return null;
}

/**
 * Classify a single server log line.
 *
 * Kinds are tried in a fixed order (join, leave, chat) and the first hit
 * wins, so a line yields at most one event. Lines that match nothing yield
 * `null`. Supported formats, after the header is stripped:
 *
 * ```
 * Player connected: Steve, xuid: 2535…      Player disconnected: Steve, xuid: …
 * Player Steve has connected                Player Steve has disconnected
 * Client Steve connected                    Client Steve disconnected
 * Steve joined the game                     Steve left the game
 * [CHAT] Steve: hello      Steve says: hello      <Steve> hello
 * ```
 */
export function classify(line: string): LogEvent | null {
  const body = stripLogHeader(line);
  if (!body) return null;

  const joined = matchName(body, JOIN_PATTERNS);
  if (joined) return playerJoined(joined);

  const left = matchName(body, LEAVE_PATTERNS);
  if (left) return playerLeft(left);

  const chat = matchChat(body);
  if (chat) return chatMessage(chat.name, chat.text);

  return null;
}

/**
 * Replay log lines through the join/leave patterns and return who is still
 * online at the end, sorted. A player who left and rejoined counts as online.
 */
export function extractPresence(lines: Iterable<string>): string[] {
  const online = new Set<string>();
  for (const line of lines) {
    const event = classify(line);
    if (event?.kind === "player_joined") online.add(event.name);
    else if (event?.kind === "player_left") online.delete(event.name);
  }
  return [...online].sort();
}

import { EventEmitter } from "node:events";
import { mkdir, open, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import { errorMessage } from "@bedrock-herald/shared";

const DEFAULT_MAX_CHUNK_BYTES = 1024 * 1024;
const DEFAULT_TAIL_BYTES = 256 * 1024;
const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;

export interface LogTailerOptions {
  /** Upper bound on bytes read per poll; the rest is picked up next poll. */
  maxChunkBytes?: number;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * Incrementally reads a growing log file.
 *
 * Each `poll()` returns the complete lines appended since the previous poll.
 * Bytes after the last newline are held back until their line is finished.
 * A file that shrinks, or is replaced by a new file, is read again from the
 * start.
 *
 * Events:
 * - `"unavailable"`: the file does not exist (emitted on every such poll)
 * - `"truncated"`: the position was reset to 0
 * - `"error"`: a read failed; only emitted when someone listens
 */
export class LogTailer extends EventEmitter {
  private _position = 0;
  private inode: number | null = null;
  private pending: Buffer = Buffer.alloc(0);
  private missing = false;
  private readonly maxChunkBytes: number;

  constructor(
    readonly filePath: string,
    options: LogTailerOptions = {},
  ) {
    super();
    this.maxChunkBytes = options.maxChunkBytes ?? DEFAULT_MAX_CHUNK_BYTES;
  }

  /** Byte offset of the next unread byte. */
  get position(): number {
    return this._position;
  }

  /** Bytes of an unfinished trailing line waiting for its newline. */
  get pendingBytes(): number {
    return this.pending.length;
  }

  reset(): void {
    this._position = 0;
    this.pending = Buffer.alloc(0);
  }

  /** Create the file (and its directory) if it does not exist. */
  async ensureFile(): Promise<boolean> {
    try {
      await mkdir(path.dirname(this.filePath), { recursive: true });
      // "a" creates the file without truncating an existing one.
      await writeFile(this.filePath, "", { flag: "a", mode: 0o644 });
      return true;
    } catch (err) {
      console.error(`[TAIL] Could not create ${this.filePath}: ${errorMessage(err)}`);
      return false;
    }
  }

  /** Skip whatever the file already holds and only report lines written from now on. */
  async prime(): Promise<void> {
    try {
      const info = await stat(this.filePath);
      this._position = info.size;
      this.inode = info.ino;
      this.pending = Buffer.alloc(0);
      console.log(`[TAIL] Tailing ${this.filePath} from byte ${info.size}`);
    } catch (err) {
      this.reset();
      if (!isNotFound(err)) {
        console.warn(`[TAIL] Could not stat ${this.filePath}: ${errorMessage(err)}`);
      }
    }
  }

  async poll(): Promise<string[]> {
    let size: number;
    let inode: number;
    try {
      const info = await stat(this.filePath);
      size = info.size;
      inode = info.ino;
    } catch (err) {
      if (isNotFound(err)) {
        this.markMissing();
      } else {
        this.reportError("stat", err);
      }
      return [];
    }

    if (this.missing) {
      this.missing = false;
      console.log(`[TAIL] ${this.filePath} is available again`);
    }

    const replaced = this.inode !== null && inode !== this.inode;
    this.inode = inode;
    if (replaced || size < this._position) {
      console.log(`[TAIL] ${this.filePath} was ${replaced ? "replaced" : "truncated"}, reading from the start`);
      this.reset();
      this.emit("truncated");
    }

    if (size <= this._position) return [];

    const length = Math.min(size - this._position, this.maxChunkBytes);
    let chunk: Buffer;
    try {
      const handle = await open(this.filePath, "r");
      try {
        const buffer = Buffer.alloc(length);
        const { bytesRead } = await handle.read(buffer, 0, length, this._position);
        chunk = buffer.subarray(0, bytesRead);
      } finally {
        await handle.close();
      }
    } catch (err) {
      this.reportError("read", err);
      return [];
    }

    this._position += chunk.length;
    return this.takeLines(chunk);
  }

  private takeLines(chunk: Buffer): string[] {
    const data = this.pending.length > 0 ? Buffer.concat([this.pending, chunk]) : chunk;
    const lines: string[] = [];

    let start = 0;
    let newline = data.indexOf(NEWLINE, start);
    while (newline !== -1) {
      const end = newline > start && data[newline - 1] === CARRIAGE_RETURN ? newline - 1 : newline;
      // Invalid UTF-8 becomes U+FFFD instead of failing the read.
      const line = data.toString("utf8", start, end);
      if (line.trim().length > 0) lines.push(line);
      start = newline + 1;
      newline = data.indexOf(NEWLINE, start);
    }

    const rest = data.subarray(start);
    if (rest.length >= this.maxChunkBytes) {
      // A line this long is not going to be finished; hand it over as is.
      lines.push(rest.toString("utf8"));
      this.pending = Buffer.alloc(0);
    } else {
      this.pending = Buffer.from(rest);
    }
    return lines;
  }

  private markMissing(): void {
    if (!this.missing) {
      this.missing = true;
      console.warn(`[TAIL] ${this.filePath} does not exist, will retry`);
    }
    this.emit("unavailable", this.filePath);
  }

  private reportError(op: string, err: unknown): void {
    console.warn(`[TAIL] Failed to ${op} ${this.filePath}: ${errorMessage(err)}`);
    if (this.listenerCount("error") > 0) this.emit("error", err);
  }
}

/**
 * Read the last `count` non-blank lines of a file, looking at no more than
 * `maxBytes` from its end. Throws if the file cannot be read.
 */
export async function readLastLines(
  filePath: string,
  count: number,
  maxBytes: number = DEFAULT_TAIL_BYTES,
): Promise<string[]> {
  const handle = await open(filePath, "r");
  try {
    const { size } = await handle.stat();
    const start = Math.max(0, size - maxBytes);
    const buffer = Buffer.alloc(size - start);
    const { bytesRead } = await handle.read(buffer, 0, buffer.length, start);
    const lines = buffer.toString("utf8", 0, bytesRead).split(/\r?\n/);
    // Reading from the middle of the file cuts the first line.
    if (start > 0) lines.shift();
    return lines.filter((line) => line.trim().length > 0).slice(-count);
  } finally {
    await handle.close();
  }
}

import { execFile, spawn } from "node:child_process";
import dgram from "node:dgram";
import { open } from "node:fs/promises";
import net from "node:net";
import path from "node:path";

export type SessionKind = "screen" | "tmux";
export type KillSignal = "SIGTERM" | "SIGKILL";
export type PortProtocol = "udp" | "tcp";

/** Multiplexers in the order they are tried for launching and for input. */
export const SESSION_KINDS: readonly SessionKind[] = ["screen", "tmux"];

/**
 * What the supervisor needs from the operating system.
 *
 * Probes resolve `true`/`false` for a definite answer and `null` when the
 * answer is unknown (tool missing, timed out, unexpected error). Actions
 * reject when they fail.
 */
export interface ProcessControl {
  findProcess(name: string): Promise<boolean | null>;
  hasSession(kind: SessionKind, session: string): Promise<boolean | null>;
  /** `true` when the port could be bound (nothing is listening on it). */
  isPortFree(port: number): Promise<boolean | null>;
  /** Start `executable` in a detached session, appending its output to `logPath`. */
  launchSession(kind: SessionKind, session: string, executable: string, cwd: string, logPath: string): Promise<void>;
  /** Start `executable` as a detached process, appending its output to `logPath`. */
  spawnDetached(executable: string, cwd: string, logPath: string): Promise<void>;
  injectInput(kind: SessionKind, session: string, text: string): Promise<void>;
  signalAll(name: string, signal: KillSignal): Promise<void>;
}

export interface ShellProcessControlOptions {
  portProtocol?: PortProtocol;
  /** Bind address used by the port probe. */
  bindAddress?: string;
  /** Limit for every child process and probe. */
  timeoutMs?: number;
}

interface RunResult {
  /** Exit code, or `null` when the process was killed or never ran. */
  code: number | null;
  stdout: string;
  stderr: string;
  /** The executable does not exist on this machine. */
  missing: boolean;
}

const DEFAULT_TIMEOUT_MS = 5_000;

// Runs $0 with stdout and stderr appended to $1 while the session still shows them.
const CAPTURE_SCRIPT = '"$0" 2>&1 | tee -a "$1"';

/** argv that runs `executable` with its output captured to `logPath`. */
export function captureCommand(executable: string, logPath: string): string[] {
  return ["sh", "-c", CAPTURE_SCRIPT, executable, logPath];
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * `ProcessControl` backed by the usual Linux tools: pgrep/pkill, GNU screen
 * and tmux. Names and paths are passed as argv, never spliced into shell text.
 */
export class ShellProcessControl implements ProcessControl {
  private readonly portProtocol: PortProtocol;
  private readonly bindAddress: string;
  private readonly timeoutMs: number;

  constructor(options: ShellProcessControlOptions = {}) {
    this.portProtocol = options.portProtocol ?? "udp";
    this.bindAddress = options.bindAddress ?? "0.0.0.0";
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async findProcess(name: string): Promise<boolean | null> {
    const { code } = await this.run("pgrep", ["-f", name]);
    // pgrep: 0 = matched, 1 = nothing matched, anything else = error
    if (code === 0) return true;
    if (code === 1) return false;
    return null;
  }

  async hasSession(kind: SessionKind, session: string): Promise<boolean | null> {
    if (kind === "screen") {
      // `screen -ls` exits non-zero on some versions even when sessions exist,
      // so the listing is what counts.
      const result = await this.run("screen", ["-ls"]);
      if (result.missing || result.code === null) return null;
      const pattern = new RegExp(`\\.${escapeRegExp(session)}\\s`);
      return pattern.test(`${result.stdout}\n${result.stderr}`);
    }

    const { code, missing } = await this.run("tmux", ["has-session", "-t", `=${session}`]);
    if (missing || code === null) return null;
    return code === 0;
  }

  isPortFree(port: number): Promise<boolean | null> {
    return this.portProtocol === "udp" ? this.probeUdp(port) : this.probeTcp(port);
  }

  async launchSession(
    kind: SessionKind,
    session: string,
    executable: string,
    cwd: string,
    logPath: string,
  ): Promise<void> {
    const command = captureCommand(executable, path.resolve(cwd, logPath));
    const args =
      kind === "screen"
        ? ["-dmS", session, ...command]
        : ["new-session", "-d", "-s", session, "-c", cwd, ...command];
    await this.runChecked(kind, args, cwd);
  }

  async spawnDetached(executable: string, cwd: string, logPath: string): Promise<void> {
    const output = await open(path.resolve(cwd, logPath), "a");
    try {
      await new Promise<void>((resolve, reject) => {
        const child = spawn(executable, [], {
          cwd,
          detached: true,
          stdio: ["ignore", output.fd, output.fd],
        });
        child.once("error", reject);
        child.once("spawn", () => {
          child.unref();
          resolve();
        });
      });
    } finally {
      // The child holds its own copy of the descriptor.
      await output.close();
    }
  }

  async injectInput(kind: SessionKind, session: string, text: string): Promise<void> {
    const args =
      kind === "screen"
        ? ["-S", session, "-p", "0", "-X", "stuff", `${text}\n`]
        : ["send-keys", "-t", session, text, "Enter"];
    await this.runChecked(kind, args);
  }

  async signalAll(name: string, signal: KillSignal): Promise<void> {
    const flag = signal === "SIGKILL" ? "-KILL" : "-TERM";
    await this.runChecked("pkill", [flag, "-f", name]);
  }

  private async runChecked(file: string, args: string[], cwd?: string): Promise<void> {
    const result = await this.run(file, args, cwd);
    if (result.missing) {
      throw new Error(`${file} is not installed`);
    }
    if (result.code !== 0) {
      const detail = result.stderr.trim() || result.stdout.trim();
      const status = result.code === null ? "was killed or timed out" : `exited with code ${result.code}`;
      throw new Error(`${file} ${status}${detail ? `: ${detail}` : ""}`);
    }
  }

  private run(file: string, args: string[], cwd?: string): Promise<RunResult> {
    return new Promise((resolve) => {
      execFile(
        file,
        args,
        { cwd, timeout: this.timeoutMs, encoding: "utf8", windowsHide: true },
        (err, stdout, stderr) => {
          if (!err) {
            resolve({ code: 0, stdout, stderr, missing: false });
            return;
          }
          const code: unknown = err.code;
          resolve({
            code: typeof code === "number" ? code : null,
            stdout,
            stderr,
            missing: code === "ENOENT",
          });
        },
      );
    });
  }

  private probeUdp(port: number): Promise<boolean | null> {
    return new Promise((resolve) => {
      const socket = dgram.createSocket({ type: "udp4", reuseAddr: false });
      let settled = false;

      const finish = (value: boolean | null) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        socket.close();
        resolve(value);
      };

      const timer = setTimeout(() => finish(null), this.timeoutMs);

      socket.once("error", (err: NodeJS.ErrnoException) => {
        finish(err.code === "EADDRINUSE" ? false : null);
      });
      socket.once("listening", () => finish(true));
      socket.bind({ port, address: this.bindAddress, exclusive: true });
    });
  }

  private probeTcp(port: number): Promise<boolean | null> {
    return new Promise((resolve) => {
      const server = net.createServer();
      let settled = false;

      const finish = (value: boolean | null) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        server.close();
        resolve(value);
      };

      const timer = setTimeout(() => finish(null), this.timeoutMs);

      server.once("error", (err: NodeJS.ErrnoException) => {
        finish(err.code === "EADDRINUSE" ? false : null);
      });
      server.once("listening", () => finish(true));
      server.listen(port, this.bindAddress);
    });
  }
}

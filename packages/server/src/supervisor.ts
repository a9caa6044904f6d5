import { setTimeout as delay } from "node:timers/promises";
import {
  SERVER_STARTED,
  SERVER_STOPPED,
  errorMessage,
  type OperationResult,
  type ServerProcessState,
} from "@bedrock-herald/shared";
import type { EventBus } from "./event-bus.js";
import { extractPresence } from "./log-parser.js";
import { readLastLines } from "./log-tailer.js";
import { SESSION_KINDS, type KillSignal, type ProcessControl, type SessionKind } from "./process-control.js";

/** A command handed to a session; delivery only, execution is never confirmed. */
export interface CommandDispatch {
  text: string;
  channel: SessionKind;
}

export interface SupervisorOptions {
  control: ProcessControl;
  bus: EventBus;
  /** Directory the server runs in. */
  serverDir: string;
  /** Executable, relative to `serverDir` or absolute. */
  executable: string;
  /** Pattern for process scans and signals. */
  processName: string;
  /** Name of the screen/tmux session. */
  sessionName: string;
  port: number;
  /** Log the tailer watches; every launch strategy appends the server's output to it. */
  logPath: string;
  stopCommand?: string;
  /** Wait after a launch before trusting the liveness probe. */
  settleMs?: number;
  /** How many probes to make after the in-band stop command. */
  gracefulStopChecks?: number;
  /** Interval between those probes. */
  stopPollMs?: number;
  termWaitMs?: number;
  killWaitMs?: number;
  /** Log lines replayed by `getOnlinePlayers`. */
  historyLines?: number;
}

interface LaunchStrategy {
  name: string;
  launch: () => Promise<void>;
}

/**
 * Starts, stops and talks to the game server process.
 *
 * Nothing about the process is cached: every decision re-probes the OS.
 * `start`, `stop` and `restart` are serialised behind one lock per instance.
 */
export class ProcessSupervisor {
  private readonly control: ProcessControl;
  private readonly bus: EventBus;
  private readonly serverDir: string;
  private readonly executable: string;
  private readonly processName: string;
  private readonly sessionName: string;
  private readonly port: number;
  private readonly logPath: string;
  private readonly stopCommand: string;
  private readonly settleMs: number;
  private readonly gracefulStopChecks: number;
  private readonly stopPollMs: number;
  private readonly termWaitMs: number;
  private readonly killWaitMs: number;
  private readonly historyLines: number;
  private readonly strategies: readonly LaunchStrategy[];

  private lock: Promise<void> = Promise.resolve();
  private transition: "starting" | "stopping" | null = null;

  constructor(options: SupervisorOptions) {
    this.control = options.control;
    this.bus = options.bus;
    this.serverDir = options.serverDir;
    this.executable = options.executable;
    this.processName = options.processName;
    this.sessionName = options.sessionName;
    this.port = options.port;
    this.logPath = options.logPath;
    this.stopCommand = options.stopCommand ?? "stop";
    this.settleMs = options.settleMs ?? 5_000;
    this.gracefulStopChecks = options.gracefulStopChecks ?? 10;
    this.stopPollMs = options.stopPollMs ?? 1_000;
    this.termWaitMs = options.termWaitMs ?? 3_000;
    this.killWaitMs = options.killWaitMs ?? 1_000;
    this.historyLines = options.historyLines ?? 1_000;

    this.strategies = [
      ...SESSION_KINDS.map((kind) => ({
        name: kind,
        launch: () =>
          this.control.launchSession(kind, this.sessionName, this.executable, this.serverDir, this.logPath),
      })),
      {
        name: "background process",
        launch: () => this.control.spawnDetached(this.executable, this.serverDir, this.logPath),
      },
    ];
  }

  /**
   * Probe whether the server is up: process table, then multiplexer
   * sessions, then the port. A scan that finds nothing is not proof of
   * absence; only a successful bind says "stopped". When nothing gives a
   * definite answer the server is assumed to be running, so that it is never
   * launched twice.
   */
  async isRunning(): Promise<boolean> {
    if ((await this.probe("process scan", () => this.control.findProcess(this.processName))) === true) {
      return true;
    }

    for (const kind of SESSION_KINDS) {
      if ((await this.probe(`${kind} session`, () => this.control.hasSession(kind, this.sessionName))) === true) {
        return true;
      }
    }

    const free = await this.probe("port bind", () => this.control.isPortFree(this.port));
    if (free !== null) return !free;

    console.warn("[SUPERVISOR] Every liveness probe was inconclusive, assuming the server is running");
    return true;
  }

  async getState(): Promise<ServerProcessState> {
    if (this.transition) return this.transition;
    return (await this.isRunning()) ? "running" : "stopped";
  }

  start(): Promise<OperationResult> {
    return this.exclusive("starting", () => this.doStart());
  }

  stop(): Promise<OperationResult> {
    return this.exclusive("stopping", () => this.doStop());
  }

  restart(): Promise<OperationResult> {
    return this.exclusive("stopping", async () => {
      const stopped = await this.doStop();
      if (!stopped.ok) return stopped;
      this.transition = "starting";
      return this.doStart();
    });
  }

  /**
   * Type a command into the server console. Resolves with the channel that
   * accepted it, or `null` when the server is down or no channel took it.
   */
  async sendCommand(text: string): Promise<CommandDispatch | null> {
    const command = text.trim();
    if (!command) return null;

    if (!(await this.isRunning())) {
      console.warn(`[SUPERVISOR] Not sending "${command}": server is not running`);
      return null;
    }
    return this.deliver(command);
  }

  /**
   * Players online according to recent log history, or `null` when the log
   * cannot be read.
   */
  async getOnlinePlayers(): Promise<string[] | null> {
    try {
      const lines = await readLastLines(this.logPath, this.historyLines);
      return extractPresence(lines);
    } catch (err) {
      console.warn(`[SUPERVISOR] Could not read player history from ${this.logPath}: ${errorMessage(err)}`);
      return null;
    }
  }

  private async doStart(): Promise<OperationResult> {
    if (await this.isRunning()) {
      console.log("[SUPERVISOR] Server is already running");
      return { ok: true, message: "Server is already running" };
    }

    console.log("[SUPERVISOR] Starting server...");
    const strategy = await this.launch();
    if (!strategy) {
      console.error("[SUPERVISOR] Every launch strategy failed");
      return { ok: false, message: "Could not launch the server" };
    }

    await delay(this.settleMs);

    // A launcher that exited cleanly says nothing about the server itself.
    if (!(await this.isRunning())) {
      console.error(`[SUPERVISOR] Server is not running after launching via ${strategy}`);
      return { ok: false, message: `Server did not come up after launching via ${strategy}` };
    }

    console.log(`[SUPERVISOR] Server started via ${strategy}`);
    this.bus.publish(SERVER_STARTED);
    return { ok: true, message: `Server started via ${strategy}` };
  }

  private async launch(): Promise<string | null> {
    for (const strategy of this.strategies) {
      try {
        await strategy.launch();
        return strategy.name;
      } catch (err) {
        console.warn(`[SUPERVISOR] Launch via ${strategy.name} failed: ${errorMessage(err)}`);
      }
    }
    return null;
  }

  private async doStop(): Promise<OperationResult> {
    if (!(await this.isRunning())) {
      console.log("[SUPERVISOR] Server is not running");
      return { ok: true, message: "Server is not running" };
    }

    console.log("[SUPERVISOR] Stopping server gracefully...");
    if (await this.deliver(this.stopCommand)) {
      for (let check = 0; check < this.gracefulStopChecks; check++) {
        await delay(this.stopPollMs);
        if (!(await this.isRunning())) return this.stopped("gracefully");
      }
      console.warn(`[SUPERVISOR] Server still running after "${this.stopCommand}"`);
    }

    if (await this.signalAndCheck("SIGTERM", this.termWaitMs)) return this.stopped("with SIGTERM");
    if (await this.signalAndCheck("SIGKILL", this.killWaitMs)) return this.stopped("with SIGKILL");

    console.error("[SUPERVISOR] Server is still running after SIGKILL");
    return { ok: false, message: "Server is still running after SIGKILL" };
  }

  private async signalAndCheck(signal: KillSignal, waitMs: number): Promise<boolean> {
    console.warn(`[SUPERVISOR] Sending ${signal} to ${this.processName}`);
    try {
      await this.control.signalAll(this.processName, signal);
    } catch (err) {
      // pkill also fails when nothing matched any more, so probe regardless.
      console.warn(`[SUPERVISOR] ${signal} failed: ${errorMessage(err)}`);
    }
    await delay(waitMs);
    return !(await this.isRunning());
  }

  private stopped(how: string): OperationResult {
    console.log(`[SUPERVISOR] Server stopped ${how}`);
    this.bus.publish(SERVER_STOPPED);
    return { ok: true, message: `Server stopped ${how}` };
  }

  private async deliver(text: string): Promise<CommandDispatch | null> {
    for (const channel of SESSION_KINDS) {
      try {
        await this.control.injectInput(channel, this.sessionName, text);
        console.log(`[SUPERVISOR] > ${text} (via ${channel})`);
        return { text, channel };
      } catch (err) {
        console.debug(`[SUPERVISOR] ${channel} did not accept input: ${errorMessage(err)}`);
      }
    }
    console.warn(`[SUPERVISOR] No session accepted "${text}"`);
    return null;
  }

  private async probe(label: string, run: () => Promise<boolean | null>): Promise<boolean | null> {
    try {
      return await run();
    } catch (err) {
      console.warn(`[SUPERVISOR] ${label} failed: ${errorMessage(err)}`);
      return null;
    }
  }

  private exclusive<T>(state: "starting" | "stopping", operation: () => Promise<T>): Promise<T> {
    const run = async (): Promise<T> => {
      this.transition = state;
      try {
        return await operation();
      } finally {
        this.transition = null;
      }
    };
    const result = this.lock.then(run);
    this.lock = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}

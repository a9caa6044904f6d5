import type { CommandSource, LogEvent, NotificationSink } from "@bedrock-herald/shared";
import { handleCommand, type SupervisorHandle } from "./commands.js";
import type { EventBus } from "./event-bus.js";
import { classify } from "./log-parser.js";
import type { LogTailer } from "./log-tailer.js";
import { runLoop } from "./loop.js";
import type { PlayerRegistry, ReconcileResult } from "./player-registry.js";

export interface MonitorSupervisor extends SupervisorHandle {
  getOnlinePlayers(): Promise<string[] | null>;
}

export interface CommandChannel {
  source: CommandSource;
  /** Where replies go. */
  sink: NotificationSink;
  /** Destinations whose commands are obeyed; everything else is ignored. */
  allowed: readonly string[];
}

export interface MonitorOptions {
  tailer: LogTailer;
  bus: EventBus;
  registry: PlayerRegistry;
  supervisor: MonitorSupervisor;
  commands?: CommandChannel;
  logPollIntervalMs?: number;
  reconcileIntervalMs?: number;
  /** Back-off after a failed command poll. */
  commandRetryMs?: number;
  autoStart?: boolean;
}

/** Runs the log poll, reconciliation and command loops. */
export class Monitor {
  private controller: AbortController | null = null;
  private loops: Promise<void>[] = [];

  constructor(private readonly options: MonitorOptions) {}

  get running(): boolean {
    return this.controller !== null;
  }

  async start(): Promise<void> {
    if (this.controller) return;
    const { tailer, supervisor } = this.options;

    await tailer.ensureFile();
    await tailer.prime();
    await this.reconcile();

    if (this.options.autoStart) {
      const result = await supervisor.start();
      if (!result.ok) console.error(`[MONITOR] Auto-start failed: ${result.message}`);
    }

    const controller = new AbortController();
    this.controller = controller;
    const { signal } = controller;

    this.loops = [
      runLoop("log poll", this.options.logPollIntervalMs ?? 1000, signal, () => this.pollOnce(), {
        initialDelay: true,
      }),
      runLoop("reconcile", this.options.reconcileIntervalMs ?? 300_000, signal, () => this.reconcile(), {
        initialDelay: true,
      }),
    ];
    if (this.options.commands) {
      // Long polls pace themselves; the interval only applies after a failure.
      this.loops.push(
        runLoop("command poll", 0, signal, () => this.pollCommands(signal), {
          errorDelayMs: this.options.commandRetryMs ?? 5000,
        }),
      );
    }
    console.log(`[MONITOR] Watching ${tailer.filePath}`);
  }

  async stop(): Promise<void> {
    const controller = this.controller;
    if (!controller) return;
    controller.abort();
    await Promise.all(this.loops);
    this.loops = [];
    this.controller = null;
    console.log("[MONITOR] Stopped");
  }

  /** Read new log lines and publish the events found in them. */
  async pollOnce(): Promise<LogEvent[]> {
    const lines = await this.options.tailer.poll();
    const events: LogEvent[] = [];
    for (const line of lines) {
      const event = classify(line);
      if (event) events.push(event);
    }
    this.options.bus.publishAll(events);
    return events;
  }

  /** Align the registry with log history. `null` when the history was unreadable. */
  async reconcile(): Promise<ReconcileResult | null> {
    const players = await this.options.supervisor.getOnlinePlayers();
    if (players === null) {
      console.warn("[MONITOR] Skipping reconciliation, player history unavailable");
      return null;
    }
    return this.options.registry.reconcile(players);
  }

  /** Fetch pending chat commands and answer the allowed ones. Returns how many were answered. */
  async pollCommands(signal?: AbortSignal): Promise<number> {
    const channel = this.options.commands;
    if (!channel) return 0;

    const commands = await channel.source.poll(signal);
    let answered = 0;
    for (const command of commands) {
      if (!channel.allowed.includes(command.destination)) {
        console.warn(`[BOT] Ignoring ${command.text} from unauthorised chat ${command.destination}`);
        continue;
      }
      const reply = await handleCommand(command.text, {
        supervisor: this.options.supervisor,
        registry: this.options.registry,
      });
      await channel.sink.send(reply, command.destination);
      answered++;
    }
    return answered;
  }
}

import { EventEmitter } from "node:events";
import { normalizePlayerName } from "@bedrock-herald/shared";
import type { EventBus } from "./event-bus.js";

export interface ReconcileResult {
  added: string[];
  removed: string[];
}

/**
 * The set of players currently believed to be online.
 *
 * Every mutation is a synchronous method, so the event path and the
 * reconciliation pass can never interleave inside one update.
 *
 * Events:
 * - `"joined"` / `"left"` (name): only for event-driven changes that actually
 *   changed the set; reconciliation and `clear()` are silent
 * - `"changed"` (players): after any change, with the sorted list
 */
export class PlayerRegistry extends EventEmitter {
  private readonly online = new Set<string>();

  get size(): number {
    return this.online.size;
  }

  has(name: string): boolean {
    const normalized = normalizePlayerName(name);
    return normalized !== null && this.online.has(normalized);
  }

  list(): string[] {
    return [...this.online].sort();
  }

  /** Returns `true` when the player was not already tracked. */
  add(name: string): boolean {
    const normalized = normalizePlayerName(name);
    if (normalized === null || this.online.has(normalized)) return false;

    this.online.add(normalized);
    console.log(`[REGISTRY] ${normalized} joined (${this.online.size} online)`);
    this.emit("joined", normalized);
    this.emit("changed", this.list());
    return true;
  }

  /** Returns `true` when the player was tracked. */
  remove(name: string): boolean {
    const normalized = normalizePlayerName(name);
    if (normalized === null || !this.online.delete(normalized)) return false;

    console.log(`[REGISTRY] ${normalized} left (${this.online.size} online)`);
    this.emit("left", normalized);
    this.emit("changed", this.list());
    return true;
  }

  /** Forget everyone, e.g. because the server stopped. Returns who was removed. */
  clear(): string[] {
    const removed = this.list();
    if (removed.length === 0) return removed;
    this.online.clear();
    console.log(`[REGISTRY] Cleared ${removed.length} player(s)`);
    this.emit("changed", []);
    return removed;
  }

  /**
   * Make the registry match `groundTruth`: tracked names missing from it are
   * removed and names it has that are not tracked are added.
   */
  reconcile(groundTruth: Iterable<string>): ReconcileResult {
    const truth = new Set<string>();
    for (const name of groundTruth) {
      const normalized = normalizePlayerName(name);
      if (normalized !== null) truth.add(normalized);
    }

    const removed = [...this.online].filter((name) => !truth.has(name)).sort();
    const added = [...truth].filter((name) => !this.online.has(name)).sort();

    for (const name of removed) this.online.delete(name);
    for (const name of added) this.online.add(name);

    if (added.length > 0 || removed.length > 0) {
      console.log(
        `[REGISTRY] Reconciled: +[${added.join(", ")}] -[${removed.join(", ")}] (${this.online.size} online)`,
      );
      this.emit("changed", this.list());
    } else {
      console.debug(`[REGISTRY] Reconciled: no drift (${this.online.size} online)`);
    }

    return { added, removed };
  }

  /** Keep the registry in step with join/leave events and server stops. */
  attach(bus: EventBus): () => void {
    const unsubscribers = [
      bus.subscribe("player_joined", (event) => {
        this.add(event.name);
      }),
      bus.subscribe("player_left", (event) => {
        this.remove(event.name);
      }),
      // A stopped server logs no leaves for the players it drops.
      bus.subscribe("server_stopped", () => {
        this.clear();
      }),
    ];
    return () => {
      for (const unsubscribe of unsubscribers) unsubscribe();
    };
  }
}

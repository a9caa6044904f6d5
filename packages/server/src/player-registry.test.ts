import { describe, it, expect, vi } from "vitest";
import { playerJoined, playerLeft, SERVER_STOPPED } from "@bedrock-herald/shared";
import { EventBus } from "./event-bus.js";
import { PlayerRegistry } from "./player-registry.js";

describe("PlayerRegistry", () => {
  // ─── add / remove ───

  it("tracks a player once however often they join", () => {
    const registry = new PlayerRegistry();
    const joined = vi.fn();
    registry.on("joined", joined);

    expect(registry.add("Bob")).toBe(true);
    expect(registry.add("Bob")).toBe(false);

    expect(registry.list()).toEqual(["Bob"]);
    expect(joined).toHaveBeenCalledOnce();
    expect(joined).toHaveBeenCalledWith("Bob");
  });

  it("normalises names", () => {
    const registry = new PlayerRegistry();
    registry.add(" Bob, ");
    expect(registry.has("Bob")).toBe(true);
    expect(registry.has("Bob;")).toBe(true);
    expect(registry.add("")).toBe(false);
  });

  it("only emits left for tracked players", () => {
    const registry = new PlayerRegistry();
    const left = vi.fn();
    registry.on("left", left);
    registry.add("Alex");

    expect(registry.remove("Steve")).toBe(false);
    expect(registry.remove("Alex")).toBe(true);
    expect(left).toHaveBeenCalledOnce();
    expect(registry.size).toBe(0);
  });

  it("lists players sorted", () => {
    const registry = new PlayerRegistry();
    registry.add("zed");
    registry.add("Alice");
    registry.add("Bob");
    expect(registry.list()).toEqual(["Alice", "Bob", "zed"]);
  });

  // ─── reconcile ───

  it("applies the difference to the ground truth without join events", () => {
    const registry = new PlayerRegistry();
    registry.add("Alice");
    registry.add("Bob");
    const joined = vi.fn();
    const left = vi.fn();
    const changed = vi.fn();
    registry.on("joined", joined);
    registry.on("left", left);
    registry.on("changed", changed);

    const result = registry.reconcile(["Carol", "Bob"]);

    expect(result).toEqual({ added: ["Carol"], removed: ["Alice"] });
    expect(registry.list()).toEqual(["Bob", "Carol"]);
    expect(joined).not.toHaveBeenCalled();
    expect(left).not.toHaveBeenCalled();
    expect(changed).toHaveBeenCalledOnce();
    expect(changed).toHaveBeenCalledWith(["Bob", "Carol"]);
  });

  it("emits nothing when there is no drift", () => {
    const registry = new PlayerRegistry();
    registry.add("Alice");
    const changed = vi.fn();
    registry.on("changed", changed);

    expect(registry.reconcile(["Alice"])).toEqual({ added: [], removed: [] });
    expect(changed).not.toHaveBeenCalled();
  });

  it("returns who was cleared", () => {
    const registry = new PlayerRegistry();
    registry.add("B");
    registry.add("A");
    expect(registry.clear()).toEqual(["A", "B"]);
    expect(registry.size).toBe(0);
  });

  // ─── attach ───

  it("follows join and leave events from the bus", () => {
    const bus = new EventBus();
    const registry = new PlayerRegistry();
    const joined = vi.fn();
    registry.on("joined", joined);
    registry.attach(bus);

    bus.publishAll([playerJoined("Bob"), playerJoined("Bob"), playerJoined("Alex"), playerLeft("Alex")]);

    expect(registry.list()).toEqual(["Bob"]);
    expect(joined).toHaveBeenCalledTimes(2);
  });

  it("empties when the server stops", () => {
    const bus = new EventBus();
    const registry = new PlayerRegistry();
    registry.attach(bus);
    bus.publish(playerJoined("Bob"));

    bus.publish(SERVER_STOPPED);

    expect(registry.size).toBe(0);
  });

  it("stops following the bus when detached", () => {
    const bus = new EventBus();
    const registry = new PlayerRegistry();
    const detach = registry.attach(bus);

    detach();
    bus.publish(playerJoined("Bob"));

    expect(registry.size).toBe(0);
  });
});

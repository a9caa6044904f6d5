import { describe, it, expect } from "vitest";
import { classify, extractPresence, stripLogHeader } from "./log-parser.js";

describe("stripLogHeader", () => {
  it("removes a bracketed timestamp and level", () => {
    expect(stripLogHeader("[2024-05-01 10:00:00:123 INFO] Player connected: Alice")).toBe(
      "Player connected: Alice",
    );
  });

  it("removes stacked header groups", () => {
    expect(stripLogHeader("[12:34:56] [Server thread/INFO]: Bob joined the game")).toBe("Bob joined the game");
  });

  it("keeps tags that are not headers", () => {
    expect(stripLogHeader("[CHAT] Steve: hi")).toBe("[CHAT] Steve: hi");
  });
});

describe("classify", () => {
  // ─── Joins ───

  it("parses a Bedrock connect line", () => {
    expect(classify("[2024-05-01 10:00:00:123 INFO] Player connected: Alice, xuid: 2535400000000001")).toEqual({
      kind: "player_joined",
      name: "Alice",
    });
  });

  it("parses the 'has connected' form", () => {
    expect(classify("Player Steve has connected")).toEqual({ kind: "player_joined", name: "Steve" });
  });

  it("parses a client connect line", () => {
    expect(classify("Client Steve connected")).toEqual({ kind: "player_joined", name: "Steve" });
  });

  it("parses 'joined the game' after a header", () => {
    expect(classify("[12:34:56] [Server thread/INFO]: Bob joined the game")).toEqual({
      kind: "player_joined",
      name: "Bob",
    });
  });

  it("drops a trailing separator from the name", () => {
    expect(classify("Player Carol; has connected")).toEqual({ kind: "player_joined", name: "Carol" });
  });

  it("returns frozen events", () => {
    expect(Object.isFrozen(classify("Player Steve has connected"))).toBe(true);
  });

  // ─── Leaves ───

  it("parses a Bedrock disconnect line", () => {
    expect(classify("Player disconnected: Alice, xuid: 2535400000000001")).toEqual({
      kind: "player_left",
      name: "Alice",
    });
  });

  it("parses 'left the game'", () => {
    expect(classify("Alice left the game")).toEqual({ kind: "player_left", name: "Alice" });
  });

  it("does not mistake a disconnect for a connect", () => {
    expect(classify("Client Steve disconnected")).toEqual({ kind: "player_left", name: "Steve" });
    expect(classify("Player Steve has disconnected")).toEqual({ kind: "player_left", name: "Steve" });
  });

  // ─── Chat ───

  it("parses a [CHAT] line", () => {
    expect(classify("[CHAT] Steve: hello there")).toEqual({
      kind: "chat_message",
      name: "Steve",
      text: "hello there",
    });
  });

  it("parses the 'says:' form", () => {
    expect(classify("Steve says: hi")).toEqual({ kind: "chat_message", name: "Steve", text: "hi" });
  });

  it("treats join phrases inside chat as chat", () => {
    expect(classify("<Bob> I joined the game")).toEqual({
      kind: "chat_message",
      name: "Bob",
      text: "I joined the game",
    });
  });

  it("ignores chat without text", () => {
    expect(classify("[CHAT] Steve:")).toBeNull();
  });

  // ─── Noise ───

  it("returns null for unrelated lines", () => {
    expect(classify("[INFO] Server started.")).toBeNull();
    expect(classify("Level Name: Bedrock level")).toBeNull();
  });

  it("returns null for blank lines", () => {
    expect(classify("")).toBeNull();
    expect(classify("   ")).toBeNull();
  });

  // ─── Determinism ───

  it("gives the same result for a line whatever was classified before it", () => {
    const batch = [
      "[2024-05-01 10:00:00:123 INFO] Player connected: Alice, xuid: 2535400000000001",
      "[CHAT] Steve: Player connected: Mallory",
      "Player disconnected: Alice, xuid: 2535400000000001",
      "Bob joined the game",
      "<Bob> says: gg",
      "Server started.",
      "",
      "Bob left the game",
    ];
    // Fixed shuffle so a failure reproduces.
    const shuffled = [5, 2, 7, 0, 4, 6, 1, 3].map((i) => batch[i] ?? "");

    const inOrder = new Map(batch.map((line) => [line, classify(line)]));
    const first = shuffled.map((line) => classify(line));
    const second = shuffled.map((line) => classify(line));

    expect(second).toEqual(first);
    expect(first).toEqual(shuffled.map((line) => inOrder.get(line)));
    expect(first[3]).toEqual({ kind: "player_joined", name: "Alice" });
  });
});

describe("extractPresence", () => {
  it("returns players who joined and have not left, sorted", () => {
    const lines = [
      "Player connected: Zed, xuid: 3",
      "Player connected: Alice, xuid: 1",
      "Player connected: Bob, xuid: 2",
      "Player disconnected: Alice, xuid: 1",
      "[INFO] Running AutoCompaction...",
    ];
    expect(extractPresence(lines)).toEqual(["Bob", "Zed"]);
  });

  it("counts a player who rejoined as online", () => {
    const lines = ["Alice joined the game", "Alice left the game", "Alice joined the game"];
    expect(extractPresence(lines)).toEqual(["Alice"]);
  });

  it("returns an empty list for no lines", () => {
    expect(extractPresence([])).toEqual([]);
  });
});

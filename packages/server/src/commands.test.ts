import { describe, it, expect, vi } from "vitest";
import type { OperationResult, ServerProcessState } from "@bedrock-herald/shared";
import { handleCommand, helpText, parseCommand, type CommandContext } from "./commands.js";
import { PlayerRegistry } from "./player-registry.js";
import type { CommandDispatch } from "./supervisor.js";

function context(players: string[] = []) {
  const ok = (message: string): OperationResult => ({ ok: true, message });
  const supervisor = {
    getState: vi.fn(async (): Promise<ServerProcessState> => "running"),
    start: vi.fn(async () => ok("Server started via screen")),
    stop: vi.fn(async () => ok("Server stopped gracefully")),
    restart: vi.fn(async () => ok("Server started via screen")),
    sendCommand: vi.fn(async (text: string): Promise<CommandDispatch | null> => ({ text, channel: "screen" })),
  };
  const registry = new PlayerRegistry();
  for (const name of players) registry.add(name);
  const ctx: CommandContext = { supervisor, registry };
  return { ctx, supervisor };
}

describe("parseCommand", () => {
  it("splits the name from its arguments", () => {
    expect(parseCommand("/say hello world")).toEqual({ name: "say", args: "hello world" });
  });

  it("drops a bot mention and lowercases the name", () => {
    expect(parseCommand("/CMD@herald_bot  list ")).toEqual({ name: "cmd", args: "list" });
  });

  it("returns null for text that is not a command", () => {
    expect(parseCommand("hello")).toBeNull();
    expect(parseCommand("/")).toBeNull();
  });
});

describe("handleCommand", () => {
  it("reports state and player count for /status", async () => {
    const { ctx } = context(["Alice"]);
    expect(await handleCommand("/status", ctx)).toBe("Server is <b>running</b>\nPlayers online: 1");
  });

  it("lists players for /players", async () => {
    const { ctx } = context(["Bob", "A<B"]);
    expect(await handleCommand("/players", ctx)).toBe("Players online (2):\n• A&lt;B\n• Bob");
  });

  it("says when nobody is online", async () => {
    const { ctx } = context();
    expect(await handleCommand("/players", ctx)).toBe("No players online");
  });

  it("runs lifecycle commands and reports the outcome", async () => {
    const { ctx, supervisor } = context();
    supervisor.stop.mockResolvedValueOnce({ ok: false, message: "Server is still running after SIGKILL" });

    expect(await handleCommand("/startserver", ctx)).toBe("✅ Server started via screen");
    expect(await handleCommand("/stop", ctx)).toBe("❌ Server is still running after SIGKILL");
    expect(await handleCommand("/restart", ctx)).toBe("✅ Server started via screen");
    expect(supervisor.restart).toHaveBeenCalledOnce();
  });

  it("answers the /start a new chat sends with help instead of launching", async () => {
    const { ctx, supervisor } = context();

    expect(await handleCommand("/start", ctx)).toBe(helpText());
    expect(supervisor.start).not.toHaveBeenCalled();
  });

  it("passes /cmd text to the console and reports delivery only", async () => {
    const { ctx, supervisor } = context();
    supervisor.sendCommand.mockResolvedValueOnce({ text: "list", channel: "tmux" });

    expect(await handleCommand("/cmd list", ctx)).toBe("📨 Sent via tmux: <code>list</code>");
    expect(supervisor.sendCommand).toHaveBeenCalledWith("list");
  });

  it("wraps /say text in a say command", async () => {
    const { ctx, supervisor } = context();
    expect(await handleCommand("/say hello <all>", ctx)).toBe("📨 Sent via screen: <code>say hello &lt;all&gt;</code>");
    expect(supervisor.sendCommand).toHaveBeenCalledWith("say hello <all>");
  });

  it("explains when a command could not be sent", async () => {
    const { ctx, supervisor } = context();
    supervisor.sendCommand.mockResolvedValueOnce(null);
    expect(await handleCommand("/cmd list", ctx)).toBe("❌ Could not send the command (is the server running?)");
  });

  it("shows usage when /cmd has no text", async () => {
    const { ctx, supervisor } = context();
    expect(await handleCommand("/cmd", ctx)).toBe("Usage: /cmd &lt;command&gt;");
    expect(supervisor.sendCommand).not.toHaveBeenCalled();
  });

  it("points unknown commands at /help", async () => {
    const { ctx } = context();
    expect(await handleCommand("/teleport", ctx)).toBe("Unknown command /teleport. Try /help");
    expect(await handleCommand("hi", ctx)).toBe("Commands start with /. Try /help");
  });

  it("answers /help with every command", async () => {
    const { ctx } = context();
    const reply = await handleCommand("/help", ctx);
    const lines = reply.split("\n");

    expect(reply).toBe(helpText());
    expect(lines[0]).toBe("<b>Commands</b>");
    expect(lines).toHaveLength(9);
    expect(lines).toContain("/cmd &lt;command&gt; - Type a command into the server console");
    expect(lines).toContain("/startserver - Start the server");
  });
});

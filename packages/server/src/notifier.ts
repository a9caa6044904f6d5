import { errorMessage, type NotificationSink } from "@bedrock-herald/shared";
import type { EventBus } from "./event-bus.js";
import type { PlayerRegistry } from "./player-registry.js";

/** Escape text for Telegram's HTML parse mode. */
export function escapeHtml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

export function formatJoin(name: string, online: number): string {
  return `🟢 <b>${escapeHtml(name)}</b> joined the server (${online} online)`;
}

export function formatLeave(name: string, online: number): string {
  return `🔴 <b>${escapeHtml(name)}</b> left the server (${online} online)`;
}

export function formatChat(name: string, text: string): string {
  return `💬 <b>${escapeHtml(name)}</b>: ${escapeHtml(text)}`;
}

/**
 * Forwards events to the notification sink.
 *
 * Joins and leaves come from the registry rather than the bus, so a player
 * who is already tracked does not produce a second join message. Every other
 * event is forwarded as it arrives; a repeated chat line is a real message.
 */
export class Notifier {
  constructor(private readonly sink: NotificationSink) {}

  attach(bus: EventBus, registry: PlayerRegistry): () => void {
    const onJoined = (name: string) => {
      void this.notify(formatJoin(name, registry.size));
    };
    const onLeft = (name: string) => {
      void this.notify(formatLeave(name, registry.size));
    };
    registry.on("joined", onJoined);
    registry.on("left", onLeft);

    const unsubscribers = [
      bus.subscribe("chat_message", async (event) => {
        await this.notify(formatChat(event.name, event.text));
      }),
      bus.subscribe("server_started", async () => {
        await this.notify("✅ Server started");
      }),
      bus.subscribe("server_stopped", async () => {
        await this.notify("🛑 Server stopped");
      }),
    ];

    return () => {
      registry.off("joined", onJoined);
      registry.off("left", onLeft);
      for (const unsubscribe of unsubscribers) unsubscribe();
    };
  }

  /** Send a text to the sink. Never rejects. */
  async notify(text: string): Promise<boolean> {
    try {
      const delivered = await this.sink.send(text);
      if (!delivered) console.warn(`[NOTIFY] Not delivered: ${text}`);
      return delivered;
    } catch (err) {
      console.error(`[NOTIFY] Sink failed: ${errorMessage(err)}`);
      return false;
    }
  }
}

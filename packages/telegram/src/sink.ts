import { errorMessage, type NotificationSink } from "@bedrock-herald/shared";
import type { TelegramClient } from "./client.js";

/** Delivers notifications as Telegram messages, by default to one chat. */
export class TelegramSink implements NotificationSink {
  constructor(
    private readonly client: Pick<TelegramClient, "sendMessage">,
    private readonly defaultChatId: string,
  ) {}

  async send(text: string, destination?: string): Promise<boolean> {
    const chatId = destination ?? this.defaultChatId;
    try {
      await this.client.sendMessage(chatId, text);
      return true;
    } catch (err) {
      console.error(`[TELEGRAM] Failed to send message to ${chatId}: ${errorMessage(err)}`);
      return false;
    }
  }
}

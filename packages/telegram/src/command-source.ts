import type { CommandSource, InboundCommand } from "@bedrock-herald/shared";
import type { TelegramClient, TelegramUpdate } from "./client.js";

const DEFAULT_LONG_POLL_SEC = 25;

export interface TelegramCommandSourceOptions {
  longPollSec?: number;
}

/**
 * Turns Bot API updates into inbound slash commands.
 *
 * `cursor` is the next update id to ask for. Passing it as `offset` confirms
 * every earlier update with Telegram, and updates below it are dropped
 * locally too, so a command is handed out at most once.
 */
export class TelegramCommandSource implements CommandSource {
  private _cursor = 0;
  private readonly longPollSec: number;

  constructor(
    private readonly client: Pick<TelegramClient, "getUpdates">,
    options: TelegramCommandSourceOptions = {},
  ) {
    this.longPollSec = options.longPollSec ?? DEFAULT_LONG_POLL_SEC;
  }

  get cursor(): number {
    return this._cursor;
  }

  /** Forget updates queued while the bot was offline. */
  async skipBacklog(): Promise<void> {
    const updates = await this.client.getUpdates({ offset: -1, timeoutSec: 0 });
    this.advance(updates);
  }

  async poll(signal?: AbortSignal): Promise<InboundCommand[]> {
    const updates = await this.client.getUpdates(
      {
        offset: this._cursor > 0 ? this._cursor : undefined,
        timeoutSec: this.longPollSec,
      },
      signal,
    );
    return this.advance(updates);
  }

  private advance(updates: TelegramUpdate[]): InboundCommand[] {
    const commands: InboundCommand[] = [];
    const ordered = [...updates].sort((a, b) => a.update_id - b.update_id);

    for (const update of ordered) {
      if (update.update_id < this._cursor) continue;
      this._cursor = update.update_id + 1;

      const message = update.message;
      const text = message?.text?.trim();
      if (!message || !text || !text.startsWith("/")) continue;

      commands.push({
        id: update.update_id,
        text,
        destination: String(message.chat.id),
        sender: message.from?.username ?? message.from?.first_name,
      });
    }

    return commands;
  }
}

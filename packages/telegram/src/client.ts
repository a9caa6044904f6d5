import { z } from "zod";

const DEFAULT_BASE_URL = "https://api.telegram.org";
const DEFAULT_TIMEOUT_MS = 10_000;

/* ─── Wire schemas ─── */

const ApiResponseSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
  error_code: z.number().optional(),
});

export const UserSchema = z.object({
  id: z.number(),
  is_bot: z.boolean(),
  first_name: z.string(),
  username: z.string().optional(),
});

export const MessageSchema = z.object({
  message_id: z.number(),
  date: z.number(),
  chat: z.object({ id: z.number(), type: z.string() }),
  from: UserSchema.optional(),
  text: z.string().optional(),
});

export const UpdateSchema = z.object({
  update_id: z.number(),
  message: MessageSchema.optional(),
});

export type TelegramUser = z.infer<typeof UserSchema>;
export type TelegramMessage = z.infer<typeof MessageSchema>;
export type TelegramUpdate = z.infer<typeof UpdateSchema>;

/** Raised when the Bot API answers `ok: false` or with a malformed body. */
export class TelegramApiError extends Error {
  constructor(
    readonly method: string,
    readonly code: number,
    description: string,
  ) {
    super(`${method} failed (${code}): ${description}`);
    this.name = "TelegramApiError";
  }
}

export interface TelegramClientOptions {
  baseUrl?: string;
  /** Per-request timeout for everything except long polls. */
  timeoutMs?: number;
}

export interface GetUpdatesOptions {
  offset?: number;
  /** Long-poll duration the Bot API holds the request open for. */
  timeoutSec?: number;
}

/**
 * Minimal Telegram Bot API client.
 *
 * Every call is a JSON `POST` to `<baseUrl>/bot<token>/<method>`. The envelope
 * (`{ ok, result }`) and each result are validated before use. The token is
 * never included in error messages.
 */
export class TelegramClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(
    private readonly token: string,
    options: TelegramClientOptions = {},
  ) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /** Check the token; resolves with the bot account. */
  getMe(): Promise<TelegramUser> {
    return this.call("getMe", {}, UserSchema);
  }

  sendMessage(chatId: string, text: string): Promise<TelegramMessage> {
    return this.call(
      "sendMessage",
      { chat_id: chatId, text, parse_mode: "HTML", disable_web_page_preview: true },
      MessageSchema,
    );
  }

  getUpdates(options: GetUpdatesOptions = {}, signal?: AbortSignal): Promise<TelegramUpdate[]> {
    const timeoutSec = options.timeoutSec ?? 0;
    const params: Record<string, unknown> = {
      timeout: timeoutSec,
      allowed_updates: ["message"],
    };
    if (options.offset !== undefined) params.offset = options.offset;

    // The HTTP request has to outlive the long poll it asks for.
    return this.call("getUpdates", params, z.array(UpdateSchema), {
      timeoutMs: timeoutSec * 1000 + this.timeoutMs,
      signal,
    });
  }

  private async call<S extends z.ZodTypeAny>(
    method: string,
    params: Record<string, unknown>,
    schema: S,
    options: { timeoutMs?: number; signal?: AbortSignal } = {},
  ): Promise<z.infer<S>> {
    const { signal } = options;
    if (signal?.aborted) {
      throw new Error(`${method} aborted`);
    }

    const controller = new AbortController();
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });

    let body: unknown = null;
    let status = 0;
    try {
      const res = await fetch(`${this.baseUrl}/bot${this.token}/${method}`, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify(params),
        signal: controller.signal,
      });
      status = res.status;
      body = await res.json();
    } catch (err) {
      if (controller.signal.aborted) {
        throw new Error(signal?.aborted ? `${method} aborted` : `${method} timed out after ${timeoutMs}ms`);
      }
      throw err;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }

    const envelope = ApiResponseSchema.safeParse(body);
    if (!envelope.success) {
      throw new TelegramApiError(method, status, "malformed response");
    }
    if (!envelope.data.ok) {
      throw new TelegramApiError(
        method,
        envelope.data.error_code ?? status,
        envelope.data.description ?? "unknown error",
      );
    }

    const result = schema.safeParse(envelope.data.result);
    if (!result.success) {
      throw new TelegramApiError(method, status, "unexpected result shape");
    }
    return result.data;
  }
}

export {
  TelegramClient,
  TelegramApiError,
  type TelegramClientOptions,
  type GetUpdatesOptions,
  type TelegramUser,
  type TelegramMessage,
  type TelegramUpdate,
} from "./client.js";
export { TelegramSink } from "./sink.js";
export { TelegramCommandSource, type TelegramCommandSourceOptions } from "./command-source.js";

import type { ChatConfig } from "@/config/config";
import { DiscordTransport } from "@/services/transport/discord.transport";
import { TelegramTransport } from "@/services/transport/telegram.transport";
import type { NotificationTransport } from "@/services/transport/transport";
import { ConfigurationError } from "@/utils/errors";

export function createTransport(chat: ChatConfig): NotificationTransport {
  if (chat.platform === "telegram") {
    const { apiId, apiHash, botToken, chatId, session } = chat.telegram;
    if (!apiId || !apiHash || !botToken || !chatId) {
      throw new ConfigurationError(
        "Telegram transport requires TELEGRAM_API_ID, TELEGRAM_API_HASH, TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID",
      );
    }

    return new TelegramTransport({ apiId, apiHash, botToken, chatId, session });
  }

  const { botToken, channelId } = chat.discord;
  if (!botToken || !channelId) {
    throw new ConfigurationError("Discord transport requires DISCORD_BOT_TOKEN and DISCORD_CHANNEL_ID");
  }

  return new DiscordTransport({ botToken, channelId });
}

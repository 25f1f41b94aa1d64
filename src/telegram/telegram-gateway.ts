import { logger } from "../lib/logger.js";
import type { ReviewButton } from "../services/review-notifier-service.js";
import type { SendMessageOptions } from "./telegram-client.js";

interface TelegramClientLike {
  sendMessage(chatId: string, text: string, options?: SendMessageOptions): Promise<void>;
  banChatMember(chatId: string, userId: string): Promise<void>;
  unbanChatMember(chatId: string, userId: string): Promise<void>;
}

/** Outbound moderation actions expressed as Telegram Bot API calls. */
export class TelegramGateway {
  constructor(private readonly client: TelegramClientLike) {}

  // Telegram has no kick: ban, then lift the ban so the account can be re-added later.
  async removeParticipant(communityId: string, participantId: string, reason: string): Promise<void> {
    await this.client.banChatMember(communityId, participantId);
    await this.client.unbanChatMember(communityId, participantId);
    logger.debug("Removed chat member", { communityId, participantId, reason });
  }

  async sendDirectMessage(userId: string, text: string, buttons?: ReviewButton[]): Promise<void> {
    if (!buttons || buttons.length === 0) {
      await this.client.sendMessage(userId, text);
      return;
    }

    await this.client.sendMessage(userId, text, {
      replyMarkup: {
        inline_keyboard: [buttons.map((button) => ({ text: button.text, callback_data: button.data }))]
      }
    });
  }

  async sendChannelMessage(channelId: string, text: string): Promise<void> {
    await this.client.sendMessage(channelId, text);
  }
}

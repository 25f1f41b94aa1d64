import { getEnv } from "../config/env.js";
import type {
  InlineKeyboardMarkup,
  TelegramChatMember,
  TelegramResponse,
  TelegramUpdate,
  TelegramUser
} from "./types.js";

export class TelegramApiError extends Error {
  constructor(
    readonly method: string,
    readonly description: string,
    readonly errorCode: number | null
  ) {
    super(`Telegram ${method} failed: ${description}`);
    this.name = "TelegramApiError";
  }
}

export interface SendMessageOptions {
  replyMarkup?: InlineKeyboardMarkup;
}

export class TelegramClient {
  private readonly baseUrl: string;

  constructor(token: string = getEnv().TELEGRAM_BOT_TOKEN) {
    this.baseUrl = `https://api.telegram.org/bot${token}`;
  }

  async getMe(): Promise<TelegramUser> {
    return this.call<TelegramUser>("getMe", {});
  }

  async getUpdates(offset: number, timeoutSeconds: number): Promise<TelegramUpdate[]> {
    return this.call<TelegramUpdate[]>("getUpdates", {
      offset,
      timeout: timeoutSeconds,
      allowed_updates: ["message", "callback_query"]
    });
  }

  async sendMessage(chatId: string, text: string, options: SendMessageOptions = {}): Promise<void> {
    await this.call<unknown>("sendMessage", {
      chat_id: chatId,
      text,
      disable_web_page_preview: true,
      ...(options.replyMarkup ? { reply_markup: options.replyMarkup } : {})
    });
  }

  async answerCallbackQuery(callbackQueryId: string, text?: string): Promise<void> {
    await this.call<boolean>("answerCallbackQuery", {
      callback_query_id: callbackQueryId,
      ...(text ? { text } : {})
    });
  }

  async getChatMember(chatId: string, userId: string): Promise<TelegramChatMember> {
    return this.call<TelegramChatMember>("getChatMember", { chat_id: chatId, user_id: userId });
  }

  async getChatAdministrators(chatId: string): Promise<TelegramChatMember[]> {
    return this.call<TelegramChatMember[]>("getChatAdministrators", { chat_id: chatId });
  }

  async banChatMember(chatId: string, userId: string): Promise<void> {
    await this.call<boolean>("banChatMember", { chat_id: chatId, user_id: userId });
  }

  async unbanChatMember(chatId: string, userId: string): Promise<void> {
    await this.call<boolean>("unbanChatMember", { chat_id: chatId, user_id: userId, only_if_banned: true });
  }

  private async call<T>(method: string, payload: Record<string, unknown>): Promise<T> {
    const response = await fetch(`${this.baseUrl}/${method}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(payload)
    });

    const body = (await response.json()) as TelegramResponse<T>;
    if (!body.ok || body.result === undefined) {
      throw new TelegramApiError(method, body.description ?? "unknown", body.error_code ?? null);
    }

    return body.result;
  }
}

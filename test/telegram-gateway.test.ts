import { describe, expect, test } from "vitest";

import type { SendMessageOptions } from "../src/telegram/telegram-client.js";
import { TelegramGateway } from "../src/telegram/telegram-gateway.js";

function buildGateway() {
  const calls: string[] = [];
  const messages: Array<{ chatId: string; text: string; options: SendMessageOptions | undefined }> = [];

  const gateway = new TelegramGateway({
    sendMessage: async (chatId, text, options) => {
      messages.push({ chatId, text, options });
    },
    banChatMember: async (chatId, userId) => {
      calls.push(`ban:${chatId}:${userId}`);
    },
    unbanChatMember: async (chatId, userId) => {
      calls.push(`unban:${chatId}:${userId}`);
    }
  });

  return { gateway, calls, messages };
}

describe("TelegramGateway", () => {
  test("removes a member by banning then lifting the ban", async () => {
    const { gateway, calls } = buildGateway();

    await gateway.removeParticipant("-1001", "555", "Timeout - no approval received");

    expect(calls).toEqual(["ban:-1001:555", "unban:-1001:555"]);
  });

  test("does not lift a ban that was never placed", async () => {
    const calls: string[] = [];
    const failing = new TelegramGateway({
      sendMessage: async () => undefined,
      banChatMember: async () => {
        throw new Error("Bad Request: not enough rights to restrict/unrestrict chat member");
      },
      unbanChatMember: async (chatId, userId) => {
        calls.push(`unban:${chatId}:${userId}`);
      }
    });

    await expect(failing.removeParticipant("-1001", "555", "Rejected")).rejects.toThrow("not enough rights");
    expect(calls).toEqual([]);
  });

  test("attaches review buttons as one keyboard row", async () => {
    const { gateway, messages } = buildGateway();

    await gateway.sendDirectMessage("7", "review", [
      { text: "✅ Approve", data: "gate:a:-1001:555" },
      { text: "❌ Reject", data: "gate:r:-1001:555" }
    ]);
    await gateway.sendChannelMessage("-1001", "hello");

    expect(messages).toEqual([
      {
        chatId: "7",
        text: "review",
        options: {
          replyMarkup: {
            inline_keyboard: [
              [
                { text: "✅ Approve", callback_data: "gate:a:-1001:555" },
                { text: "❌ Reject", callback_data: "gate:r:-1001:555" }
              ]
            ]
          }
        }
      },
      { chatId: "-1001", text: "hello", options: undefined }
    ]);
  });
});

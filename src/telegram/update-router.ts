import type { AppEnv } from "../config/env.js";
import { getEnv } from "../config/env.js";
import { parseCommand } from "../lib/command-parser.js";
import { errorMessage, logger } from "../lib/logger.js";
import { parseReviewCallback } from "../lib/review-callback.js";
import type { DetectionResult, ParticipantJoinedEvent } from "../services/approval-workflow-service.js";
import type { CommandContext, ReactionInput } from "../services/moderation-command-service.js";
import { displayName } from "../services/reviewer-permission-service.js";
import type { TelegramCallbackQuery, TelegramMessage, TelegramUpdate } from "./types.js";

interface TelegramClientLike {
  sendMessage(chatId: string, text: string): Promise<void>;
  answerCallbackQuery(callbackQueryId: string, text?: string): Promise<void>;
}

interface WorkflowLike {
  onParticipantDetected(event: ParticipantJoinedEvent): Promise<DetectionResult>;
}

interface CommandServiceLike {
  handleCommand(context: CommandContext, name: string, args: string[]): Promise<string | null>;
  handleReaction(input: ReactionInput): Promise<string>;
}

export interface BotIdentity {
  id: string;
  username: string | null;
}

type RouterEnv = Pick<AppEnv, "COMMAND_PREFIX">;

export class UpdateRouter {
  private readonly prefix: string;

  constructor(
    private readonly telegramClient: TelegramClientLike,
    private readonly workflow: WorkflowLike,
    private readonly commands: CommandServiceLike,
    private readonly self: BotIdentity,
    env?: RouterEnv
  ) {
    this.prefix = (env ?? getEnv()).COMMAND_PREFIX;
  }

  async route(update: TelegramUpdate): Promise<void> {
    if (update.callback_query) {
      await this.handleCallback(update.callback_query);
      return;
    }

    const message = update.message;
    if (!message) {
      return;
    }

    if (message.chat.type !== "group" && message.chat.type !== "supergroup") {
      return;
    }

    if (message.new_chat_members && message.new_chat_members.length > 0) {
      await this.handleJoins(message);
      return;
    }

    const text = message.text?.trim();
    if (text && message.from && !message.from.is_bot) {
      await this.handleCommand(message, text);
    }
  }

  private async handleJoins(message: TelegramMessage): Promise<void> {
    const communityId = String(message.chat.id);
    const inviter = message.from;

    for (const member of message.new_chat_members ?? []) {
      const participantId = String(member.id);
      if (participantId === this.self.id) {
        logger.info("Added to community", { communityId });
        continue;
      }

      try {
        await this.workflow.onParticipantDetected({
          communityId,
          communityTitle: message.chat.title ?? null,
          participantId,
          participantName: displayName(member),
          isAutomated: member.is_bot,
          inviterId: inviter && inviter.id !== member.id ? String(inviter.id) : null,
          inviterName: inviter && inviter.id !== member.id ? displayName(inviter) : null
        });
      } catch (error) {
        logger.error("Failed to process new member", { communityId, participantId, error: errorMessage(error) });
      }
    }
  }

  private async handleCommand(message: TelegramMessage, text: string): Promise<void> {
    const command = parseCommand(text, this.prefix, this.self.username);
    if (!command || !message.from) {
      return;
    }

    const communityId = String(message.chat.id);
    const context: CommandContext = { communityId, actorId: String(message.from.id) };

    let reply: string | null;
    try {
      reply = await this.commands.handleCommand(context, command.name, command.args);
    } catch (error) {
      logger.error("Command failed", { communityId, command: command.name, error: errorMessage(error) });
      reply = "❌ Something went wrong. Please try again later.";
    }

    if (reply) {
      await this.telegramClient.sendMessage(communityId, reply);
    }
  }

  private async handleCallback(query: TelegramCallbackQuery): Promise<void> {
    const decision = parseReviewCallback(query.data);
    if (!decision) {
      await this.telegramClient.answerCallbackQuery(query.id);
      return;
    }

    let toast: string;
    try {
      toast = await this.commands.handleReaction({
        communityId: decision.communityId,
        participantId: decision.participantId,
        approve: decision.approve,
        actorId: String(query.from.id)
      });
    } catch (error) {
      logger.error("Reaction failed", {
        communityId: decision.communityId,
        participantId: decision.participantId,
        error: errorMessage(error)
      });
      toast = "Something went wrong. Please try again later.";
    }

    await this.telegramClient.answerCallbackQuery(query.id, toast);
  }
}

import type { AppEnv, BotCapability } from "../config/env.js";
import { getEnv } from "../config/env.js";
import { errorMessage, logger } from "../lib/logger.js";
import type { TelegramChatMember, TelegramUser } from "../telegram/types.js";

export interface Reviewer {
  userId: string;
  displayName: string;
}

interface ChatMemberSourceLike {
  getChatMember(chatId: string, userId: string): Promise<TelegramChatMember>;
  getChatAdministrators(chatId: string): Promise<TelegramChatMember[]>;
}

type PermissionEnv = Pick<AppEnv, "REVIEWER_ROLE_ID" | "REQUIRED_BOT_CAPABILITIES">;

export class ReviewerPermissionService {
  private readonly reviewerRoleId: string | undefined;
  private readonly requiredCapabilities: BotCapability[];

  constructor(
    private readonly members: ChatMemberSourceLike,
    private readonly botUserId: string,
    env?: PermissionEnv
  ) {
    const resolved = env ?? getEnv();
    this.reviewerRoleId = resolved.REVIEWER_ROLE_ID;
    this.requiredCapabilities = resolved.REQUIRED_BOT_CAPABILITIES;
  }

  async isReviewer(communityId: string, userId: string): Promise<boolean> {
    try {
      const member = await this.members.getChatMember(communityId, userId);
      return !member.user.is_bot && this.holdsReviewerRole(member);
    } catch (error) {
      logger.warn("Reviewer lookup failed", { communityId, userId, error: errorMessage(error) });
      return false;
    }
  }

  async listReviewers(communityId: string): Promise<Reviewer[]> {
    const admins = await this.members.getChatAdministrators(communityId);
    return admins
      .filter((member) => !member.user.is_bot && this.holdsReviewerRole(member))
      .map((member) => ({ userId: String(member.user.id), displayName: displayName(member.user) }));
  }

  async missingBotCapabilities(communityId: string): Promise<BotCapability[]> {
    const self = await this.members.getChatMember(communityId, this.botUserId);
    if (self.status === "creator") {
      return [];
    }

    if (self.status !== "administrator") {
      return [...this.requiredCapabilities];
    }

    return this.requiredCapabilities.filter((capability) => self[capability] !== true);
  }

  private holdsReviewerRole(member: TelegramChatMember): boolean {
    if (member.status === "creator") {
      return true;
    }

    if (member.status !== "administrator") {
      return false;
    }

    return this.reviewerRoleId === undefined || member.custom_title === this.reviewerRoleId;
  }
}

export function displayName(user: TelegramUser): string {
  if (user.username) {
    return `@${user.username}`;
  }

  const fullName = [user.first_name, user.last_name].filter(Boolean).join(" ");
  return fullName || String(user.id);
}

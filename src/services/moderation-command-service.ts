import type { AppEnv } from "../config/env.js";
import { getEnv } from "../config/env.js";
import type { AuditRecord } from "../db/types.js";
import {
  formatCountdown,
  formatCounts,
  formatEventLine,
  participantLabel,
  remainingSeconds
} from "../lib/format.js";
import { errorMessage, logger } from "../lib/logger.js";
import type { PendingApproval } from "./approval-registry.js";
import type { DecisionResult, DecisionSource, StatusSummary } from "./approval-workflow-service.js";

const DEFAULT_LOG_LIMIT = 20;
const MAX_LOG_LIMIT = 50;
const LOG_LINES_SHOWN = 10;
const HISTORY_LINES_SHOWN = 5;
const PENDING_LINES_SHOWN = 5;

export const NOT_AUTHORIZED_MESSAGE = "❌ You don't have permission to use this command.";

interface WorkflowLike {
  onReviewerDecision(
    communityId: string,
    participantId: string,
    approve: boolean,
    actorId: string,
    source?: DecisionSource
  ): Promise<DecisionResult>;
  statusSummary(communityId?: string): Promise<StatusSummary>;
}

interface AuditQueryLike {
  history(communityId: string, participantId: string): Promise<AuditRecord[]>;
  recent(communityId: string | undefined, limit: number): Promise<AuditRecord[]>;
}

interface PermissionLike {
  isReviewer(communityId: string, userId: string): Promise<boolean>;
}

export interface CommandContext {
  communityId: string;
  actorId: string;
}

export interface ReactionInput extends CommandContext {
  participantId: string;
  approve: boolean;
}

type CommandEnv = Pick<AppEnv, "COMMAND_PREFIX">;

export class ModerationCommandService {
  private readonly prefix: string;

  constructor(
    private readonly workflow: WorkflowLike,
    private readonly audit: AuditQueryLike,
    private readonly permissions: PermissionLike,
    env?: CommandEnv,
    private readonly now: () => Date = () => new Date()
  ) {
    this.prefix = (env ?? getEnv()).COMMAND_PREFIX;
  }

  /** Returns the reply text, or null for commands this service does not own. */
  async handleCommand(context: CommandContext, name: string, args: string[]): Promise<string | null> {
    switch (name) {
      case "approve":
      case "reject":
        return this.guarded(context, () => this.decide(context, args[0], name === "approve"));
      case "status":
      case "botstatus":
        return this.guarded(context, () => this.status(context.communityId));
      case "history":
      case "bothistory":
        return this.guarded(context, () => this.history(context.communityId, args[0]));
      case "logs":
        return this.guarded(context, () => this.logs(context.communityId, args[0]));
      case "help":
        return this.guarded(context, async () => this.helpText());
      default:
        return null;
    }
  }

  /** Inline-button decision; the reply is a short toast for the pressing reviewer. */
  async handleReaction(input: ReactionInput): Promise<string> {
    const result = await this.workflow.onReviewerDecision(
      input.communityId,
      input.participantId,
      input.approve,
      input.actorId,
      "reaction"
    );

    if (result.ok) {
      return input.approve ? "✅ Approved" : "❌ Rejected";
    }

    switch (result.reason) {
      case "not_authorized":
        return "You are not a reviewer for this group.";
      case "already_resolved":
        return `Already handled (${statusLabel(result.entry)}).`;
      case "not_found":
        return "This bot is no longer pending.";
    }
  }

  private async decide(context: CommandContext, rawId: string | undefined, approve: boolean): Promise<string> {
    const participantId = parseParticipantId(rawId);
    if (!participantId) {
      return `Usage: ${this.prefix}${approve ? "approve" : "reject"} <botId>`;
    }

    const result = await this.workflow.onReviewerDecision(
      context.communityId,
      participantId,
      approve,
      context.actorId,
      "command"
    );

    if (!result.ok) {
      switch (result.reason) {
        case "not_authorized":
          return NOT_AUTHORIZED_MESSAGE;
        case "already_resolved":
          return `ℹ️ Bot ${participantLabel(result.entry.participantName, participantId)} was already handled (${statusLabel(result.entry)}).`;
        case "not_found":
          return "❌ Bot not found in pending list.";
      }
    }

    const label = participantLabel(result.entry.participantName, participantId);
    if (approve) {
      return `✅ Bot ${label} has been approved.`;
    }

    return result.removal?.ok ? `❌ Bot ${label} has been rejected and removed.` : `❌ Bot ${label} has been rejected.`;
  }

  private async guarded(context: CommandContext, run: () => Promise<string>): Promise<string> {
    if (!(await this.permissions.isReviewer(context.communityId, context.actorId))) {
      return NOT_AUTHORIZED_MESSAGE;
    }

    return run();
  }

  private async status(communityId: string): Promise<string> {
    let summary: StatusSummary;
    try {
      summary = await this.workflow.statusSummary(communityId);
    } catch (error) {
      logger.error("Failed to build status summary", { communityId, error: errorMessage(error) });
      return "❌ Error retrieving status. Please try again later.";
    }

    const now = this.now();
    const lines = ["🤖 Bot Security Status", `Pending approvals: ${summary.pendingCount}`];

    if (summary.pendingList.length > 0) {
      lines.push("", "Pending bots:");
      for (const entry of summary.pendingList.slice(0, PENDING_LINES_SHOWN)) {
        lines.push(`• ${participantLabel(entry.participantName, entry.participantId)} - ${formatCountdown(remainingSeconds(entry, now))}`);
      }
      if (summary.pendingList.length > PENDING_LINES_SHOWN) {
        lines.push(`…and ${summary.pendingList.length - PENDING_LINES_SHOWN} more`);
      }
    }

    if (summary.recentOutcomes.length > 0) {
      lines.push("", "Recent outcomes:");
      for (const record of summary.recentOutcomes) {
        lines.push(`${formatEventLine(record)} | ${participantLabel(record.participantName, record.participantId)}`);
      }
    }

    lines.push(
      "",
      formatCounts("📊 Overall:", summary.stats.overall),
      "",
      formatCounts("📈 Last 24 hours:", summary.stats.lastDay)
    );
    return lines.join("\n");
  }

  private async history(communityId: string, rawId: string | undefined): Promise<string> {
    const participantId = parseParticipantId(rawId);
    if (!participantId) {
      return `Usage: ${this.prefix}history <botId>`;
    }

    let records: AuditRecord[];
    try {
      records = await this.audit.history(communityId, participantId);
    } catch (error) {
      logger.error("Failed to load participant history", { communityId, participantId, error: errorMessage(error) });
      return "❌ Error retrieving bot history. Please try again later.";
    }

    const latest = records[0];
    if (!latest) {
      return `❌ No history found for bot ID: ${participantId}`;
    }

    const inviter = records.find((record) => typeof record.detail.inviterName === "string")?.detail.inviterName;
    const lines = [
      `🤖 Bot history: ${participantLabel(latest.participantName, participantId)}`,
      `Invited by: ${typeof inviter === "string" ? inviter : "Unknown"}`,
      "",
      ...records.slice(0, HISTORY_LINES_SHOWN).map(formatEventLine)
    ];

    if (records.length > HISTORY_LINES_SHOWN) {
      lines.push("", `Showing ${HISTORY_LINES_SHOWN} most recent of ${records.length} entries.`);
    }

    return lines.join("\n");
  }

  private async logs(communityId: string, rawLimit: string | undefined): Promise<string> {
    const limit = parseLimit(rawLimit);

    let records: AuditRecord[];
    try {
      records = await this.audit.recent(communityId, limit);
    } catch (error) {
      logger.error("Failed to load audit logs", { communityId, error: errorMessage(error) });
      return "❌ Error retrieving logs. Please try again later.";
    }

    if (records.length === 0) {
      return "📋 No bot actions recorded yet.";
    }

    const shown = records.slice(0, LOG_LINES_SHOWN);
    return [
      `📋 Bot action logs (showing ${shown.length} of ${records.length})`,
      ...shown.map((record) => `${formatEventLine(record)} | ${participantLabel(record.participantName, record.participantId)}`),
      "",
      `Use ${this.prefix}logs <limit> to load more entries (max ${MAX_LOG_LIMIT}).`
    ].join("\n");
  }

  private helpText(): string {
    const p = this.prefix;
    return [
      "Bot approval commands:",
      `${p}status - pending bots and statistics`,
      `${p}approve <botId> - approve a pending bot`,
      `${p}reject <botId> - reject and remove a pending bot`,
      `${p}history <botId> - audit trail of a bot`,
      `${p}logs [limit] - recent audit records (max ${MAX_LOG_LIMIT})`
    ].join("\n");
  }
}

function parseParticipantId(raw: string | undefined): string | null {
  const value = raw?.trim();
  return value && /^\d+$/.test(value) ? value : null;
}

export function parseLimit(raw: string | undefined): number {
  const parsed = Number.parseInt(raw ?? "", 10);
  if (!Number.isFinite(parsed)) {
    return DEFAULT_LOG_LIMIT;
  }

  return Math.min(MAX_LOG_LIMIT, Math.max(1, parsed));
}

function statusLabel(entry: PendingApproval): string {
  return entry.status.replace("_", " ");
}

import type { AppEnv } from "../config/env.js";
import { getEnv } from "../config/env.js";
import type { AuditRecord, AuditStats } from "../db/types.js";
import { SYSTEM_ACTOR } from "../db/types.js";
import { participantLabel } from "../lib/format.js";
import { errorMessage, logger } from "../lib/logger.js";
import type { AuditEntry, AuditWriteResult } from "./audit-trail-service.js";
import type { ApprovalOutcome, ApprovalRegistry, PendingApproval } from "./approval-registry.js";
import type { ReviewRequest } from "./review-notifier-service.js";
import type { Reviewer } from "./reviewer-permission-service.js";

export interface ParticipantJoinedEvent {
  communityId: string;
  communityTitle: string | null;
  participantId: string;
  participantName: string | null;
  isAutomated: boolean;
  inviterId: string | null;
  inviterName: string | null;
}

export type DecisionSource = "reaction" | "command";

export type DetectionResult =
  | { status: "pending"; entry: PendingApproval }
  | { status: "ignored"; reason: "not_automated" | "pre_approved" | "duplicate_entry" | "stopped" };

export type RemovalResult = { ok: true } | { ok: false; error: string };

export type DecisionResult =
  | { ok: true; entry: PendingApproval; removal: RemovalResult | null }
  | { ok: false; reason: "not_authorized" | "not_found" }
  | { ok: false; reason: "already_resolved"; entry: PendingApproval };

export type TimeoutResult =
  | { ok: true; entry: PendingApproval; removal: RemovalResult }
  | { ok: false; reason: "already_resolved" | "not_found" };

export interface StatusSummary {
  pendingCount: number;
  pendingList: PendingApproval[];
  recentOutcomes: AuditRecord[];
  stats: AuditStats;
}

interface AuditTrailLike {
  record(entry: AuditEntry): Promise<AuditWriteResult>;
  recentOutcomes(communityId: string | undefined, limit: number): Promise<AuditRecord[]>;
  stats(communityId?: string): Promise<AuditStats>;
}

interface ReviewerDirectoryLike {
  isReviewer(communityId: string, userId: string): Promise<boolean>;
  listReviewers(communityId: string): Promise<Reviewer[]>;
  missingBotCapabilities(communityId: string): Promise<string[]>;
}

interface ReviewNotifierLike {
  notify(request: ReviewRequest, reviewers: Reviewer[]): Promise<number>;
}

interface ModerationActionsLike {
  removeParticipant(communityId: string, participantId: string, reason: string): Promise<void>;
  sendChannelMessage(communityId: string, text: string): Promise<void>;
}

interface ApprovedParticipantsLike {
  isApproved(communityId: string, participantId: string): Promise<boolean>;
  add(communityId: string, participantId: string, approvedBy: string): Promise<void>;
}

type WorkflowEnv = Pick<AppEnv, "APPROVAL_TIMEOUT_SECONDS">;

const RECENT_OUTCOME_LIMIT = 5;

export class ApprovalWorkflowService {
  private readonly timeoutMs: number;
  private readonly capabilityChecks = new Map<string, Promise<void>>();
  private readonly background = new Set<Promise<void>>();
  private stopped = false;

  constructor(
    private readonly registry: ApprovalRegistry,
    private readonly audit: AuditTrailLike,
    private readonly reviewers: ReviewerDirectoryLike,
    private readonly notifier: ReviewNotifierLike,
    private readonly actions: ModerationActionsLike,
    private readonly approved: ApprovedParticipantsLike,
    env?: WorkflowEnv,
    private readonly now: () => Date = () => new Date()
  ) {
    this.timeoutMs = (env ?? getEnv()).APPROVAL_TIMEOUT_SECONDS * 1000;
  }

  async onParticipantDetected(event: ParticipantJoinedEvent): Promise<DetectionResult> {
    if (!event.isAutomated) {
      return { status: "ignored", reason: "not_automated" };
    }

    const { communityId, participantId } = event;
    if (this.stopped) {
      logger.warn("Detection after shutdown ignored", { communityId, participantId });
      return { status: "ignored", reason: "stopped" };
    }

    if (await this.isPreApproved(communityId, participantId)) {
      logger.info("Pre-approved participant rejoined", { communityId, participantId });
      await this.audit.record({
        communityId,
        participantId,
        participantName: event.participantName,
        eventType: "pre_approved",
        actorId: SYSTEM_ACTOR,
        detail: inviterDetail(event)
      });
      return { status: "ignored", reason: "pre_approved" };
    }

    // Shutdown may have started while the lookup was in flight.
    if (this.stopped) {
      return { status: "ignored", reason: "stopped" };
    }

    const deadline = new Date(this.now().getTime() + this.timeoutMs);
    const created = this.registry.create(communityId, participantId, deadline, event.participantName);
    if (!created.ok) {
      logger.warn("Participant already pending approval", { communityId, participantId });
      return { status: "ignored", reason: "duplicate_entry" };
    }

    this.armTimer(communityId, participantId);
    logger.info("Automated participant held for review", {
      communityId,
      participantId,
      deadline: deadline.toISOString()
    });

    await this.audit.record({
      communityId,
      participantId,
      participantName: event.participantName,
      eventType: "detected",
      actorId: SYSTEM_ACTOR,
      detail: { ...inviterDetail(event), timeoutSeconds: this.timeoutMs / 1000 }
    });

    this.track(this.requestReview(event, created.entry));
    return { status: "pending", entry: created.entry };
  }

  async onReviewerDecision(
    communityId: string,
    participantId: string,
    approve: boolean,
    actorId: string,
    source: DecisionSource = "command"
  ): Promise<DecisionResult> {
    if (!(await this.reviewers.isReviewer(communityId, actorId))) {
      logger.warn("Decision from non-reviewer ignored", { communityId, participantId, actorId });
      return { ok: false, reason: "not_authorized" };
    }

    const outcome: ApprovalOutcome = approve ? "approved" : "rejected";
    const resolved = this.registry.resolve(communityId, participantId, outcome, actorId);
    if (!resolved.ok) {
      logger.info("Decision arrived after resolution", { communityId, participantId, actorId, reason: resolved.reason });
      return resolved;
    }

    const entry = resolved.entry;
    logger.info("Participant resolved by reviewer", { communityId, participantId, actorId, outcome });
    await this.audit.record({
      communityId,
      participantId,
      participantName: entry.participantName,
      eventType: outcome,
      actorId,
      detail: { source }
    });

    if (approve) {
      await this.rememberApproval(communityId, participantId, actorId);
      return { ok: true, entry, removal: null };
    }

    const removal = await this.removeParticipant(entry, `Rejected by reviewer ${actorId}`);
    return { ok: true, entry, removal };
  }

  async onTimeout(communityId: string, participantId: string): Promise<TimeoutResult> {
    const resolved = this.registry.resolve(communityId, participantId, "timed_out", SYSTEM_ACTOR);
    if (!resolved.ok) {
      return { ok: false, reason: resolved.reason };
    }

    const entry = resolved.entry;
    logger.info("Participant timed out", { communityId, participantId });
    await this.audit.record({
      communityId,
      participantId,
      participantName: entry.participantName,
      eventType: "timed_out",
      actorId: SYSTEM_ACTOR,
      detail: { timeoutSeconds: this.timeoutMs / 1000 }
    });

    const removal = await this.removeParticipant(entry, "Timeout - no approval received");
    return { ok: true, entry, removal };
  }

  async statusSummary(communityId?: string): Promise<StatusSummary> {
    const pendingList = this.registry.listPending(communityId);
    const [recentOutcomes, stats] = await Promise.all([
      this.audit.recentOutcomes(communityId, RECENT_OUTCOME_LIMIT),
      this.audit.stats(communityId)
    ]);

    return {
      pendingCount: pendingList.length,
      pendingList,
      recentOutcomes,
      stats
    };
  }

  /** Waits for detached notification work; used on shutdown and in tests. */
  async drain(): Promise<void> {
    while (this.background.size > 0) {
      await Promise.all([...this.background]);
    }
  }

  async shutdown(): Promise<void> {
    this.stopped = true;
    const pending = this.registry.size();
    this.registry.clear();
    await this.drain();
    logger.info("Approval workflow stopped", { droppedPending: pending });
  }

  private armTimer(communityId: string, participantId: string): void {
    const handle = setTimeout(() => {
      void this.onTimeout(communityId, participantId).catch((error: unknown) => {
        logger.error("Timeout handler failed", { communityId, participantId, error: errorMessage(error) });
      });
    }, this.timeoutMs);

    this.registry.attachTimer(communityId, participantId, { cancel: () => clearTimeout(handle) });
  }

  private async requestReview(event: ParticipantJoinedEvent, entry: PendingApproval): Promise<void> {
    await this.checkCapabilities(event.communityId);

    try {
      const reviewers = await this.reviewers.listReviewers(event.communityId);
      if (reviewers.length === 0) {
        logger.warn("No reviewers available to notify", {
          communityId: event.communityId,
          participantId: event.participantId
        });
        return;
      }

      await this.notifier.notify(
        {
          communityId: event.communityId,
          communityTitle: event.communityTitle,
          participantId: event.participantId,
          participantName: event.participantName,
          inviterName: event.inviterName,
          detectedAt: entry.detectedAt,
          timeoutSeconds: this.timeoutMs / 1000
        },
        reviewers
      );
    } catch (error) {
      logger.error("Review notification failed", {
        communityId: event.communityId,
        participantId: event.participantId,
        error: errorMessage(error)
      });
    }
  }

  /** One check per community; a failed lookup is retried on the next detection. */
  private checkCapabilities(communityId: string): Promise<void> {
    const existing = this.capabilityChecks.get(communityId);
    if (existing) {
      return existing;
    }

    const check = this.runCapabilityCheck(communityId);
    this.capabilityChecks.set(communityId, check);
    return check;
  }

  private async runCapabilityCheck(communityId: string): Promise<void> {
    let missing: string[];
    try {
      missing = await this.reviewers.missingBotCapabilities(communityId);
    } catch (error) {
      this.capabilityChecks.delete(communityId);
      logger.warn("Capability check failed", { communityId, error: errorMessage(error) });
      return;
    }

    if (missing.length === 0) {
      return;
    }

    logger.warn("Missing bot capabilities", { communityId, missing });
    await this.announce(communityId, `⚠️ I am missing admin rights needed to guard this group: ${missing.join(", ")}`);
  }

  private async removeParticipant(entry: PendingApproval, reason: string): Promise<RemovalResult> {
    const { communityId, participantId } = entry;
    try {
      await this.actions.removeParticipant(communityId, participantId, reason);
      logger.info("Participant removed", { communityId, participantId, reason });
      return { ok: true };
    } catch (error) {
      const message = errorMessage(error);
      logger.error("Participant removal failed", { communityId, participantId, reason, error: message });
      await this.audit.record({
        communityId,
        participantId,
        participantName: entry.participantName,
        eventType: "removal_failed",
        actorId: SYSTEM_ACTOR,
        detail: { reason, error: message }
      });
      await this.announce(
        communityId,
        `⚠️ Could not remove bot ${participantLabel(entry.participantName, participantId)}: ${message}. ` +
          "I need the right to ban members."
      );
      return { ok: false, error: message };
    }
  }

  private async announce(communityId: string, text: string): Promise<void> {
    try {
      await this.actions.sendChannelMessage(communityId, text);
    } catch (error) {
      logger.warn("Failed to post community message", { communityId, error: errorMessage(error) });
    }
  }

  private async isPreApproved(communityId: string, participantId: string): Promise<boolean> {
    try {
      return await this.approved.isApproved(communityId, participantId);
    } catch (error) {
      logger.warn("Approved-participant lookup failed", { communityId, participantId, error: errorMessage(error) });
      return false;
    }
  }

  private async rememberApproval(communityId: string, participantId: string, actorId: string): Promise<void> {
    try {
      await this.approved.add(communityId, participantId, actorId);
    } catch (error) {
      logger.warn("Failed to remember approved participant", {
        communityId,
        participantId,
        error: errorMessage(error)
      });
    }
  }

  private track(task: Promise<void>): void {
    this.background.add(task);
    void task.finally(() => this.background.delete(task));
  }
}

function inviterDetail(event: ParticipantJoinedEvent): Record<string, unknown> {
  return {
    inviterId: event.inviterId,
    inviterName: event.inviterName
  };
}

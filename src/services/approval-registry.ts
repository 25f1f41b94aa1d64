export type ApprovalStatus = "pending" | "approved" | "rejected" | "timed_out";

export type ApprovalOutcome = Exclude<ApprovalStatus, "pending">;

export interface TimerHandle {
  cancel(): void;
}

export interface PendingApproval {
  readonly communityId: string;
  readonly participantId: string;
  readonly participantName: string | null;
  readonly detectedAt: Date;
  readonly deadline: Date;
  readonly status: ApprovalStatus;
  readonly resolvedBy?: string;
  readonly resolvedAt?: Date;
}

export type CreateResult =
  | { ok: true; entry: PendingApproval }
  | { ok: false; reason: "duplicate_entry"; entry: PendingApproval };

export type ResolveResult =
  | { ok: true; entry: PendingApproval }
  | { ok: false; reason: "already_resolved"; entry: PendingApproval }
  | { ok: false; reason: "not_found" };

interface LiveEntry {
  approval: PendingApproval;
  timer: TimerHandle | null;
}

const DEFAULT_TOMBSTONE_LIMIT = 1000;

export function approvalKey(communityId: string, participantId: string): string {
  return `${communityId}:${participantId}`;
}

/**
 * Live map of undecided participants keyed by (communityId, participantId).
 *
 * Every mutation is synchronous, so two resolvers racing on one key are
 * serialized by the event loop: the first removes the entry and every later
 * caller sees `already_resolved`. Resolved keys are kept as tombstones (bounded)
 * only to tell a late resolver apart from an unknown key.
 */
export class ApprovalRegistry {
  private readonly live = new Map<string, LiveEntry>();
  private readonly tombstones = new Map<string, PendingApproval>();

  constructor(
    private readonly now: () => Date = () => new Date(),
    private readonly tombstoneLimit = DEFAULT_TOMBSTONE_LIMIT
  ) {}

  create(
    communityId: string,
    participantId: string,
    deadline: Date,
    participantName: string | null = null
  ): CreateResult {
    const key = approvalKey(communityId, participantId);
    const existing = this.live.get(key);
    if (existing) {
      return { ok: false, reason: "duplicate_entry", entry: existing.approval };
    }

    const approval: PendingApproval = {
      communityId,
      participantId,
      participantName,
      detectedAt: this.now(),
      deadline,
      status: "pending"
    };

    this.tombstones.delete(key);
    this.live.set(key, { approval, timer: null });
    return { ok: true, entry: approval };
  }

  get(communityId: string, participantId: string): PendingApproval | null {
    return this.live.get(approvalKey(communityId, participantId))?.approval ?? null;
  }

  /** Hands ownership of the countdown to the entry; cancels it at once if the entry is gone. */
  attachTimer(communityId: string, participantId: string, timer: TimerHandle): boolean {
    const entry = this.live.get(approvalKey(communityId, participantId));
    if (!entry) {
      timer.cancel();
      return false;
    }

    entry.timer?.cancel();
    entry.timer = timer;
    return true;
  }

  resolve(communityId: string, participantId: string, outcome: ApprovalOutcome, actorId: string): ResolveResult {
    const key = approvalKey(communityId, participantId);
    const entry = this.live.get(key);
    if (!entry) {
      const resolved = this.tombstones.get(key);
      return resolved ? { ok: false, reason: "already_resolved", entry: resolved } : { ok: false, reason: "not_found" };
    }

    this.live.delete(key);
    entry.timer?.cancel();

    const resolved: PendingApproval = {
      ...entry.approval,
      status: outcome,
      resolvedAt: this.now(),
      ...(outcome === "timed_out" ? {} : { resolvedBy: actorId })
    };
    this.remember(key, resolved);
    return { ok: true, entry: resolved };
  }

  listPending(communityId?: string): PendingApproval[] {
    const entries: PendingApproval[] = [];
    for (const { approval } of this.live.values()) {
      if (communityId === undefined || approval.communityId === communityId) {
        entries.push(approval);
      }
    }

    return entries.sort((a, b) => a.detectedAt.getTime() - b.detectedAt.getTime());
  }

  size(): number {
    return this.live.size;
  }

  clear(): void {
    for (const entry of this.live.values()) {
      entry.timer?.cancel();
    }

    this.live.clear();
    this.tombstones.clear();
  }

  private remember(key: string, resolved: PendingApproval): void {
    this.tombstones.set(key, resolved);
    while (this.tombstones.size > this.tombstoneLimit) {
      const oldest = this.tombstones.keys().next();
      if (oldest.done) {
        break;
      }
      this.tombstones.delete(oldest.value);
    }
  }
}

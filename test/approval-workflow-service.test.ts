import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

import type { AuditEventType, AuditRecord, AuditRecordInput, AuditStats } from "../src/db/types.js";
import { ApprovalRegistry } from "../src/services/approval-registry.js";
import {
  ApprovalWorkflowService,
  type ParticipantJoinedEvent
} from "../src/services/approval-workflow-service.js";
import { AuditTrailService, type AuditEntry } from "../src/services/audit-trail-service.js";
import type { ReviewRequest } from "../src/services/review-notifier-service.js";
import type { Reviewer } from "../src/services/reviewer-permission-service.js";

const TIMEOUT_SECONDS = 10;

interface Options {
  reviewerIds?: string[];
  removalError?: Error;
  notifyError?: Error;
  preApproved?: string[];
  audit?: AuditTrailService;
  missingCapabilities?: () => Promise<string[]>;
  approvalLookupGate?: Promise<void>;
}

function emptyStats(): AuditStats {
  const zero = { total: 0, detected: 0, approved: 0, rejected: 0, timedOut: 0 };
  return { overall: { ...zero }, lastDay: { ...zero } };
}

function buildHarness(options: Options = {}) {
  const registry = new ApprovalRegistry();
  const audited: AuditEntry[] = [];
  const removals: string[] = [];
  const channel: string[] = [];
  const posts: Array<{ communityId: string; text: string }> = [];
  const notified: Array<{ request: ReviewRequest; reviewers: Reviewer[] }> = [];
  const approved = new Set<string>(options.preApproved ?? []);
  const reviewerIds = new Set(options.reviewerIds ?? ["r1"]);

  const audit = options.audit ?? {
    record: async (entry: AuditEntry) => {
      audited.push(entry);
      return { ok: true as const, attempts: 1 };
    },
    recentOutcomes: async (): Promise<AuditRecord[]> => [],
    stats: async () => emptyStats()
  };

  const reviewers = {
    isReviewer: async (_communityId: string, userId: string) => reviewerIds.has(userId),
    listReviewers: async (): Promise<Reviewer[]> =>
      [...reviewerIds].map((userId) => ({ userId, displayName: `@${userId}` })),
    missingBotCapabilities: options.missingCapabilities ?? (async (): Promise<string[]> => [])
  };

  const notifier = {
    notify: async (request: ReviewRequest, list: Reviewer[]) => {
      if (options.notifyError) {
        throw options.notifyError;
      }
      notified.push({ request, reviewers: list });
      return list.length;
    }
  };

  const actions = {
    removeParticipant: async (communityId: string, participantId: string) => {
      removals.push(`${communityId}:${participantId}`);
      if (options.removalError) {
        throw options.removalError;
      }
    },
    sendChannelMessage: async (communityId: string, text: string) => {
      channel.push(text);
      posts.push({ communityId, text });
    }
  };

  const approvedRepo = {
    isApproved: async (communityId: string, participantId: string) => {
      await options.approvalLookupGate;
      return approved.has(`${communityId}:${participantId}`);
    },
    add: async (communityId: string, participantId: string) => {
      approved.add(`${communityId}:${participantId}`);
    }
  };

  const service = new ApprovalWorkflowService(
    registry,
    audit,
    reviewers,
    notifier,
    actions,
    approvedRepo,
    { APPROVAL_TIMEOUT_SECONDS: TIMEOUT_SECONDS }
  );

  const types = (): AuditEventType[] => audited.map((entry) => entry.eventType);

  return { service, registry, audited, removals, channel, posts, notified, approved, types };
}

function joined(participantId: string, overrides: Partial<ParticipantJoinedEvent> = {}): ParticipantJoinedEvent {
  return {
    communityId: "c1",
    communityTitle: "Test Group",
    participantId,
    participantName: `@${participantId}_bot`,
    isAutomated: true,
    inviterId: "u9",
    inviterName: "@inviter",
    ...overrides
  };
}

function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe("ApprovalWorkflowService", () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout", "Date"], now: new Date("2026-03-01T12:00:00Z") });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  test("times out an undecided bot and removes it once", async () => {
    const h = buildHarness();

    const detection = await h.service.onParticipantDetected(joined("b1"));
    expect(detection.status).toBe("pending");

    vi.advanceTimersByTime(TIMEOUT_SECONDS * 1000 - 1);
    await flush();
    expect(h.registry.get("c1", "b1")?.status).toBe("pending");
    expect(h.removals).toEqual([]);

    vi.advanceTimersByTime(1);
    await flush();

    expect(h.registry.get("c1", "b1")).toBeNull();
    expect(h.removals).toEqual(["c1:b1"]);
    expect(h.types()).toEqual(["detected", "timed_out"]);
    expect(h.audited[1]?.actorId).toBe("system");
  });

  test("approval before the deadline cancels the timer and skips removal", async () => {
    const h = buildHarness();
    await h.service.onParticipantDetected(joined("b2"));

    vi.advanceTimersByTime(3000);
    const decision = await h.service.onReviewerDecision("c1", "b2", true, "r1");

    expect(decision).toMatchObject({ ok: true, removal: null, entry: { status: "approved", resolvedBy: "r1" } });
    expect(vi.getTimerCount()).toBe(0);

    vi.advanceTimersByTime(TIMEOUT_SECONDS * 1000);
    await flush();

    expect(h.removals).toEqual([]);
    expect(h.types()).toEqual(["detected", "approved"]);
    expect(h.approved.has("c1:b2")).toBe(true);
  });

  test("approval racing the timeout resolves exactly once", async () => {
    const h = buildHarness();
    await h.service.onParticipantDetected(joined("b3"));

    const [decision, timeout] = await Promise.all([
      h.service.onReviewerDecision("c1", "b3", true, "r1"),
      h.service.onTimeout("c1", "b3")
    ]);

    expect(timeout.ok).toBe(true);
    expect(decision).toMatchObject({ ok: false, reason: "already_resolved", entry: { status: "timed_out" } });
    expect(h.types()).toEqual(["detected", "timed_out"]);
    expect(h.removals).toEqual(["c1:b3"]);
  });

  test("a timer firing after a decision is a no-op", async () => {
    const h = buildHarness();
    await h.service.onParticipantDetected(joined("b4"));
    await h.service.onReviewerDecision("c1", "b4", false, "r1");

    const late = await h.service.onTimeout("c1", "b4");

    expect(late).toEqual({ ok: false, reason: "already_resolved" });
    expect(h.types()).toEqual(["detected", "rejected"]);
  });

  test("rejection removes the bot and records the decision source", async () => {
    const h = buildHarness();
    await h.service.onParticipantDetected(joined("b5"));

    const decision = await h.service.onReviewerDecision("c1", "b5", false, "r1", "reaction");

    expect(decision).toMatchObject({ ok: true, removal: { ok: true }, entry: { status: "rejected" } });
    expect(h.removals).toEqual(["c1:b5"]);
    expect(h.audited[1]).toMatchObject({ eventType: "rejected", actorId: "r1", detail: { source: "reaction" } });
  });

  test("non-reviewers cannot change state", async () => {
    const h = buildHarness();
    await h.service.onParticipantDetected(joined("b6"));

    const decision = await h.service.onReviewerDecision("c1", "b6", true, "intruder");

    expect(decision).toEqual({ ok: false, reason: "not_authorized" });
    expect(h.registry.get("c1", "b6")?.status).toBe("pending");
    expect(h.types()).toEqual(["detected"]);
  });

  test("decisions on unknown bots are not_found", async () => {
    const h = buildHarness();

    const decision = await h.service.onReviewerDecision("c1", "nobody", true, "r1");

    expect(decision).toEqual({ ok: false, reason: "not_found" });
    expect(h.registry.size()).toBe(0);
    expect(h.audited).toEqual([]);
  });

  test("ignores human members", async () => {
    const h = buildHarness();

    const detection = await h.service.onParticipantDetected(joined("u1", { isAutomated: false }));

    expect(detection).toEqual({ status: "ignored", reason: "not_automated" });
    expect(h.registry.size()).toBe(0);
    expect(h.audited).toEqual([]);
  });

  test("ignores a second detection of a pending bot", async () => {
    const h = buildHarness();
    await h.service.onParticipantDetected(joined("b7"));

    const second = await h.service.onParticipantDetected(joined("b7"));

    expect(second).toEqual({ status: "ignored", reason: "duplicate_entry" });
    expect(h.types()).toEqual(["detected"]);
    expect(vi.getTimerCount()).toBe(1);
  });

  test("lets previously approved bots back in without review", async () => {
    const h = buildHarness({ preApproved: ["c1:b8"] });

    const detection = await h.service.onParticipantDetected(joined("b8"));

    expect(detection).toEqual({ status: "ignored", reason: "pre_approved" });
    expect(h.types()).toEqual(["pre_approved"]);
    expect(vi.getTimerCount()).toBe(0);
  });

  test("records the inviter on detection and notifies reviewers", async () => {
    const h = buildHarness({ reviewerIds: ["r1", "r2"] });
    await h.service.onParticipantDetected(joined("b9"));
    await h.service.drain();

    expect(h.audited[0]).toMatchObject({
      eventType: "detected",
      actorId: "system",
      detail: { inviterId: "u9", inviterName: "@inviter", timeoutSeconds: 10 }
    });
    expect(h.notified).toHaveLength(1);
    expect(h.notified[0]?.reviewers.map((reviewer) => reviewer.userId)).toEqual(["r1", "r2"]);
    expect(h.notified[0]?.request).toMatchObject({ communityId: "c1", participantId: "b9", timeoutSeconds: 10 });
  });

  test("notification failure does not block review", async () => {
    const h = buildHarness({ notifyError: new Error("dm disabled") });
    await h.service.onParticipantDetected(joined("b10"));
    await h.service.drain();

    const decision = await h.service.onReviewerDecision("c1", "b10", true, "r1");

    expect(decision.ok).toBe(true);
  });

  test("removal failure is audited, announced once and stays terminal", async () => {
    const h = buildHarness({ removalError: new Error("not enough rights to restrict/unrestrict chat member") });
    await h.service.onParticipantDetected(joined("b11"));

    const result = await h.service.onTimeout("c1", "b11");

    expect(result).toMatchObject({
      ok: true,
      removal: { ok: false, error: "not enough rights to restrict/unrestrict chat member" }
    });
    expect(h.types()).toEqual(["detected", "timed_out", "removal_failed"]);
    expect(h.channel).toEqual([
      "⚠️ Could not remove bot @b11_bot (ID: b11): not enough rights to restrict/unrestrict chat member. " +
        "I need the right to ban members."
    ]);
    expect(h.registry.get("c1", "b11")).toBeNull();
  });

  test("every pending bot eventually resolves exactly once", async () => {
    const h = buildHarness();
    await h.service.onParticipantDetected(joined("b12"));
    await h.service.onParticipantDetected(joined("b13", { communityId: "c2" }));
    await h.service.onParticipantDetected(joined("b14"));
    await h.service.onReviewerDecision("c1", "b14", true, "r1");

    vi.advanceTimersByTime(TIMEOUT_SECONDS * 1000);
    await flush();

    const outcomes = h.audited.filter((entry) => entry.eventType !== "detected");
    expect(outcomes.map((entry) => `${entry.communityId}:${entry.participantId}:${entry.eventType}`).sort()).toEqual([
      "c1:b12:timed_out",
      "c1:b14:approved",
      "c2:b13:timed_out"
    ]);
    expect(h.registry.size()).toBe(0);
  });

  test("status summary counts pending entries across communities", async () => {
    const h = buildHarness();
    await h.service.onParticipantDetected(joined("b15"));
    await h.service.onParticipantDetected(joined("b16", { communityId: "c2" }));
    await h.service.onParticipantDetected(joined("b17"));
    await h.service.onReviewerDecision("c1", "b17", false, "r1");

    const all = await h.service.statusSummary();
    const c1 = await h.service.statusSummary("c1");

    expect(all.pendingCount).toBe(2);
    expect(c1.pendingCount).toBe(1);
    expect(c1.pendingList.map((entry) => entry.participantId)).toEqual(["b15"]);
  });

  test("decision stands when the audit store is down", async () => {
    const failingStore = {
      append: async (_record: AuditRecordInput): Promise<void> => {
        throw new Error("connection refused");
      },
      history: async (): Promise<AuditRecord[]> => [],
      recent: async (): Promise<AuditRecord[]> => [],
      recentOutcomes: async (): Promise<AuditRecord[]> => [],
      stats: async () => emptyStats()
    };
    const audit = new AuditTrailService(failingStore, { AUDIT_WRITE_ATTEMPTS: 2, AUDIT_RETRY_DELAY_MS: 0 });
    const h = buildHarness({ audit });
    await h.service.onParticipantDetected(joined("b18"));

    const decision = await h.service.onReviewerDecision("c1", "b18", true, "r1");

    expect(decision.ok).toBe(true);
    expect(h.registry.get("c1", "b18")).toBeNull();
  });

  test("shutdown cancels every pending timer", async () => {
    const h = buildHarness();
    await h.service.onParticipantDetected(joined("b19"));
    await h.service.onParticipantDetected(joined("b20"));

    await h.service.shutdown();

    expect(vi.getTimerCount()).toBe(0);
    expect(h.registry.size()).toBe(0);
  });

  test("ignores detections after shutdown", async () => {
    const h = buildHarness();
    await h.service.shutdown();

    const result = await h.service.onParticipantDetected(joined("b21"));

    expect(result).toEqual({ status: "ignored", reason: "stopped" });
    expect(h.registry.size()).toBe(0);
    expect(vi.getTimerCount()).toBe(0);
    expect(h.types()).toEqual([]);
  });

  test("drops a detection whose lookup finishes after shutdown", async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const h = buildHarness({ approvalLookupGate: gate });

    const detection = h.service.onParticipantDetected(joined("b22"));
    await h.service.shutdown();
    release();

    expect(await detection).toEqual({ status: "ignored", reason: "stopped" });
    expect(h.registry.size()).toBe(0);
    expect(vi.getTimerCount()).toBe(0);
  });

  test("warns each community once about missing bot rights", async () => {
    const h = buildHarness({ missingCapabilities: async () => ["can_restrict_members"] });
    const warning = "⚠️ I am missing admin rights needed to guard this group: can_restrict_members";

    await h.service.onParticipantDetected(joined("b23"));
    await h.service.onParticipantDetected(joined("b24"));
    await h.service.onParticipantDetected(joined("b25", { communityId: "c2" }));
    await h.service.drain();

    expect(h.posts).toEqual([
      { communityId: "c1", text: warning },
      { communityId: "c2", text: warning }
    ]);
  });

  test("checks bot rights again after a failed lookup", async () => {
    let lookups = 0;
    const h = buildHarness({
      missingCapabilities: async () => {
        lookups += 1;
        if (lookups === 1) {
          throw new Error("Too Many Requests");
        }
        return ["can_delete_messages"];
      }
    });

    for (const participantId of ["b26", "b27", "b28"]) {
      await h.service.onParticipantDetected(joined(participantId));
      await h.service.drain();
    }

    expect(lookups).toBe(2);
    expect(h.posts).toEqual([
      { communityId: "c1", text: "⚠️ I am missing admin rights needed to guard this group: can_delete_messages" }
    ]);
  });
});

export const AUDIT_EVENT_TYPES = [
  "detected",
  "approved",
  "rejected",
  "timed_out",
  "removal_failed",
  "pre_approved"
] as const;

export type AuditEventType = (typeof AUDIT_EVENT_TYPES)[number];

export type OutcomeEventType = Extract<AuditEventType, "approved" | "rejected" | "timed_out">;

export const SYSTEM_ACTOR = "system";

export interface AuditRecordInput {
  communityId: string;
  participantId: string;
  participantName: string | null;
  eventType: AuditEventType;
  actorId: string;
  occurredAt: Date;
  detail: Record<string, unknown>;
}

export interface AuditRecord extends AuditRecordInput {
  id: number;
}

export interface AuditRow {
  id: string;
  community_id: string;
  participant_id: string;
  participant_name: string | null;
  event_type: AuditEventType;
  actor_id: string;
  occurred_at: Date;
  detail: Record<string, unknown>;
}

export interface OutcomeCounts {
  total: number;
  detected: number;
  approved: number;
  rejected: number;
  timedOut: number;
}

export interface AuditStats {
  overall: OutcomeCounts;
  lastDay: OutcomeCounts;
}

export interface ApprovedParticipantRow {
  community_id: string;
  participant_id: string;
  approved_by: string;
  approved_at: Date;
}

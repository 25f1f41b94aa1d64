import type { AuditEventType, AuditRecord, OutcomeCounts } from "../db/types.js";
import type { PendingApproval } from "../services/approval-registry.js";

const EVENT_ICONS: Record<AuditEventType, string> = {
  detected: "🔍",
  approved: "✅",
  rejected: "❌",
  timed_out: "⏰",
  removal_failed: "⚠️",
  pre_approved: "☑️"
};

const EVENT_LABELS: Record<AuditEventType, string> = {
  detected: "Detected",
  approved: "Approved",
  rejected: "Rejected",
  timed_out: "Timed out",
  removal_failed: "Removal failed",
  pre_approved: "Pre-approved"
};

export function formatCountdown(seconds: number): string {
  if (seconds <= 0) {
    return "⏰ Time's up!";
  }

  if (seconds === 1) {
    return "⏰ 1 second remaining";
  }

  return `⏰ ${seconds} seconds remaining`;
}

export function remainingSeconds(entry: PendingApproval, now: Date): number {
  return Math.max(0, Math.ceil((entry.deadline.getTime() - now.getTime()) / 1000));
}

export function participantLabel(name: string | null | undefined, id: string): string {
  return name ? `${name} (ID: ${id})` : `ID: ${id}`;
}

/** `YYYY-MM-DD HH:MM:SS UTC` */
export function formatTimestamp(date: Date): string {
  return `${date.toISOString().slice(0, 19).replace("T", " ")} UTC`;
}

export function formatEventLine(record: AuditRecord): string {
  return `${EVENT_ICONS[record.eventType]} ${EVENT_LABELS[record.eventType]} - ${formatTimestamp(record.occurredAt)} by ${record.actorId}`;
}

export function formatCounts(title: string, counts: OutcomeCounts): string {
  return [
    title,
    `Total: ${counts.total}`,
    `Approved: ${counts.approved}`,
    `Rejected: ${counts.rejected}`,
    `Timed out: ${counts.timedOut}`
  ].join("\n");
}

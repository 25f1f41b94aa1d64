import type { AppEnv } from "../config/env.js";
import { getEnv } from "../config/env.js";
import { AuditRepository } from "../db/repositories/audit-repository.js";
import type { AuditEventType, AuditRecord, AuditRecordInput, AuditStats } from "../db/types.js";
import { errorMessage, logger } from "../lib/logger.js";

const DAY_MS = 24 * 60 * 60 * 1000;

interface AuditStoreLike {
  append(record: AuditRecordInput): Promise<void>;
  history(communityId: string, participantId: string): Promise<AuditRecord[]>;
  recent(communityId: string | undefined, limit: number): Promise<AuditRecord[]>;
  recentOutcomes(communityId: string | undefined, limit: number): Promise<AuditRecord[]>;
  stats(communityId: string | undefined, since: Date): Promise<AuditStats>;
}

export interface AuditEntry {
  communityId: string;
  participantId: string;
  participantName?: string | null;
  eventType: AuditEventType;
  actorId: string;
  detail?: Record<string, unknown>;
}

export type AuditWriteResult =
  | { ok: true; attempts: number }
  | { ok: false; reason: "storage_unavailable"; attempts: number; error: string };

type AuditEnv = Pick<AppEnv, "AUDIT_WRITE_ATTEMPTS" | "AUDIT_RETRY_DELAY_MS">;

export class AuditTrailService {
  private readonly attempts: number;
  private readonly retryDelayMs: number;

  constructor(
    private readonly store: AuditStoreLike = new AuditRepository(),
    env?: AuditEnv,
    private readonly now: () => Date = () => new Date(),
    private readonly sleep: (ms: number) => Promise<void> = defaultSleep
  ) {
    const resolved = env ?? getEnv();
    this.attempts = resolved.AUDIT_WRITE_ATTEMPTS;
    this.retryDelayMs = resolved.AUDIT_RETRY_DELAY_MS;
  }

  /**
   * Appends one immutable record. Retries with linear backoff and, once the
   * attempts are spent, logs the lost record as an audit gap instead of throwing.
   */
  async record(entry: AuditEntry): Promise<AuditWriteResult> {
    const record: AuditRecordInput = {
      communityId: entry.communityId,
      participantId: entry.participantId,
      participantName: entry.participantName ?? null,
      eventType: entry.eventType,
      actorId: entry.actorId,
      occurredAt: this.now(),
      detail: entry.detail ?? {}
    };

    let lastError = "";
    for (let attempt = 1; attempt <= this.attempts; attempt += 1) {
      try {
        await this.store.append(record);
        return { ok: true, attempts: attempt };
      } catch (error) {
        lastError = errorMessage(error);
        logger.warn("Audit write failed", {
          communityId: record.communityId,
          participantId: record.participantId,
          eventType: record.eventType,
          attempt,
          error: lastError
        });

        if (attempt < this.attempts && this.retryDelayMs > 0) {
          await this.sleep(this.retryDelayMs * attempt);
        }
      }
    }

    logger.error("Audit gap: record dropped after retries", {
      communityId: record.communityId,
      participantId: record.participantId,
      eventType: record.eventType,
      actorId: record.actorId,
      occurredAt: record.occurredAt.toISOString(),
      attempts: this.attempts,
      error: lastError
    });
    return { ok: false, reason: "storage_unavailable", attempts: this.attempts, error: lastError };
  }

  async history(communityId: string, participantId: string): Promise<AuditRecord[]> {
    return this.store.history(communityId, participantId);
  }

  async recent(communityId: string | undefined, limit: number): Promise<AuditRecord[]> {
    return this.store.recent(communityId, limit);
  }

  async recentOutcomes(communityId: string | undefined, limit: number): Promise<AuditRecord[]> {
    return this.store.recentOutcomes(communityId, limit);
  }

  async stats(communityId?: string): Promise<AuditStats> {
    return this.store.stats(communityId, new Date(this.now().getTime() - DAY_MS));
  }
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

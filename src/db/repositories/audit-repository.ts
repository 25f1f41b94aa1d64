import type { Sql } from "postgres";

import { getSql } from "../postgres.js";
import type { AuditRecord, AuditRecordInput, AuditRow, AuditStats, OutcomeCounts } from "../types.js";

export interface CountsRow {
  detected: number;
  approved: number;
  rejected: number;
  timed_out: number;
}

export class AuditRepository {
  constructor(private readonly sql: Sql = getSql()) {}

  async append(record: AuditRecordInput): Promise<void> {
    const detail = record.detail as unknown as never;
    await this.sql`
      INSERT INTO participant_audit_log (
        community_id, participant_id, participant_name, event_type, actor_id, occurred_at, detail
      )
      VALUES (
        ${record.communityId},
        ${record.participantId},
        ${record.participantName},
        ${record.eventType},
        ${record.actorId},
        ${record.occurredAt},
        ${this.sql.json(detail)}
      )
    `;
  }

  async history(communityId: string, participantId: string): Promise<AuditRecord[]> {
    const rows = await this.sql<AuditRow[]>`
      SELECT id, community_id, participant_id, participant_name, event_type, actor_id, occurred_at, detail
      FROM participant_audit_log
      WHERE community_id = ${communityId}
        AND participant_id = ${participantId}
      ORDER BY occurred_at DESC, id DESC
    `;

    return rows.map(toRecord);
  }

  async recent(communityId: string | undefined, limit: number): Promise<AuditRecord[]> {
    const rows = communityId
      ? await this.sql<AuditRow[]>`
          SELECT id, community_id, participant_id, participant_name, event_type, actor_id, occurred_at, detail
          FROM participant_audit_log
          WHERE community_id = ${communityId}
          ORDER BY occurred_at DESC, id DESC
          LIMIT ${limit}
        `
      : await this.sql<AuditRow[]>`
          SELECT id, community_id, participant_id, participant_name, event_type, actor_id, occurred_at, detail
          FROM participant_audit_log
          ORDER BY occurred_at DESC, id DESC
          LIMIT ${limit}
        `;

    return rows.map(toRecord);
  }

  async recentOutcomes(communityId: string | undefined, limit: number): Promise<AuditRecord[]> {
    const rows = communityId
      ? await this.sql<AuditRow[]>`
          SELECT id, community_id, participant_id, participant_name, event_type, actor_id, occurred_at, detail
          FROM participant_audit_log
          WHERE community_id = ${communityId}
            AND event_type IN ('approved', 'rejected', 'timed_out')
          ORDER BY occurred_at DESC, id DESC
          LIMIT ${limit}
        `
      : await this.sql<AuditRow[]>`
          SELECT id, community_id, participant_id, participant_name, event_type, actor_id, occurred_at, detail
          FROM participant_audit_log
          WHERE event_type IN ('approved', 'rejected', 'timed_out')
          ORDER BY occurred_at DESC, id DESC
          LIMIT ${limit}
        `;

    return rows.map(toRecord);
  }

  async stats(communityId: string | undefined, since: Date): Promise<AuditStats> {
    const scope = communityId ? this.sql`WHERE community_id = ${communityId}` : this.sql``;
    const [overall] = await this.sql<CountsRow[]>`
      SELECT
        (COUNT(*) FILTER (WHERE event_type = 'detected'))::int AS detected,
        (COUNT(*) FILTER (WHERE event_type = 'approved'))::int AS approved,
        (COUNT(*) FILTER (WHERE event_type = 'rejected'))::int AS rejected,
        (COUNT(*) FILTER (WHERE event_type = 'timed_out'))::int AS timed_out
      FROM participant_audit_log
      ${scope}
    `;
    const [lastDay] = await this.sql<CountsRow[]>`
      SELECT
        (COUNT(*) FILTER (WHERE occurred_at > ${since} AND event_type = 'detected'))::int AS detected,
        (COUNT(*) FILTER (WHERE occurred_at > ${since} AND event_type = 'approved'))::int AS approved,
        (COUNT(*) FILTER (WHERE occurred_at > ${since} AND event_type = 'rejected'))::int AS rejected,
        (COUNT(*) FILTER (WHERE occurred_at > ${since} AND event_type = 'timed_out'))::int AS timed_out
      FROM participant_audit_log
      ${scope}
    `;

    return {
      overall: toOutcomeCounts(overall),
      lastDay: toOutcomeCounts(lastDay)
    };
  }
}

function toRecord(row: AuditRow): AuditRecord {
  return {
    id: Number(row.id),
    communityId: row.community_id,
    participantId: row.participant_id,
    participantName: row.participant_name,
    eventType: row.event_type,
    actorId: row.actor_id,
    occurredAt: row.occurred_at,
    detail: row.detail
  };
}

/** `total` counts decisions only: approvals, rejections and timeouts. */
export function toOutcomeCounts(row: CountsRow | undefined): OutcomeCounts {
  const approved = row?.approved ?? 0;
  const rejected = row?.rejected ?? 0;
  const timedOut = row?.timed_out ?? 0;

  return {
    total: approved + rejected + timedOut,
    detected: row?.detected ?? 0,
    approved,
    rejected,
    timedOut
  };
}

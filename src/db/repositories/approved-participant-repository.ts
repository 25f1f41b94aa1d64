import type { Sql } from "postgres";

import { getSql } from "../postgres.js";
import type { ApprovedParticipantRow } from "../types.js";

export class ApprovedParticipantRepository {
  constructor(private readonly sql: Sql = getSql()) {}

  async isApproved(communityId: string, participantId: string): Promise<boolean> {
    const rows = await this.sql<Pick<ApprovedParticipantRow, "participant_id">[]>`
      SELECT participant_id
      FROM approved_participants
      WHERE community_id = ${communityId}
        AND participant_id = ${participantId}
      LIMIT 1
    `;

    return rows.length > 0;
  }

  async add(communityId: string, participantId: string, approvedBy: string): Promise<void> {
    await this.sql`
      INSERT INTO approved_participants (community_id, participant_id, approved_by)
      VALUES (${communityId}, ${participantId}, ${approvedBy})
      ON CONFLICT (community_id, participant_id)
      DO UPDATE SET approved_by = EXCLUDED.approved_by, approved_at = NOW()
    `;
  }
}

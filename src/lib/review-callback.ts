const PREFIX = "gate";

export const APPROVE_EMOJI = "✅";
export const REJECT_EMOJI = "❌";

export interface ReviewCallback {
  approve: boolean;
  communityId: string;
  participantId: string;
}

export function encodeReviewCallback(approve: boolean, communityId: string, participantId: string): string {
  return [PREFIX, approve ? "a" : "r", communityId, participantId].join(":");
}

export function parseReviewCallback(data: string | undefined): ReviewCallback | null {
  if (!data) {
    return null;
  }

  const match = data.match(/^gate:([ar]):(-?\d+):(\d+)$/);
  if (!match) {
    return null;
  }

  const [, decision, communityId, participantId] = match;
  if (!decision || !communityId || !participantId) {
    return null;
  }

  return { approve: decision === "a", communityId, participantId };
}

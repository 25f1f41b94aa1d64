import { formatTimestamp, participantLabel } from "../lib/format.js";
import { errorMessage, logger } from "../lib/logger.js";
import { APPROVE_EMOJI, encodeReviewCallback, REJECT_EMOJI } from "../lib/review-callback.js";
import type { Reviewer } from "./reviewer-permission-service.js";

export interface ReviewButton {
  text: string;
  data: string;
}

export interface ReviewRequest {
  communityId: string;
  communityTitle: string | null;
  participantId: string;
  participantName: string | null;
  inviterName: string | null;
  detectedAt: Date;
  timeoutSeconds: number;
}

interface DirectMessengerLike {
  sendDirectMessage(userId: string, text: string, buttons?: ReviewButton[]): Promise<void>;
}

export class ReviewNotifierService {
  constructor(private readonly messenger: DirectMessengerLike) {}

  /** Returns how many reviewers actually received the request. */
  async notify(request: ReviewRequest, reviewers: Reviewer[]): Promise<number> {
    const text = formatReviewRequest(request);
    const buttons: ReviewButton[] = [
      { text: `${APPROVE_EMOJI} Approve`, data: encodeReviewCallback(true, request.communityId, request.participantId) },
      { text: `${REJECT_EMOJI} Reject`, data: encodeReviewCallback(false, request.communityId, request.participantId) }
    ];

    let delivered = 0;
    for (const reviewer of reviewers) {
      try {
        await this.messenger.sendDirectMessage(reviewer.userId, text, buttons);
        delivered += 1;
      } catch (error) {
        logger.warn("Failed to notify reviewer", {
          communityId: request.communityId,
          participantId: request.participantId,
          reviewerId: reviewer.userId,
          error: errorMessage(error)
        });
      }
    }

    logger.info("Review request delivered", {
      communityId: request.communityId,
      participantId: request.participantId,
      delivered,
      reviewers: reviewers.length
    });
    return delivered;
  }
}

export function formatReviewRequest(request: ReviewRequest): string {
  const community = request.communityTitle ?? request.communityId;
  return [
    "🚨 New bot detected",
    `A new bot joined ${community} and requires approval.`,
    "",
    `Bot: ${participantLabel(request.participantName, request.participantId)}`,
    `Invited by: ${request.inviterName ?? "Unknown"}`,
    `Detected: ${formatTimestamp(request.detectedAt)}`,
    "",
    `Tap ${APPROVE_EMOJI} to approve or ${REJECT_EMOJI} to reject.`,
    `⏰ Auto-reject in ${request.timeoutSeconds} seconds.`
  ].join("\n");
}

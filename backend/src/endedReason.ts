// backend/src/endedReason.ts

export type EndedCallOutcome = "missed" | "failed" | "completed";

export interface EndedReasonKeywords {
  missed: string[];
  failed: string[];
}

export interface EndedCallSignal {
  answeredAt?: string | null;
  endedReason?: string | null;
}

/**
 * Classify an `ended` status update.
 *
 * A call that never connected (no answeredAt) is always missed.
 * Otherwise the ended reason is matched by substring, missed keywords first,
 * then failed keywords. No match means the conversation completed.
 * An answered call whose reason matches a missed keyword is still missed.
 */
export function classifyEndedCall(signal: EndedCallSignal, keywords: EndedReasonKeywords): EndedCallOutcome {
  if (!signal.answeredAt) {
    return "missed";
  }

  const reason = (signal.endedReason || "").toLowerCase();
  if (!reason) {
    return "completed";
  }

  if (keywords.missed.some((keyword) => reason.includes(keyword))) {
    return "missed";
  }
  if (keywords.failed.some((keyword) => reason.includes(keyword))) {
    return "failed";
  }
  return "completed";
}

import { describe, expect, test } from "vitest";

import { formatCountdown, formatTimestamp, participantLabel, remainingSeconds } from "../src/lib/format.js";

describe("format", () => {
  test("formats the countdown", () => {
    expect(formatCountdown(0)).toBe("⏰ Time's up!");
    expect(formatCountdown(1)).toBe("⏰ 1 second remaining");
    expect(formatCountdown(9)).toBe("⏰ 9 seconds remaining");
  });

  test("rounds remaining time up and never below zero", () => {
    const entry = {
      communityId: "c1",
      participantId: "b1",
      participantName: null,
      detectedAt: new Date("2026-03-01T12:00:00Z"),
      deadline: new Date("2026-03-01T12:00:10Z"),
      status: "pending" as const
    };

    expect(remainingSeconds(entry, new Date("2026-03-01T12:00:08.500Z"))).toBe(2);
    expect(remainingSeconds(entry, new Date("2026-03-01T12:00:30Z"))).toBe(0);
  });

  test("labels participants with or without a name", () => {
    expect(participantLabel("@spam_bot", "5")).toBe("@spam_bot (ID: 5)");
    expect(participantLabel(null, "5")).toBe("ID: 5");
  });

  test("prints UTC timestamps", () => {
    expect(formatTimestamp(new Date("2026-03-01T04:05:06.789Z"))).toBe("2026-03-01 04:05:06 UTC");
  });
});

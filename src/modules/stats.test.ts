import { describe, it, expect } from "vitest";
import { describeEnd, formatSummary } from "./stats";
import { createRunState } from "./walker";

describe("formatSummary", () => {
  it("lists every counter", () => {
    expect(
      formatSummary({
        total: 7,
        downloaded: 3,
        skipped: 2,
        duplicateErrors: 1,
        failed: 1,
      }),
    ).toBe("Downloaded 3 files (Processed 7, Skipped 2, Exists 1, Failed 1)");
  });
});

describe("describeEnd", () => {
  it("names the terminal state", () => {
    const state = createRunState("");
    expect(describeEnd(state)).toBe("Interrupted");

    state.status = "exhausted";
    expect(describeEnd(state)).toBe("Feed exhausted");

    state.status = "stopped";
    state.stopReason = "update-complete";
    expect(describeEnd(state)).toBe("Update complete");

    state.stopReason = "target-reached";
    expect(describeEnd(state)).toBe("Download target reached");
  });
});

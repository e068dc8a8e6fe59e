/**
 * Run Tracker
 * Counters and failure issues for one download run
 */

import { ZodError } from "zod";
import { HttpError, InvalidUrlError } from "./http";
import type {
  DownloadOutcome,
  FailureIssue,
  RunCounters,
  RunStats,
  TransportFailureReason,
} from "../types";

// ============================================================================
// Error Mapping
// ============================================================================

interface FailureInfo {
  reason: TransportFailureReason;
  details: string;
}

export function mapTransportError(error: unknown): FailureInfo {
  if (error instanceof HttpError) {
    return { reason: "http-error", details: error.message };
  }
  if (error instanceof InvalidUrlError) {
    return { reason: "invalid-url", details: error.message };
  }
  if (error instanceof ZodError) {
    return {
      reason: "network-error",
      details: `Malformed response: ${error.issues.map((e) => e.message).join("; ")}`,
    };
  }
  if (error instanceof Error) {
    if (error.name === "AbortError" || error.name === "TimeoutError") {
      return { reason: "timeout", details: "Request timed out" };
    }
    // fetch wraps socket errors: TypeError("fetch failed", { cause })
    const cause = error.cause instanceof Error ? `: ${error.cause.message}` : "";
    return { reason: "network-error", details: `${error.message}${cause}` };
  }
  return { reason: "network-error", details: String(error) };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private total = 0;
  private downloaded = 0;
  private skipped = 0;
  private duplicateErrors = 0;
  private failed = 0;
  private issues: FailureIssue[] = [];
  private startTime = new Date();

  incrementTotal(): void {
    this.total++;
  }

  /**
   * Update counters for one outcome. Failures also keep an issue so the
   * run can be retried from the right cursor.
   */
  record(outcome: DownloadOutcome, url: string, itemId: string): void {
    switch (outcome.kind) {
      case "downloaded":
        this.downloaded++;
        break;
      case "skipped-wrong-type":
      case "skipped-filter":
        this.skipped++;
        break;
      case "skipped-duplicate":
        this.duplicateErrors++;
        break;
      case "failed":
        this.failed++;
        this.issues.push({
          url,
          itemId,
          reason: outcome.reason,
          details: outcome.details,
        });
        break;
    }
  }

  getDownloaded(): number {
    return this.downloaded;
  }

  getIssues(reason?: TransportFailureReason): FailureIssue[] {
    if (!reason) return this.issues;
    return this.issues.filter((i) => i.reason === reason);
  }

  getCounters(): RunCounters {
    return {
      total: this.total,
      downloaded: this.downloaded,
      skipped: this.skipped,
      duplicateErrors: this.duplicateErrors,
      failed: this.failed,
    };
  }

  getStats(): RunStats {
    return {
      ...this.getCounters(),
      issues: this.issues,
      duration: Date.now() - this.startTime.getTime(),
    };
  }
}

/**
 * Download result and outcome types
 */

export type ImageMimeType = "image/jpeg" | "image/png" | "image/gif";

// Returned by the image fetcher; transport failures are thrown instead
export type FetchResult =
  | { kind: "downloaded"; filename: string; path: string; bytes: number }
  | { kind: "wrong-content-type"; contentType: string }
  | { kind: "already-exists"; filename: string };

export type FilterReason = "score" | "sfw" | "nsfw" | "title";

export type TransportFailureReason =
  | "http-error"
  | "timeout"
  | "invalid-url"
  | "network-error";

// Everything the walker can record for one item or URL
export type DownloadOutcome =
  | { kind: "downloaded"; filename: string }
  | { kind: "skipped-wrong-type"; contentType: string }
  | { kind: "skipped-duplicate"; filename: string }
  | { kind: "skipped-filter"; reason: FilterReason }
  | { kind: "failed"; reason: TransportFailureReason; details: string };

export interface FailureIssue {
  url: string;
  itemId: string;
  reason: TransportFailureReason;
  details: string;
}

export interface RunCounters {
  total: number;
  downloaded: number;
  skipped: number;
  duplicateErrors: number;
  failed: number;
}

export interface RunStats extends RunCounters {
  issues: FailureIssue[];
  duration: number;
}

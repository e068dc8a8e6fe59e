/**
 * Central type exports
 */

// Configuration
export type {
  DownloaderConfig,
  PartialDownloaderConfig,
  FeedConfig,
  HttpConfig,
  ImageHostConfig,
  LoggingConfig,
  LogLevel,
} from "./config";
export {
  DownloaderConfigSchema,
  PartialDownloaderConfigSchema,
} from "./config";

// Feed
export type { FeedItem, Listing, FeedSource } from "./feed";
export { FeedItemSchema, ListingSchema } from "./feed";

// Outcomes
export type {
  ImageMimeType,
  FetchResult,
  FilterReason,
  TransportFailureReason,
  DownloadOutcome,
  FailureIssue,
  RunCounters,
  RunStats,
} from "./outcome";

// Context
export type {
  RunOptions,
  RunContext,
  RunState,
  RunStatus,
  StopReason,
  LinkResolution,
  ContentFetcher,
} from "./context";

// Tracker
export { Tracker } from "../utils/tracker";

/**
 * Run context - flows through the download pipeline
 * The walker reads its collaborators from here and mutates only RunState
 */

import type { FeedSource } from "./feed";
import type { FetchResult } from "./outcome";
import type { Tracker } from "../utils/tracker";
import type { Logger } from "../utils/logger";

export interface RunOptions {
  subreddit: string;
  destDir: string;
  last: string; // Starting cursor, "" = newest
  score: number; // Minimum score
  num: number; // Stop after this many downloads, 0 = unlimited
  update: boolean; // Stop at the first file already on disk
  sfw: boolean;
  nsfw: boolean;
  regex?: RegExp; // Sticky pattern, must match from the start of the title
}

export interface LinkResolution {
  resolve(url: string): Promise<string[]>;
}

export interface ContentFetcher {
  fetch(url: string, destDir: string): Promise<FetchResult>;
}

export interface RunContext {
  options: RunOptions;
  feed: FeedSource;
  resolver: LinkResolution;
  fetcher: ContentFetcher;
  logger: Logger;
}

export type RunStatus = "paging" | "exhausted" | "stopped";
export type StopReason = "target-reached" | "update-complete";

export interface RunState {
  cursor: string;
  status: RunStatus;
  stopReason?: StopReason;
  tracker: Tracker;
}

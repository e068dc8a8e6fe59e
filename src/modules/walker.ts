/**
 * Walker Module
 * Pages through the feed, filters items and drives resolution and download
 *
 * Reads from context: options, feed, resolver, fetcher, logger
 * Writes to state: cursor, status, stopReason, tracker counters
 */

import { Tracker, mapTransportError } from "../utils/tracker";
import type { Logger } from "../utils/logger";
import type {
  DownloadOutcome,
  FeedItem,
  RunContext,
  RunState,
} from "../types";
import { describeSkip, filterItem } from "./filter";

export function createRunState(cursor: string): RunState {
  return { cursor, status: "paging", tracker: new Tracker() };
}

/**
 * Run until the feed is exhausted or a stop policy fires.
 * A failing feed request propagates; state keeps what was done so far.
 */
export async function walk(ctx: RunContext, state: RunState): Promise<RunState> {
  const { feed, options, logger } = ctx;

  while (state.status === "paging") {
    logger.debug(`Fetching page after "${state.cursor}"`);
    const items = await feed.getItems(options.subreddit, state.cursor);

    if (items.length === 0) {
      state.status = "exhausted";
      break;
    }

    const lastId = items[items.length - 1].id;
    if (lastId === state.cursor) {
      // Feed handed back the page we just finished
      state.status = "exhausted";
      break;
    }

    // Advance before filtering so an all-skipped page still moves on
    state.cursor = lastId;

    for (const item of items) {
      await processItem(ctx, state, item);
      if (state.status !== "paging") break;
    }
  }

  return state;
}

async function processItem(
  ctx: RunContext,
  state: RunState,
  item: FeedItem,
): Promise<void> {
  const { options, logger } = ctx;
  state.tracker.incrementTotal();

  const reason = filterItem(item, options);
  if (reason) {
    logger.debug(describeSkip(item, reason, options));
    state.tracker.record({ kind: "skipped-filter", reason }, item.url, item.id);
    return;
  }

  logger.debug(`Accepted ${item.id}: ${item.title}`);

  let urls: string[];
  try {
    urls = await ctx.resolver.resolve(item.url);
  } catch (error) {
    const outcome = toFailure(error);
    state.tracker.record(outcome, item.url, item.id);
    logger.warn(
      `Could not expand ${item.url} (item ${item.id}): ${outcome.details}`,
    );
    return;
  }

  if (urls.length === 0) {
    logger.debug(`No images found for ${item.id} (${item.url})`);
  }

  for (const url of urls) {
    const outcome = await download(ctx, url);
    state.tracker.record(outcome, url, item.id);
    report(logger, outcome, url, item.id);

    applyStopPolicy(ctx, state, outcome);
    if (state.status === "stopped") return;
  }
}

async function download(ctx: RunContext, url: string): Promise<DownloadOutcome> {
  try {
    const result = await ctx.fetcher.fetch(url, ctx.options.destDir);
    switch (result.kind) {
      case "downloaded":
        return { kind: "downloaded", filename: result.filename };
      case "wrong-content-type":
        return { kind: "skipped-wrong-type", contentType: result.contentType };
      case "already-exists":
        return { kind: "skipped-duplicate", filename: result.filename };
    }
  } catch (error) {
    return toFailure(error);
  }
}

function toFailure(error: unknown): Extract<DownloadOutcome, { kind: "failed" }> {
  const { reason, details } = mapTransportError(error);
  return { kind: "failed", reason, details };
}

function applyStopPolicy(
  ctx: RunContext,
  state: RunState,
  outcome: DownloadOutcome,
): void {
  const { options, logger } = ctx;

  if (
    outcome.kind === "downloaded" &&
    options.num > 0 &&
    state.tracker.getDownloaded() >= options.num
  ) {
    logger.info(`Reached ${options.num} downloads, stopping.`);
    state.status = "stopped";
    state.stopReason = "target-reached";
  } else if (outcome.kind === "skipped-duplicate" && options.update) {
    logger.info("Update complete, exiting.");
    state.status = "stopped";
    state.stopReason = "update-complete";
  }
}

function report(
  logger: Logger,
  outcome: DownloadOutcome,
  url: string,
  itemId: string,
): void {
  switch (outcome.kind) {
    case "downloaded":
      logger.info(`Downloaded URL [${url}].`);
      break;
    case "skipped-wrong-type":
      logger.info(`Wrong file type: ${url} has type: ${outcome.contentType}!`);
      break;
    case "skipped-duplicate":
      logger.info(`URL [${url}] already downloaded.`);
      break;
    case "skipped-filter":
      break;
    case "failed":
      logger.warn(
        `${outcome.reason}: ${url} (item ${itemId}): ${outcome.details}`,
      );
      break;
  }
}

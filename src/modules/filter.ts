/**
 * Filter Module
 * Decides whether a feed item is worth resolving
 */

import type { FeedItem, FilterReason, RunOptions } from "../types";

export type FilterCriteria = Pick<RunOptions, "score" | "sfw" | "nsfw" | "regex">;

/**
 * Compile a title pattern that only matches at the start of the title
 * Throws SyntaxError for an invalid pattern
 */
export function compileTitlePattern(pattern: string): RegExp {
  return new RegExp(pattern, "y");
}

function matchesFromStart(pattern: RegExp, title: string): boolean {
  pattern.lastIndex = 0;
  return pattern.test(title);
}

/**
 * First failing rule, or null when the item passes every filter
 * With both sfw and nsfw set every item is rejected
 */
export function filterItem(
  item: FeedItem,
  criteria: FilterCriteria,
): FilterReason | null {
  if (item.score < criteria.score) return "score";
  if (criteria.sfw && item.over_18) return "sfw";
  if (criteria.nsfw && !item.over_18) return "nsfw";
  if (criteria.regex && !matchesFromStart(criteria.regex, item.title)) {
    return "title";
  }
  return null;
}

export function describeSkip(
  item: FeedItem,
  reason: FilterReason,
  criteria: FilterCriteria,
): string {
  switch (reason) {
    case "score":
      return `SCORE: ${item.id} has score of ${item.score} which is lower than required score of ${criteria.score}.`;
    case "sfw":
      return `NSFW: ${item.id} is marked as NSFW.`;
    case "nsfw":
      return `Not NSFW, skipping ${item.id}.`;
    case "title":
      return `TITLE: ${item.id} does not match ${criteria.regex?.source ?? ""}.`;
  }
}

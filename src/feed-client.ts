/**
 * Subreddit feed client
 * Reads listing pages from the public JSON endpoint
 */

import { requestWithRetry, type HttpFetch } from "./utils/http";
import { ListingSchema } from "./types";
import type { FeedConfig, FeedItem, FeedSource, HttpConfig } from "./types";

export class RedditFeed implements FeedSource {
  constructor(
    private feed: FeedConfig,
    private http: HttpConfig,
    private doFetch?: HttpFetch,
  ) {}

  buildUrl(subreddit: string, afterId: string): string {
    const url = new URL(
      `/r/${encodeURIComponent(subreddit)}.json`,
      this.feed.baseUrl,
    );
    url.searchParams.set("limit", String(this.feed.pageSize));
    if (afterId) {
      url.searchParams.set("after", `t3_${afterId}`);
    }
    return url.toString();
  }

  async getItems(subreddit: string, afterId: string): Promise<FeedItem[]> {
    const body = await requestWithRetry(
      this.buildUrl(subreddit, afterId),
      {
        timeout: this.http.timeout,
        userAgent: this.http.userAgent,
        retries: this.feed.retries,
        fetch: this.doFetch,
      },
      (response) => response.json(),
    );

    const listing = ListingSchema.parse(body);
    return listing.data.children.map((child) => child.data);
  }
}

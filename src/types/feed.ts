/**
 * Feed type definitions
 */

import { z } from "zod";

export const FeedItemSchema = z.object({
  id: z.string().min(1),
  url: z.string(),
  title: z.string(),
  score: z.number().int(),
  over_18: z.boolean(),
});

// Listing envelope returned by the subreddit JSON endpoint
export const ListingSchema = z.object({
  data: z.object({
    children: z.array(z.object({ data: FeedItemSchema })),
  }),
});

export type FeedItem = z.infer<typeof FeedItemSchema>;
export type Listing = z.infer<typeof ListingSchema>;

/**
 * Source of feed pages. `afterId` is the id of the last item already seen,
 * or an empty string for the newest page.
 */
export interface FeedSource {
  getItems(subreddit: string, afterId: string): Promise<FeedItem[]>;
}

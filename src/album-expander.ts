/**
 * Gallery Expander
 * Fetches a gallery page and extracts its direct image URLs
 */

import { request, type HttpFetch } from "./utils/http";
import { parseContentType } from "./utils/mime";
import type { AlbumLinkExtractor } from "./album-extractors";
import type { HttpConfig } from "./types";

/**
 * Resolves [] for pages that are not HTML or carry no images.
 * Rejects on transport failure (HTTP error status, network error, timeout,
 * invalid URL); callers catch and record it.
 */
export interface AlbumExpansion {
  expandAlbum(albumUrl: string): Promise<string[]>;
}

export class AlbumExpander implements AlbumExpansion {
  constructor(
    private extractor: AlbumLinkExtractor,
    private http: HttpConfig,
    private doFetch?: HttpFetch,
  ) {}

  async expandAlbum(albumUrl: string): Promise<string[]> {
    const html = await request(
      albumUrl,
      {
        timeout: this.http.timeout,
        userAgent: this.http.userAgent,
        fetch: this.doFetch,
      },
      async (response) => {
        const contentType = parseContentType(
          response.headers.get("content-type"),
        );
        if (contentType && !contentType.startsWith("text/html")) {
          await response.body?.cancel();
          return null;
        }
        return response.text();
      },
    );

    return html === null ? [] : this.extractor.extract(html);
  }
}

/**
 * Album link extractors
 * Turn the text of a gallery page into direct image URLs
 */

import * as cheerio from "cheerio";
import type { ImageHostConfig } from "./types";

export interface AlbumLinkExtractor {
  extract(html: string): string[];
}

const HASH_PATTERN = /"hash":"([^"]+)"/g;

/**
 * Scans the page's inline data for `"hash":"<token>"` markers and builds a
 * direct link for each token. Order follows the document, duplicates kept.
 */
export class HashTokenExtractor implements AlbumLinkExtractor {
  constructor(private template: string) {}

  extract(html: string): string[] {
    const urls: string[] = [];

    for (const line of html.split(/\r?\n/)) {
      for (const match of line.matchAll(HASH_PATTERN)) {
        urls.push(this.template.replaceAll("{hash}", match[1]));
      }
    }

    return urls;
  }
}

/**
 * Reads og:image / twitter:image meta tags
 */
export class MetaImageExtractor implements AlbumLinkExtractor {
  extract(html: string): string[] {
    const $ = cheerio.load(html);
    const urls: string[] = [];

    $('meta[property="og:image"], meta[name="twitter:image"]').each((_, el) => {
      const content = $(el).attr("content")?.trim();
      if (content) urls.push(content);
    });

    return urls;
  }
}

export function createAlbumExtractor(
  config: ImageHostConfig,
): AlbumLinkExtractor {
  switch (config.albumExtractor) {
    case "hash":
      return new HashTokenExtractor(config.directUrlTemplate);
    case "meta":
      return new MetaImageExtractor();
  }
}

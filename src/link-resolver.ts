/**
 * Link Resolver
 * Turns one submitted link into the concrete URLs to download
 */

import { posix } from "node:path";
import { isHostOrSubdomain, parseUrl } from "./utils/url";
import type { AlbumExpansion } from "./album-expander";
import type { ImageHostConfig, LinkResolution } from "./types";

export class LinkResolver implements LinkResolution {
  constructor(
    private config: ImageHostConfig,
    private albums: AlbumExpansion,
  ) {}

  /**
   * Resolution order:
   * 1. Image host gallery page -> expanded by the album expander
   * 2. Image host link -> ".png" rewritten to ".jpg", missing extension added
   * 3. Anything else -> unchanged
   */
  async resolve(url: string): Promise<string[]> {
    const parsed = parseUrl(url);
    if (!parsed || !isHostOrSubdomain(parsed.hostname, this.config.domain)) {
      return [url];
    }

    if (this.isAlbum(parsed)) {
      return this.albums.expandAlbum(url);
    }

    return [this.normalizeImageLink(url, parsed)];
  }

  isAlbum(parsed: URL): boolean {
    return this.config.albumPaths.some((prefix) =>
      parsed.pathname.startsWith(prefix),
    );
  }

  /**
   * The host serves a JPEG for most ".png" uploads and for extension-less
   * direct links
   */
  private normalizeImageLink(url: string, parsed: URL): string {
    const { pathname } = parsed;
    if (pathname.endsWith(".png")) {
      parsed.pathname = `${pathname.slice(0, -".png".length)}.jpg`;
      return parsed.toString();
    }

    if (!pathname.endsWith("/") && !posix.extname(posix.basename(pathname))) {
      parsed.pathname = `${pathname}${this.config.defaultExtension}`;
      return parsed.toString();
    }

    return url;
  }
}

/**
 * Image Fetcher
 * Downloads one URL, classifies it and writes it under its URL basename
 */

import { writeFile } from "fs/promises";
import { join } from "node:path";
import { fileExists } from "./utils/file-exists";
import { InvalidUrlError, request, type HttpFetch } from "./utils/http";
import { isAcceptedImageType, resolveContentType } from "./utils/mime";
import { getUrlBasename } from "./utils/url";
import type { ContentFetcher, FetchResult, HttpConfig } from "./types";

export class ImageFetcher implements ContentFetcher {
  constructor(
    private http: HttpConfig,
    private doFetch?: HttpFetch,
  ) {}

  /**
   * Wrong content types and files already on disk come back as results;
   * transport failures are thrown
   */
  async fetch(url: string, destDir: string): Promise<FetchResult> {
    const filename = getUrlBasename(url);
    if (!filename) {
      throw new InvalidUrlError(url);
    }

    const options = {
      timeout: this.http.timeout,
      userAgent: this.http.userAgent,
      fetch: this.doFetch,
    };

    return request(url, options, async (response): Promise<FetchResult> => {
      const contentType = resolveContentType(
        response.headers.get("content-type"),
        url,
      );

      if (!isAcceptedImageType(contentType)) {
        await response.body?.cancel();
        return { kind: "wrong-content-type", contentType };
      }

      const path = join(destDir, filename);
      if (await fileExists(path)) {
        await response.body?.cancel();
        return { kind: "already-exists", filename };
      }

      const buffer = Buffer.from(await response.arrayBuffer());
      await writeFile(path, buffer);

      return { kind: "downloaded", filename, path, bytes: buffer.length };
    });
  }
}

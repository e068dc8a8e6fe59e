import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createRunState, walk } from "./walker";
import { compileTitlePattern } from "./filter";
import { AlbumExpander } from "../album-expander";
import { HashTokenExtractor } from "../album-extractors";
import { LinkResolver } from "../link-resolver";
import { ImageFetcher } from "../image-fetcher";
import { fileExists } from "../utils/file-exists";
import { Logger } from "../utils/logger";
import type { HttpFetch } from "../utils/http";
import type {
  DownloaderConfig,
  FeedItem,
  FeedSource,
  RunContext,
  RunOptions,
} from "../types";

const config: DownloaderConfig = {
  feed: { baseUrl: "https://www.reddit.com", pageSize: 25, retries: 0 },
  http: { timeout: 1000, userAgent: "test-agent" },
  imageHost: {
    domain: "imgur.com",
    albumPaths: ["/a/"],
    defaultExtension: ".jpg",
    albumExtractor: "hash",
    directUrlTemplate: "http://i.imgur.com/{hash}.jpg",
  },
  logging: { level: "silent" },
};

// In-process stand-in for every host the tests touch
const serve: HttpFetch = async (url) => {
  if (url.includes("/a/broken")) {
    return new Response(null, { status: 502, statusText: "Bad Gateway" });
  }
  if (url.includes("/a/")) {
    return new Response('<script>[{"hash":"h1"},{"hash":"h2"}]</script>', {
      headers: { "content-type": "text/html" },
    });
  }
  if (url.endsWith("missing.jpg")) {
    return new Response(null, { status: 404, statusText: "Not Found" });
  }
  if (url.endsWith(".html")) {
    return new Response("<p>hi</p>", { headers: { "content-type": "text/html" } });
  }
  return new Response(new Uint8Array([0xff, 0xd8, 0xff]), {
    headers: { "content-type": "image/jpeg" },
  });
};

class FakeFeed implements FeedSource {
  calls: string[] = [];

  constructor(private pages: FeedItem[][]) {}

  async getItems(_subreddit: string, afterId: string): Promise<FeedItem[]> {
    this.calls.push(afterId);
    return this.pages[this.calls.length - 1] ?? [];
  }
}

function post(id: string, url: string, overrides: Partial<FeedItem> = {}): FeedItem {
  return { id, url, title: `Post ${id}`, score: 10, over_18: false, ...overrides };
}

describe("walk", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "walker-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function setup(pages: FeedItem[][], overrides: Partial<RunOptions> = {}) {
    const feed = new FakeFeed(pages);
    const albums = new AlbumExpander(
      new HashTokenExtractor(config.imageHost.directUrlTemplate),
      config.http,
      serve,
    );
    const resolver = new LinkResolver(config.imageHost, albums);
    const fetcher = new ImageFetcher(config.http, serve);
    const ctx: RunContext = {
      options: {
        subreddit: "pics",
        destDir: dir,
        last: "",
        score: 0,
        num: 0,
        update: false,
        sfw: false,
        nsfw: false,
        ...overrides,
      },
      feed,
      resolver,
      fetcher,
      logger: new Logger("silent"),
    };
    return { ctx, feed, resolver, fetcher };
  }

  // ==========================================================================
  // Filtering and paging
  // ==========================================================================
  describe("filtering and paging", () => {
    it("downloads items above the minimum score and skips the rest", async () => {
      const { ctx, feed } = setup(
        [
          [
            post("a1", "http://example.com/one.jpg", { score: 10 }),
            post("a2", "http://example.com/two.jpg", { score: 1 }),
          ],
        ],
        { score: 5 },
      );

      const state = await walk(ctx, createRunState(""));

      expect(state.tracker.getCounters()).toEqual({
        total: 2,
        downloaded: 1,
        skipped: 1,
        duplicateErrors: 0,
        failed: 0,
      });
      expect(state.status).toBe("exhausted");
      expect(feed.calls).toEqual(["", "a2"]);
      expect(await fileExists(join(dir, "one.jpg"))).toBe(true);
      expect(await fileExists(join(dir, "two.jpg"))).toBe(false);
    });

    it("advances the cursor past a page where every item is filtered", async () => {
      const { ctx, feed } = setup(
        [
          [
            post("b1", "http://example.com/b1.jpg", { score: 0 }),
            post("b2", "http://example.com/b2.jpg", { score: 0 }),
          ],
          [post("b3", "http://example.com/b3.jpg", { score: 0 })],
        ],
        { score: 5 },
      );

      const state = await walk(ctx, createRunState(""));

      expect(feed.calls).toEqual(["", "b2", "b3"]);
      expect(state.cursor).toBe("b3");
      expect(state.tracker.getCounters().skipped).toBe(3);
    });

    it("starts from the given cursor", async () => {
      const { ctx, feed } = setup([]);
      const state = await walk(ctx, createRunState("zz9"));
      expect(feed.calls).toEqual(["zz9"]);
      expect(state.status).toBe("exhausted");
      expect(state.cursor).toBe("zz9");
    });

    it("stops when the feed repeats the page it just served", async () => {
      const page = [post("r1", "http://example.com/r1.jpg")];
      const { ctx, feed } = setup([page, page, page]);

      const state = await walk(ctx, createRunState(""));

      expect(feed.calls).toEqual(["", "r1"]);
      expect(state.status).toBe("exhausted");
      expect(state.tracker.getCounters().total).toBe(1);
    });

    it("applies the title pattern from the start", async () => {
      const { ctx } = setup(
        [
          [
            post("t1", "http://example.com/t1.jpg", { title: "[OC] sunset" }),
            post("t2", "http://example.com/t2.jpg", { title: "sunset [OC]" }),
          ],
        ],
        { regex: compileTitlePattern("\\[OC\\]") },
      );

      const state = await walk(ctx, createRunState(""));

      expect(state.tracker.getCounters()).toMatchObject({ downloaded: 1, skipped: 1 });
      expect(await fileExists(join(dir, "t1.jpg"))).toBe(true);
    });
  });

  // ==========================================================================
  // Stop policies
  // ==========================================================================
  describe("stop policies", () => {
    it("stops after the target number of downloads", async () => {
      const { ctx, feed, resolver } = setup([
        [
          post("n1", "http://example.com/n1.jpg"),
          post("n2", "http://example.com/n2.jpg"),
        ],
      ]);
      ctx.options.num = 1;
      const resolve = vi.spyOn(resolver, "resolve");

      const state = await walk(ctx, createRunState(""));

      expect(state.status).toBe("stopped");
      expect(state.stopReason).toBe("target-reached");
      expect(resolve).toHaveBeenCalledTimes(1);
      expect(resolve).toHaveBeenCalledWith("http://example.com/n1.jpg");
      expect(feed.calls).toEqual([""]);
      expect(state.tracker.getCounters()).toEqual({
        total: 1,
        downloaded: 1,
        skipped: 0,
        duplicateErrors: 0,
        failed: 0,
      });
    });

    it("stops mid-gallery once the target is reached", async () => {
      const { ctx } = setup([[post("g1", "http://imgur.com/a/xyz")]], { num: 1 });

      const state = await walk(ctx, createRunState(""));

      expect(state.stopReason).toBe("target-reached");
      expect(await fileExists(join(dir, "h1.jpg"))).toBe(true);
      expect(await fileExists(join(dir, "h2.jpg"))).toBe(false);
    });

    it("stops at the first existing file in update mode", async () => {
      await writeFile(join(dir, "u3.jpg"), "old");
      const { ctx, fetcher } = setup(
        [
          [
            post("u1", "http://example.com/u1.jpg"),
            post("u2", "http://example.com/u2.jpg"),
            post("u3", "http://example.com/u3.jpg"),
            post("u4", "http://example.com/u4.jpg"),
          ],
        ],
        { update: true },
      );
      const fetchSpy = vi.spyOn(fetcher, "fetch");

      const state = await walk(ctx, createRunState(""));

      expect(state.status).toBe("stopped");
      expect(state.stopReason).toBe("update-complete");
      expect(fetchSpy).toHaveBeenCalledTimes(3);
      expect(state.tracker.getCounters()).toEqual({
        total: 3,
        downloaded: 2,
        skipped: 0,
        duplicateErrors: 1,
        failed: 0,
      });
      expect(await fileExists(join(dir, "u4.jpg"))).toBe(false);
    });

    it("counts existing files and keeps going outside update mode", async () => {
      await writeFile(join(dir, "d1.jpg"), "old");
      const { ctx } = setup([
        [post("d1", "http://example.com/d1.jpg"), post("d2", "http://example.com/d2.jpg")],
      ]);

      const state = await walk(ctx, createRunState(""));

      expect(state.status).toBe("exhausted");
      expect(state.tracker.getCounters()).toMatchObject({
        downloaded: 1,
        duplicateErrors: 1,
      });
    });
  });

  // ==========================================================================
  // Resolution and failures
  // ==========================================================================
  describe("resolution and failures", () => {
    it("downloads every image of a gallery", async () => {
      const { ctx } = setup([[post("g1", "http://imgur.com/a/xyz")]]);

      const state = await walk(ctx, createRunState(""));

      expect(state.tracker.getCounters().downloaded).toBe(2);
      expect(await fileExists(join(dir, "h1.jpg"))).toBe(true);
      expect(await fileExists(join(dir, "h2.jpg"))).toBe(true);
    });

    it("normalizes image host links before downloading", async () => {
      const { ctx } = setup([[post("i1", "http://i.imgur.com/pic.png")]]);

      await walk(ctx, createRunState(""));

      expect(await fileExists(join(dir, "pic.jpg"))).toBe(true);
    });

    it("counts wrong content types as skipped", async () => {
      const { ctx } = setup([[post("w1", "http://example.com/page.html")]]);

      const state = await walk(ctx, createRunState(""));

      expect(state.tracker.getCounters()).toMatchObject({ skipped: 1, downloaded: 0 });
    });

    it("records a transport failure and continues with the next item", async () => {
      const { ctx } = setup([
        [post("f1", "http://example.com/missing.jpg"), post("f2", "http://example.com/ok.jpg")],
      ]);

      const state = await walk(ctx, createRunState(""));

      expect(state.tracker.getCounters()).toMatchObject({ failed: 1, downloaded: 1 });
      expect(state.tracker.getIssues()).toEqual([
        {
          url: "http://example.com/missing.jpg",
          itemId: "f1",
          reason: "http-error",
          details: "HTTP 404: Not Found",
        },
      ]);
    });

    it("records a failed gallery expansion against the item", async () => {
      const { ctx } = setup([
        [post("x1", "http://imgur.com/a/broken"), post("x2", "http://example.com/x2.jpg")],
      ]);

      const state = await walk(ctx, createRunState(""));

      expect(state.tracker.getCounters()).toMatchObject({ failed: 1, downloaded: 1 });
      expect(state.tracker.getIssues()[0]).toMatchObject({
        url: "http://imgur.com/a/broken",
        itemId: "x1",
        reason: "http-error",
      });
    });

    it("propagates feed failures and keeps the progress made", async () => {
      const { ctx } = setup([]);
      let calls = 0;
      ctx.feed = {
        async getItems() {
          calls++;
          if (calls > 1) throw new Error("HTTP 503: Service Unavailable");
          return [post("p1", "http://example.com/p1.jpg")];
        },
      };
      const state = createRunState("");

      await expect(walk(ctx, state)).rejects.toThrow("HTTP 503: Service Unavailable");
      expect(state.status).toBe("paging");
      expect(state.cursor).toBe("p1");
      expect(state.tracker.getCounters().downloaded).toBe(1);
    });
  });
});

/**
 * Download command - Loads config, prepares the destination and runs the walk
 */

import ora from "ora";
import { z } from "zod";
import { loadConfig, ensureDirectory, Logger } from "../../utils";
import * as modules from "../../modules";
import { createAlbumExtractor } from "../../album-extractors";
import { AlbumExpander } from "../../album-expander";
import { LinkResolver } from "../../link-resolver";
import { ImageFetcher } from "../../image-fetcher";
import { RedditFeed } from "../../feed-client";
import type { RunContext, RunOptions, RunState } from "../../types";

function isValidPattern(pattern: string): boolean {
  try {
    modules.compileTitlePattern(pattern);
    return true;
  } catch {
    return false;
  }
}

const DownloadOptionsSchema = z.object({
  last: z.string().default(""),
  score: z.coerce.number().int(),
  num: z.coerce.number().int().nonnegative(),
  update: z.boolean().default(false),
  sfw: z.boolean().default(false),
  nsfw: z.boolean().default(false),
  regex: z
    .string()
    .refine(isValidPattern, { message: "Invalid regular expression" })
    .optional(),
  timeout: z.coerce.number().int().positive().optional(),
  config: z.string().optional(),
  verbose: z.boolean().default(false),
});

export type DownloadOptions = z.infer<typeof DownloadOptionsSchema>;

export function toRunOptions(
  subreddit: string,
  destDir: string,
  options: DownloadOptions,
): RunOptions {
  return {
    subreddit,
    destDir,
    last: options.last,
    score: options.score,
    num: options.num,
    update: options.update,
    sfw: options.sfw,
    nsfw: options.nsfw,
    regex: options.regex
      ? modules.compileTitlePattern(options.regex)
      : undefined,
  };
}

export function parseDownloadOptions(opts: unknown): DownloadOptions {
  return DownloadOptionsSchema.parse(opts);
}

export async function downloadCommand(
  subreddit: string,
  destdir: string,
  opts: unknown,
): Promise<void> {
  const spinner = ora({ text: "Initializing...", indent: 2 }).start();
  let state: RunState | undefined;
  let verbose = false;

  try {
    // Validate CLI options before touching the network or the filesystem
    const options = parseDownloadOptions(opts);
    verbose = options.verbose;

    // Load configuration (default → user → custom)
    const { config, errors } = await loadConfig(options.config);
    if (options.timeout) {
      config.http.timeout = options.timeout;
    }

    spinner.text = `Preparing ${destdir}...`;
    await ensureDirectory(destdir);

    spinner.succeed(`Downloading images from "${subreddit}" into ${destdir}`);

    const logger = new Logger(options.verbose ? "debug" : config.logging.level);
    for (const err of errors) {
      const message =
        err.error instanceof Error ? err.error.message : String(err.error);
      logger.warn(`Ignoring config file ${err.path}: ${message}`);
    }

    const albums = new AlbumExpander(
      createAlbumExtractor(config.imageHost),
      config.http,
    );

    const ctx: RunContext = {
      options: toRunOptions(subreddit, destdir, options),
      feed: new RedditFeed(config.feed, config.http),
      resolver: new LinkResolver(config.imageHost, albums),
      fetcher: new ImageFetcher(config.http),
      logger,
    };

    state = modules.createRunState(ctx.options.last);
    await modules.walk(ctx, state);

    modules.stats(state, options.verbose);
  } catch (error) {
    if (spinner.isSpinning) {
      spinner.fail("Startup failed");
      console.error(error);
    } else {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Run aborted: ${message}`);
      if (state) modules.stats(state, verbose);
    }
    process.exit(1);
  }
}

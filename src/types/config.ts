/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const FeedConfigSchema = z.object({
  baseUrl: z.string().url(),
  pageSize: z.number().int().positive().max(100),
  retries: z.number().int().nonnegative(),
});

export const HttpConfigSchema = z.object({
  timeout: z.number().int().positive(), // In milliseconds
  userAgent: z.string().min(1),
});

export const ImageHostConfigSchema = z.object({
  // Host (and its subdomains) whose links get extension normalization
  domain: z.string().min(1),
  // Path prefixes that mark a gallery page on the image host
  albumPaths: z.array(z.string().startsWith("/")).min(1),
  // Appended to extension-less image host links
  defaultExtension: z.string().startsWith("."),
  // "hash" scans inline page data, "meta" reads og:image/twitter:image tags
  albumExtractor: z.enum(["hash", "meta"]),
  // Direct link built from each gallery hash token ("{hash}" is replaced)
  directUrlTemplate: z.string().includes("{hash}"),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error", "silent"]),
});

export const DownloaderConfigSchema = z.object({
  feed: FeedConfigSchema,
  http: HttpConfigSchema,
  imageHost: ImageHostConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialDownloaderConfigSchema = DownloaderConfigSchema.partial()
  .extend({
    feed: FeedConfigSchema.partial().optional(),
    http: HttpConfigSchema.partial().optional(),
    imageHost: ImageHostConfigSchema.partial().optional(),
    logging: LoggingConfigSchema.partial().optional(),
  });

// Infer TypeScript types from Zod schemas
export type FeedConfig = z.infer<typeof FeedConfigSchema>;
export type HttpConfig = z.infer<typeof HttpConfigSchema>;
export type ImageHostConfig = z.infer<typeof ImageHostConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type DownloaderConfig = z.infer<typeof DownloaderConfigSchema>;
export type PartialDownloaderConfig = z.infer<
  typeof PartialDownloaderConfigSchema
>;

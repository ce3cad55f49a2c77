/**
 * Environment configuration for the curator
 * Loads and validates environment variables and the feed/topic list files
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { CurationConfig } from '../types/feed';
import type { LogLevel } from '../utils/logger';

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export interface EnvironmentConfig {
  llm: {
    baseUrl: string;
    apiKey: string;
    model: string;
    timeoutMs: number;
  };
  feeds: {
    feedsFile: string;
    topicsFile: string;
    timeoutMs: number;
  };
  curation: {
    imagesEnabled: boolean;
    featuredEnabled: boolean;
  };
  output: {
    file: string;
    title: string;
  };
  logging: {
    level: LogLevel;
  };
}

// Unset and blank variables both fall back to the default
const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const text = (defaultValue: string) =>
  z.preprocess(blankToUndefined, z.string().trim().default(defaultValue));

const millis = (defaultValue: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(defaultValue));

const flag = (defaultValue: boolean) =>
  z
    .preprocess(blankToUndefined, z.string().optional())
    .transform(value => (value === undefined ? defaultValue : value.trim().toLowerCase() !== 'false'));

const envSchema = z.object({
  LLM_BASE_URL: z.preprocess(blankToUndefined, z.string().url().default('http://localhost:11434/v1')),
  LLM_API_KEY: text('ollama'),
  LLM_MODEL: text('gemma3:12b'),
  LLM_TIMEOUT_MS: millis(60000),
  FEEDS_FILE: text('feeds.txt'),
  TOPICS_FILE: text('topics.txt'),
  FEED_TIMEOUT_MS: millis(20000),
  IMAGES_ENABLED: flag(true),
  FEATURED_ENABLED: flag(true),
  OUTPUT_FILE: text('news.html'),
  DIGEST_TITLE: text('The Daily Digest'),
  LOG_LEVEL: z.preprocess(
    value => (typeof value === 'string' ? blankToUndefined(value.toLowerCase()) : value),
    z.enum(['debug', 'info', 'warn', 'error']).default('info')
  )
});

/**
 * Load and validate environment configuration
 * @throws ConfigurationError if a variable is present but malformed
 */
export function loadEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new ConfigurationError(`Invalid environment variables: ${problems}`);
  }

  const vars = parsed.data;
  return {
    llm: {
      baseUrl: vars.LLM_BASE_URL,
      apiKey: vars.LLM_API_KEY,
      model: vars.LLM_MODEL,
      timeoutMs: vars.LLM_TIMEOUT_MS
    },
    feeds: {
      feedsFile: vars.FEEDS_FILE,
      topicsFile: vars.TOPICS_FILE,
      timeoutMs: vars.FEED_TIMEOUT_MS
    },
    curation: {
      imagesEnabled: vars.IMAGES_ENABLED,
      featuredEnabled: vars.FEATURED_ENABLED
    },
    output: {
      file: vars.OUTPUT_FILE,
      title: vars.DIGEST_TITLE
    },
    logging: {
      level: vars.LOG_LEVEL
    }
  };
}

/**
 * Read a one-entry-per-line list file, skipping blank lines and # comments
 */
export function loadListFile(filePath: string): string[] {
  if (!fs.existsSync(filePath)) {
    throw new ConfigurationError(`'${filePath}' not found. Create it with one entry per line.`);
  }

  return fs
    .readFileSync(filePath, 'utf-8')
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#'));
}

/**
 * Build the pipeline configuration from the environment and the list files
 * @throws ConfigurationError if either list file is missing or empty
 */
export function loadCurationConfig(config: EnvironmentConfig, baseDir: string = process.cwd()): CurationConfig {
  const feedsPath = path.resolve(baseDir, config.feeds.feedsFile);
  const topicsPath = path.resolve(baseDir, config.feeds.topicsFile);

  const feeds = loadListFile(feedsPath);
  if (feeds.length === 0) {
    throw new ConfigurationError(`No feeds found in '${feedsPath}'.`);
  }

  const topics = loadListFile(topicsPath);
  if (topics.length === 0) {
    throw new ConfigurationError(`No topics found in '${topicsPath}'.`);
  }

  return {
    feeds,
    topics,
    model: config.llm.model,
    imagesEnabled: config.curation.imagesEnabled,
    featuredEnabled: config.curation.featuredEnabled
  };
}

#!/usr/bin/env tsx

/**
 * Runner for one digest build
 * Loads environment variables, curates the configured feeds and writes the HTML page
 */

import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { ConfigurationError, loadCurationConfig, loadEnvironmentConfig } from '../src/config/environment';
import { RssFeedSource } from '../src/adapters/rssFeed';
import { OpenAICompletionService } from '../src/curation/completionService';
import { CurationPipeline } from '../src/curation/pipeline';
import { renderDigest } from '../src/render/htmlDigest';
import { LLMClient } from '../src/utils/llmClient';
import { logger } from '../src/utils/logger';

// Project root is one level up from scripts/
const projectRoot = path.resolve(__dirname, '..');

// Try to load .env.local first, then .env from project root
dotenv.config({ path: path.join(projectRoot, '.env.local') });
dotenv.config({ path: path.join(projectRoot, '.env') });

async function main() {
  try {
    const envConfig = loadEnvironmentConfig();
    logger.setLevel(envConfig.logging.level);

    const config = loadCurationConfig(envConfig);
    logger.info(`Curating ${config.feeds.length} feeds for topics: ${config.topics.join(', ')}`);

    const pipeline = new CurationPipeline({
      feedSource: new RssFeedSource({ timeoutMs: envConfig.feeds.timeoutMs }),
      completionService: new OpenAICompletionService(LLMClient.get(envConfig.llm)),
      config
    });

    const result = await pipeline.run();
    const html = renderDigest(result, { title: envConfig.output.title, topics: config.topics });

    const outputPath = path.resolve(process.cwd(), envConfig.output.file);
    fs.writeFileSync(outputPath, html, 'utf-8');

    const shown = result.featured.length + result.regular.length;
    logger.info(`Generated '${outputPath}' with ${shown} articles (${result.featured.length} featured)`, {
      analyzed: result.totalAnalyzed,
      feedsProcessed: result.feedsProcessed,
      feedsFailed: result.feedsFailed
    });

    process.exit(0);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error(`Configuration error: ${error.message}`);
    } else {
      logger.error('Digest run failed:', error);
    }
    process.exit(1);
  }
}

void main();

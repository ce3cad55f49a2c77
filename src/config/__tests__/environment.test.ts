/**
 * Unit tests for environment and list-file configuration
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import {
  ConfigurationError,
  loadCurationConfig,
  loadEnvironmentConfig,
  loadListFile
} from '../environment';

describe('loadEnvironmentConfig', () => {
  it('should apply defaults for unset variables', () => {
    expect(loadEnvironmentConfig({})).toEqual({
      llm: {
        baseUrl: 'http://localhost:11434/v1',
        apiKey: 'ollama',
        model: 'gemma3:12b',
        timeoutMs: 60000
      },
      feeds: {
        feedsFile: 'feeds.txt',
        topicsFile: 'topics.txt',
        timeoutMs: 20000
      },
      curation: {
        imagesEnabled: true,
        featuredEnabled: true
      },
      output: {
        file: 'news.html',
        title: 'The Daily Digest'
      },
      logging: {
        level: 'info'
      }
    });
  });

  it('should read overrides', () => {
    const config = loadEnvironmentConfig({
      LLM_BASE_URL: 'https://llm.example.com/v1',
      LLM_MODEL: 'test-model',
      LLM_TIMEOUT_MS: '1500',
      IMAGES_ENABLED: 'FALSE',
      FEATURED_ENABLED: 'yes',
      LOG_LEVEL: 'DEBUG'
    });

    expect(config.llm.baseUrl).toBe('https://llm.example.com/v1');
    expect(config.llm.model).toBe('test-model');
    expect(config.llm.timeoutMs).toBe(1500);
    expect(config.curation.imagesEnabled).toBe(false);
    expect(config.curation.featuredEnabled).toBe(true);
    expect(config.logging.level).toBe('debug');
  });

  it('should treat blank variables as unset', () => {
    const config = loadEnvironmentConfig({ LLM_MODEL: '  ', LLM_TIMEOUT_MS: '', LOG_LEVEL: '' });

    expect(config.llm.model).toBe('gemma3:12b');
    expect(config.llm.timeoutMs).toBe(60000);
    expect(config.logging.level).toBe('info');
  });

  it('should reject malformed values', () => {
    expect(() => loadEnvironmentConfig({ LLM_TIMEOUT_MS: 'soon' })).toThrow(ConfigurationError);
    expect(() => loadEnvironmentConfig({ LLM_BASE_URL: 'not a url' })).toThrow(ConfigurationError);
    expect(() => loadEnvironmentConfig({ LOG_LEVEL: 'loud' })).toThrow(/LOG_LEVEL/);
  });
});

describe('list files', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'curator-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should read one entry per line, skipping blanks and comments', () => {
    const file = path.join(dir, 'topics.txt');
    fs.writeFileSync(file, '# topics\nAI\r\n\n  Space exploration  \n');

    expect(loadListFile(file)).toEqual(['AI', 'Space exploration']);
  });

  it('should throw when the file does not exist', () => {
    expect(() => loadListFile(path.join(dir, 'missing.txt'))).toThrow(ConfigurationError);
  });

  it('should build the curation config from both files', () => {
    fs.writeFileSync(path.join(dir, 'feeds.txt'), 'https://alpha.example.com/rss\n');
    fs.writeFileSync(path.join(dir, 'topics.txt'), 'AI\nScience\n');

    const config = loadCurationConfig(loadEnvironmentConfig({ LLM_MODEL: 'test-model', IMAGES_ENABLED: 'false' }), dir);

    expect(config).toEqual({
      feeds: ['https://alpha.example.com/rss'],
      topics: ['AI', 'Science'],
      model: 'test-model',
      imagesEnabled: false,
      featuredEnabled: true
    });
  });

  it('should throw when a list file has no entries', () => {
    fs.writeFileSync(path.join(dir, 'feeds.txt'), 'https://alpha.example.com/rss\n');
    fs.writeFileSync(path.join(dir, 'topics.txt'), '# nothing yet\n\n');

    expect(() => loadCurationConfig(loadEnvironmentConfig({}), dir)).toThrow(/No topics found/);
  });
});

import { serve } from '@hono/node-server';
import { loadConfig } from './config';
import { createApp } from './index';
import { SnapshotIndexClient } from './archive/timemap';
import { SnapshotFetcher } from './archive/fetcher';
import { ContentNormalizer } from './diff/normalizer';
import { LineDiffEngine } from './diff/engine';
import { DiffGenerator } from './diff/generator';

function main(): void {
  const config = loadConfig();
  const clientOptions = {
    baseUrl: config.archiveBaseUrl,
    timeoutMs: config.fetchTimeoutMs,
    userAgent: config.userAgent
  };

  const generator = new DiffGenerator({
    index: new SnapshotIndexClient({
      ...clientOptions,
      historyDays: config.historyDays,
      maxCaptures: config.maxCaptures
    }),
    fetcher: new SnapshotFetcher({ ...clientOptions, minContentLength: config.minContentLength }),
    normalizer: new ContentNormalizer(),
    engine: new LineDiffEngine({ maxChars: config.maxDiffChars, timeoutMs: config.diffTimeoutMs })
  });

  const app = createApp({ generator, historyDays: config.historyDays });

  serve({
    port: config.port,
    fetch: app.fetch
  });

  console.log(`Archive diff listening on http://localhost:${config.port} (archive: ${config.archiveBaseUrl})`);
}

try {
  main();
} catch (error) {
  console.error('Failed to start:', error);
  process.exit(1);
}

#!/usr/bin/env node
/**
 * Usage:
 *   tunegrab --url "https://open.spotify.com/playlist/..."
 *   tunegrab --liked --format wav --concurrency 4
 *   tunegrab --playlist
 *   tunegrab --search "artist title" --limit 5
 */
import { UsageError, USAGE } from '../lib/parseCliArgs';
import { main } from '../runDownload';

const controller = new AbortController();
process.once('SIGINT', () => {
  console.error('\nInterrupted; stopping downloads...');
  controller.abort();
});

main(process.argv, { signal: controller.signal })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e: unknown) => {
    console.error(e instanceof Error ? e.message : String(e));
    if (e instanceof UsageError) console.error(USAGE);
    process.exit(1);
  });

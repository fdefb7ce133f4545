import fs from 'node:fs/promises';
import path from 'node:path';
import readline from 'node:readline';
import { commandAudioSource, type AudioQuality, type AudioSource } from './lib/audioSource';
import type { FetchFn } from './lib/catalog';
import { readEnv, type EnvSettings } from './lib/env';
import { createLogger, type Logger } from './lib/log';
import { parseCliArgs, resolveConfig, USAGE, UsageError, type AppConfig, type CliArgs } from './lib/parseCliArgs';
import type { Runner } from './lib/proc';
import {
  listUserPlaylists,
  resolveAll,
  searchCatalog,
  type Source,
} from './lib/resolver';
import { authenticate, credentialsFromEnvironment, type Session } from './lib/session';
import { cyan, dim, green, isTTY, red, setColorEnabled, yellow } from './lib/ui/colors';
import { createSpinner } from './lib/ui/spinner';
import { FileLedger } from './pipeline/ledger';
import { consoleReporter } from './pipeline/progress';
import { run } from './pipeline/scheduler';
import { createJob, type RunSummary } from './pipeline/types';
import { createWorker } from './pipeline/worker';

export type Prompt = (question: string) => Promise<string>;

export type MainDeps = {
  env?: EnvSettings;
  fetchFn?: FetchFn;
  runner?: Runner;
  audio?: (quality: AudioQuality) => AudioSource;
  prompt?: Prompt;
  signal?: AbortSignal;
  write?: (line: string) => void;
};

export const FAILED_LOG = 'failed.log';

function stdinPrompt(question: string): Promise<string> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer);
    });
  });
}

async function choose(prompt: Prompt, question: string, count: number): Promise<number> {
  const raw = (await prompt(question)).trim();
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 1 || n > count) {
    throw new UsageError(`Pick a number between 1 and ${count}, got "${raw}"`);
  }
  return n - 1;
}

/**
 * Work out what to download. `--playlist` and `--search` ask the user to
 * pick from a numbered list. Returns null when no source was given.
 */
export async function pickSource(
  args: CliArgs,
  session: Session,
  config: AppConfig,
  prompt: Prompt,
  write: (line: string) => void,
  signal?: AbortSignal,
): Promise<Source | null> {
  if (args.playlist) {
    const playlists = await listUserPlaylists(session, signal);
    if (playlists.length === 0) throw new UsageError('Your account has no playlists');
    playlists.forEach((p, i) => write(`${i + 1}: ${p.name}`));
    const picked = playlists[await choose(prompt, 'Select playlist by ID: ', playlists.length)];
    write(green(`>>> Downloading playlist: ${picked.name} >>>`));
    return { kind: 'playlist', id: picked.id, name: picked.name };
  }
  if (args.liked) {
    write(green('>>> Downloading your liked songs >>>'));
    return { kind: 'liked' };
  }
  if (args.url) return { kind: 'url', url: args.url };
  if (args.search) {
    const { tracks, albums, playlists } = await searchCatalog(
      session,
      args.search,
      config.limit,
      signal,
    );
    const choices: { label: string; source: Source }[] = [];
    for (const t of tracks) {
      if (!t.id) continue;
      const artists = (t.artists || []).map((a) => a?.name || '').join(',');
      choices.push({ label: `${t.name} | ${artists}`, source: { kind: 'url', url: `spotify:track:${t.id}` } });
    }
    for (const a of albums) {
      if (!a.id) continue;
      const artists = (a.artists || []).map((x) => x?.name || '').join(',');
      choices.push({ label: `${a.name} | ${artists}`, source: { kind: 'url', url: `spotify:album:${a.id}` } });
    }
    for (const p of playlists) {
      if (!p.id) continue;
      choices.push({
        label: `${p.name} | ${p.owner?.display_name || ''}`,
        source: { kind: 'playlist', id: p.id, name: p.name },
      });
    }
    if (choices.length === 0) {
      write('No results...');
      return null;
    }
    choices.forEach((c, i) => write(`${i + 1}, ${c.label}`));
    return choices[await choose(prompt, 'Select by ID: ', choices.length)].source;
  }
  return null;
}

export function formatSummary(summary: RunSummary): string[] {
  const lines = [
    '',
    'Summary:',
    `  ${green('✓')} downloaded: ${summary.succeeded}`,
    `  ${yellow('↺')} skipped: ${summary.skipped}`,
    `  ${red('✗')} failed: ${summary.failed}`,
  ];
  if (summary.cancelled > 0) lines.push(`  ${dim('Ø')} cancelled: ${summary.cancelled}`);
  for (const e of summary.errors) {
    lines.push(`    ${dim('→')} ${e.descriptor.displayName}: ${e.reason}`);
  }
  return lines;
}

/** Append failed items to `<root>/failed.log` so they can be retried later. */
export async function appendFailures(root: string, summary: RunSummary): Promise<string | null> {
  if (summary.errors.length === 0) return null;
  const file = path.join(root, FAILED_LOG);
  const body = summary.errors
    .map((e) => `${e.descriptor.id}\t${e.descriptor.displayName}\t${e.reason.replace(/\s+/g, ' ')}\n`)
    .join('');
  await fs.mkdir(root, { recursive: true });
  await fs.appendFile(file, body, 'utf8');
  return file;
}

/**
 * Entry point for a download run. Returns the process exit code: 0 when
 * nothing failed (skips are fine), 1 when at least one item failed.
 * Login and resolution errors are thrown to the caller.
 */
export async function main(argv: string[] = process.argv, deps: MainDeps = {}): Promise<number> {
  const write = deps.write ?? ((line: string) => console.log(line));
  const args = parseCliArgs(argv);
  if (args.help) {
    write(USAGE);
    return 0;
  }
  if (args.noColor) setColorEnabled(false);
  const logger: Logger = createLogger({ quiet: args.quiet, verbose: args.verbose });
  const env = deps.env ?? readEnv();
  const config = resolveConfig(args, env);
  if (!args.playlist && !args.liked && !args.url && !args.search) {
    write(USAGE);
    return 1;
  }

  const credentials = await credentialsFromEnvironment(env);
  const session = await authenticate(credentials, {
    fetchFn: deps.fetchFn,
    audio:
      deps.audio ??
      ((quality) =>
        commandAudioSource({ cmd: config.streamCmd, argsTemplate: config.streamArgs, quality })),
  });

  const source = await pickSource(
    args,
    session,
    config,
    deps.prompt ?? stdinPrompt,
    write,
    deps.signal,
  );
  if (!source) return 0;

  const descriptors = await resolveAll(session, source, {
    root: config.root,
    rootPodcast: config.rootPodcast,
    format: config.format,
    logger,
    signal: deps.signal,
  });
  if (descriptors.length === 0) {
    logger.warn('No tracks found (playlist/album may be empty or inaccessible).');
    return 0;
  }

  if (args.dry) {
    for (const d of descriptors) write(`  ${d.displayName} ${dim('→')} ${d.targetPath}`);
    return 0;
  }

  logger.info(cyan(`Downloading ${descriptors.length} item(s) to ${config.root}`));
  const ledger = new FileLedger(config.ledgerPath, { logger });
  await ledger.load();

  const names = new Map(descriptors.map((d) => [d.id, d.displayName]));
  const reporter = consoleReporter({
    describe: (id) => names.get(id) ?? id,
    spinner: createSpinner(isTTY() && !args.verbose && !args.quiet),
    write,
  });
  const worker = createWorker({
    audio: session.audio,
    quality: session.quality,
    runner: deps.runner,
    ffmpeg: config.ffmpeg,
    fetchFn: deps.fetchFn ?? fetch,
    logger,
  });

  let summary: RunSummary;
  try {
    summary = await run(
      descriptors.map((d) => createJob(d)),
      {
        concurrency: config.concurrency,
        worker,
        ledger,
        reporter,
        skipExisting: config.skipExisting,
        signal: deps.signal,
        logger,
      },
    );
  } finally {
    reporter.close();
  }

  try {
    await ledger.persist();
  } catch (e) {
    logger.warn(`Failed to compact ledger ${config.ledgerPath}:`, e);
  }

  for (const line of formatSummary(summary)) write(line);
  const failedLog = await appendFailures(config.root, summary).catch((e: unknown) => {
    logger.warn('Failed to write failure log:', e);
    return null;
  });
  if (failedLog) write(`  Logs:\n    failed: ${failedLog}`);
  return summary.failed > 0 ? 1 : 0;
}

export default main;

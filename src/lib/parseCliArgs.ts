import path from 'node:path';
import { LEDGER_FILENAME } from '../pipeline/ledger';
import { isAudioFormat, resolveUserPath, type AudioFormat, type EnvSettings } from './env';

export type CliArgs = {
  root: string | null;
  rootPodcast: string | null;
  url: string | null;
  search: string | null;
  liked: boolean;
  playlist: boolean;
  disableSkip: boolean;
  format: AudioFormat | null;
  limit: number;
  concurrency: number | null;
  dry: boolean;
  quiet: boolean;
  verbose: boolean;
  noColor: boolean;
  help: boolean;
};

export class UsageError extends Error {
  readonly name = 'UsageError';
}

export const USAGE = `Usage: tunegrab [--url <link> | --liked | --playlist | --search <query>]
  --root <dir>           where songs are written (default ~/tunegrab/songs)
  --root-podcast <dir>   where podcast episodes are written
  --format mp3|wav       output format (default mp3)
  --concurrency <n>      parallel downloads (default 2)
  --limit <n>            search results per category (default 10)
  --disable-skip         download again even when already in the ledger
  --dry                  print what would be downloaded
  --quiet | --verbose | --no-color`;

function positiveInt(flag: string, raw: string | undefined): number {
  const n = Number(raw);
  if (!raw || !Number.isInteger(n) || n < 1) {
    throw new UsageError(`${flag} expects a positive integer, got "${raw ?? ''}"`);
  }
  return n;
}

function valueOf(flag: string, raw: string | undefined): string {
  if (raw === undefined || raw.startsWith('--')) throw new UsageError(`${flag} expects a value`);
  return raw;
}

/**
 * Parse CLI arguments. Accepts `--flag value` and `--flag=value`.
 * A bare first argument is taken as the URL.
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const result: CliArgs = {
    root: null,
    rootPodcast: null,
    url: null,
    search: null,
    liked: false,
    playlist: false,
    disableSkip: false,
    format: null,
    limit: 10,
    concurrency: null,
    dry: false,
    quiet: false,
    verbose: false,
    noColor: false,
    help: false,
  };

  // Skip node and script path
  const args = argv.slice(2).flatMap((a) => {
    const eq = a.indexOf('=');
    return a.startsWith('--') && eq > 2 ? [a.slice(0, eq), a.slice(eq + 1)] : [a];
  });
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg) continue;
    switch (arg) {
      case '--root':
        result.root = valueOf(arg, args[++i]);
        break;
      case '--root-podcast':
        result.rootPodcast = valueOf(arg, args[++i]);
        break;
      case '--url':
        result.url = valueOf(arg, args[++i]);
        break;
      case '--search':
        result.search = valueOf(arg, args[++i]);
        break;
      case '--liked':
        result.liked = true;
        break;
      case '--playlist':
        result.playlist = true;
        break;
      case '--disable-skip':
        result.disableSkip = true;
        break;
      case '--format': {
        const val = valueOf(arg, args[++i]).toLowerCase();
        if (!isAudioFormat(val)) {
          throw new UsageError(`${val} is currently not supported. Select from wav or mp3`);
        }
        result.format = val;
        break;
      }
      case '--limit':
        result.limit = positiveInt(arg, args[++i]);
        break;
      case '--concurrency':
      case '-j':
        result.concurrency = positiveInt(arg, args[++i]);
        break;
      case '--dry':
        result.dry = true;
        break;
      case '--quiet':
        result.quiet = true;
        break;
      case '--verbose':
        result.verbose = true;
        result.quiet = false;
        break;
      case '--no-color':
        result.noColor = true;
        break;
      case '--help':
      case '-h':
        result.help = true;
        break;
      default:
        if (arg.startsWith('-')) throw new UsageError(`Unknown option: ${arg}`);
        if (!result.url) result.url = arg;
        break;
    }
  }
  return result;
}

export type AppConfig = Readonly<{
  root: string;
  rootPodcast: string;
  format: AudioFormat;
  concurrency: number;
  limit: number;
  skipExisting: boolean;
  ledgerPath: string;
  streamCmd: string;
  streamArgs: string;
  ffmpeg: string;
}>;

/** Flags win over environment settings. */
export function resolveConfig(args: CliArgs, env: EnvSettings): AppConfig {
  const root = args.root ? resolveUserPath(args.root) : env.root;
  return {
    root,
    rootPodcast: args.rootPodcast ? resolveUserPath(args.rootPodcast) : env.rootPodcast,
    format: args.format ?? env.format,
    concurrency: args.concurrency ?? env.concurrency,
    limit: args.limit,
    skipExisting: !args.disableSkip,
    ledgerPath: env.ledgerPath ?? path.join(root, LEDGER_FILENAME),
    streamCmd: env.streamCmd,
    streamArgs: env.streamArgs,
    ffmpeg: env.ffmpeg,
  };
}

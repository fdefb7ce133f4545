import path from 'node:path';
import type { EnvSettings } from '../src/lib/env';
import { parseCliArgs, resolveConfig, UsageError } from '../src/lib/parseCliArgs';

const argv = (...args: string[]) => ['node', 'tunegrab', ...args];

const env: EnvSettings = {
  root: '/music/songs',
  rootPodcast: '/music/podcasts',
  format: 'mp3',
  concurrency: 2,
  streamCmd: 'librespot-stream',
  streamArgs: '--{kind} {id}',
  ffmpeg: 'ffmpeg',
  userToken: 'test-token',
  credentialsFile: '/nowhere/credentials.json',
  ledgerPath: null,
};

describe('parseCliArgs', () => {
  test('defaults', () => {
    const a = parseCliArgs(argv());
    expect(a).toMatchObject({
      url: null,
      liked: false,
      playlist: false,
      disableSkip: false,
      format: null,
      limit: 10,
      concurrency: null,
      dry: false,
    });
  });

  test('recognised flags', () => {
    const a = parseCliArgs(
      argv(
        '--root',
        '/tmp/songs',
        '--root-podcast=/tmp/pods',
        '--url',
        'https://open.spotify.com/track/abc',
        '--disable-skip',
        '--format',
        'WAV',
        '--limit',
        '5',
        '--concurrency',
        '4',
        '--liked',
        '--playlist',
      ),
    );
    expect(a.root).toBe('/tmp/songs');
    expect(a.rootPodcast).toBe('/tmp/pods');
    expect(a.url).toBe('https://open.spotify.com/track/abc');
    expect(a.disableSkip).toBe(true);
    expect(a.format).toBe('wav');
    expect(a.limit).toBe(5);
    expect(a.concurrency).toBe(4);
    expect(a.liked).toBe(true);
    expect(a.playlist).toBe(true);
  });

  test('bare argument is the url; verbose overrides quiet', () => {
    const a = parseCliArgs(argv('--quiet', 'spotify:track:abc', '--verbose'));
    expect(a.url).toBe('spotify:track:abc');
    expect(a.quiet).toBe(false);
    expect(a.verbose).toBe(true);
  });

  test('rejects unsupported format, bad numbers and unknown flags', () => {
    expect(() => parseCliArgs(argv('--format', 'flac'))).toThrow(
      'flac is currently not supported. Select from wav or mp3',
    );
    expect(() => parseCliArgs(argv('--concurrency', '0'))).toThrow(UsageError);
    expect(() => parseCliArgs(argv('--limit', 'ten'))).toThrow(UsageError);
    expect(() => parseCliArgs(argv('--url'))).toThrow('--url expects a value');
    expect(() => parseCliArgs(argv('--frobnicate'))).toThrow('Unknown option: --frobnicate');
  });
});

describe('resolveConfig', () => {
  test('flags win over environment', () => {
    const cfg = resolveConfig(
      parseCliArgs(argv('--root', '/tmp/x', '--format', 'wav', '--concurrency', '3', '--disable-skip')),
      env,
    );
    expect(cfg.root).toBe(path.resolve('/tmp/x'));
    expect(cfg.rootPodcast).toBe('/music/podcasts');
    expect(cfg.format).toBe('wav');
    expect(cfg.concurrency).toBe(3);
    expect(cfg.skipExisting).toBe(false);
    expect(cfg.ledgerPath).toBe(path.join(path.resolve('/tmp/x'), '.tunegrab-ledger.jsonl'));
  });

  test('environment fills the gaps', () => {
    const cfg = resolveConfig(parseCliArgs(argv()), { ...env, ledgerPath: '/var/ledger.jsonl' });
    expect(cfg.root).toBe('/music/songs');
    expect(cfg.format).toBe('mp3');
    expect(cfg.concurrency).toBe(2);
    expect(cfg.skipExisting).toBe(true);
    expect(cfg.ledgerPath).toBe('/var/ledger.jsonl');
  });
});

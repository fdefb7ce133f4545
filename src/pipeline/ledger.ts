import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import { StorageError, describeError, errnoCode } from '../lib/errors';
import { defaultLogger, type Logger } from '../lib/log';
import type { LedgerEntry } from './types';

export const LEDGER_FILENAME = '.tunegrab-ledger.jsonl';

/** Hex sha256 of a file's contents. */
export async function checksumFile(file: string): Promise<string> {
  const hash = createHash('sha256');
  for await (const chunk of createReadStream(file)) hash.update(chunk);
  return hash.digest('hex');
}

/** What the scheduler needs from a ledger. */
export interface Ledger {
  has(targetPath: string): Promise<boolean>;
  record(entry: LedgerEntry): Promise<void>;
}

function isLedgerEntry(v: unknown): v is LedgerEntry {
  if (typeof v !== 'object' || v === null) return false;
  return (
    'trackId' in v &&
    typeof v.trackId === 'string' &&
    'targetPath' in v &&
    typeof v.targetPath === 'string' &&
    'completedAt' in v &&
    typeof v.completedAt === 'string' &&
    'size' in v &&
    typeof v.size === 'number' &&
    'sha256' in v &&
    typeof v.sha256 === 'string'
  );
}

export type LoadReport = { entries: number; corrupt: number };

/**
 * Completed-download ledger stored as JSON Lines, one entry per line.
 *
 * Loading never fails: a missing file is an empty ledger and lines that do
 * not parse are dropped with a warning. Later lines for the same path win.
 * Writes append a single line so a crash can at worst lose the last entry.
 */
export class FileLedger implements Ledger {
  private readonly entries = new Map<string, LedgerEntry>();
  private needsNewline = false;
  private readonly verify: 'size' | 'checksum';
  private readonly logger: Logger;

  constructor(
    readonly file: string,
    opts: { verify?: 'size' | 'checksum'; logger?: Logger } = {},
  ) {
    this.verify = opts.verify ?? 'checksum';
    this.logger = opts.logger ?? defaultLogger;
  }

  get size(): number {
    return this.entries.size;
  }

  async load(): Promise<LoadReport> {
    this.entries.clear();
    this.needsNewline = false;
    let raw: string;
    try {
      raw = await fs.readFile(this.file, 'utf8');
    } catch (e) {
      if (errnoCode(e) !== 'ENOENT') {
        this.logger.warn(`ledger unreadable, starting empty: ${describeError(e)}`);
      }
      return { entries: 0, corrupt: 0 };
    }
    let corrupt = 0;
    for (const line of raw.split('\n')) {
      if (!line.trim()) continue;
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        corrupt += 1;
        continue;
      }
      if (!isLedgerEntry(parsed)) {
        corrupt += 1;
        continue;
      }
      this.entries.set(path.resolve(parsed.targetPath), parsed);
    }
    this.needsNewline = raw.length > 0 && !raw.endsWith('\n');
    if (corrupt > 0) {
      const err = new StorageError(
        'CorruptLedger',
        `${corrupt} unreadable record(s) in ${this.file} ignored`,
      );
      this.logger.warn(describeError(err));
    }
    return { entries: this.entries.size, corrupt };
  }

  get(targetPath: string): LedgerEntry | undefined {
    return this.entries.get(path.resolve(targetPath));
  }

  /**
   * True only when an entry exists and the file on disk still matches it.
   * A truncated or replaced file reads as "not done".
   */
  async has(targetPath: string): Promise<boolean> {
    const entry = this.get(targetPath);
    if (!entry) return false;
    try {
      const st = await fs.stat(entry.targetPath);
      if (!st.isFile() || st.size !== entry.size) return false;
      if (this.verify === 'size') return true;
      return (await checksumFile(entry.targetPath)) === entry.sha256;
    } catch {
      return false;
    }
  }

  async record(entry: LedgerEntry): Promise<void> {
    const normalised: LedgerEntry = { ...entry, targetPath: path.resolve(entry.targetPath) };
    await fs.mkdir(path.dirname(this.file), { recursive: true });
    const line = `${this.needsNewline ? '\n' : ''}${JSON.stringify(normalised)}\n`;
    await fs.appendFile(this.file, line, 'utf8');
    this.needsNewline = false;
    this.entries.set(normalised.targetPath, normalised);
  }

  /** Rewrite the store with one line per path, via a temp file and rename. */
  async persist(): Promise<void> {
    await fs.mkdir(path.dirname(this.file), { recursive: true });
    const tmp = `${this.file}.${process.pid}.tmp`;
    const body = Array.from(this.entries.values())
      .map((e) => JSON.stringify(e))
      .join('\n');
    try {
      await fs.writeFile(tmp, body ? `${body}\n` : '', 'utf8');
      await fs.rename(tmp, this.file);
      this.needsNewline = false;
    } catch (e) {
      await fs.rm(tmp, { force: true });
      throw e;
    }
  }
}

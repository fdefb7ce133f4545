import { defaultLogger, type Logger } from '../lib/log';
import { dim, green, red, yellow } from '../lib/ui/colors';
import { createSpinner, type Spinner } from '../lib/ui/spinner';
import type { ProgressEvent } from './types';

/** Anything that wants to observe a run. */
export interface ProgressReporter {
  onEvent(event: ProgressEvent): void;
}

export const silentReporter: ProgressReporter = { onEvent: () => {} };

export type CaptureReporter = ProgressReporter & {
  readonly events: ProgressEvent[];
  ofKind<K extends ProgressEvent['kind']>(kind: K): Extract<ProgressEvent, { kind: K }>[];
};

/** Records every event in order. */
export function captureReporter(): CaptureReporter {
  const events: ProgressEvent[] = [];
  return {
    events,
    onEvent: (event) => {
      events.push(event);
    },
    ofKind<K extends ProgressEvent['kind']>(kind: K) {
      return events.filter((e): e is Extract<ProgressEvent, { kind: K }> => e.kind === kind);
    },
  };
}

/** Deliver each event to every reporter; one failing reporter does not starve the others. */
export function fanOut(...reporters: ProgressReporter[]): ProgressReporter {
  return {
    onEvent: (event) => {
      for (const r of reporters) safeEmit(r, event);
    },
  };
}

/** Call a reporter, logging instead of propagating anything it throws. */
export function safeEmit(
  reporter: ProgressReporter,
  event: ProgressEvent,
  logger: Logger = defaultLogger,
): void {
  try {
    reporter.onEvent(event);
  } catch (e) {
    logger.warn(`progress reporter failed on ${event.kind} for ${event.jobId}:`, e);
  }
}

export function formatBytes(n: number): string {
  if (n >= 1_000_000) return `${(n / 1_000_000).toFixed(1)}M`;
  if (n >= 1_000) return `${Math.round(n / 1_000)}k`;
  return `${n}B`;
}

/**
 * Terminal reporter: one coloured line per finished item and, on a TTY, a
 * spinner showing what is currently downloading.
 */
export function consoleReporter({
  describe = (id: string) => id,
  spinner = createSpinner(false),
  write = (line: string) => console.log(line),
}: {
  describe?: (jobId: string) => string;
  spinner?: Spinner;
  write?: (line: string) => void;
} = {}): ProgressReporter & { close(): void } {
  const active = new Map<string, number>();

  const refresh = () => {
    if (active.size === 0) {
      spinner.stop();
      return;
    }
    const [id, bytes] = Array.from(active.entries())[active.size - 1];
    const more = active.size > 1 ? ` (+${active.size - 1} more)` : '';
    spinner.setText(`${describe(id)} ${formatBytes(bytes)}${more}`);
    spinner.start();
  };

  const line = (text: string) => {
    const wasActive = spinner.active;
    if (wasActive) spinner.stop();
    write(text);
    if (wasActive) refresh();
  };

  return {
    onEvent(event) {
      switch (event.kind) {
        case 'started':
          if (event.attempt > 1) line(`  ${dim('↻')} retry ${event.attempt}: ${describe(event.jobId)}`);
          active.set(event.jobId, 0);
          refresh();
          break;
        case 'bytesWritten':
          active.set(event.jobId, event.bytes);
          refresh();
          break;
        case 'succeeded':
          active.delete(event.jobId);
          line(`  ${green('✓')} ${describe(event.jobId)}`);
          refresh();
          break;
        case 'failed':
          active.delete(event.jobId);
          line(`  ${red('✗')} ${describe(event.jobId)} ${dim(`(${event.reason})`)}`);
          refresh();
          break;
        case 'skipped':
          line(`  ${yellow('↺')} already downloaded: ${describe(event.jobId)}`);
          break;
      }
    },
    close() {
      active.clear();
      spinner.stop();
    },
  };
}

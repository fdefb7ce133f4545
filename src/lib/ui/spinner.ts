import { dim } from './colors';

export type Spinner = {
  start: (text?: string) => void;
  setText: (text: string) => void;
  stop: () => void;
  readonly active: boolean;
};

export function createSpinner(
  enabled: boolean,
  intervalMs = 80,
  out: NodeJS.WritableStream = process.stdout,
): Spinner {
  const frames = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
  let frameIdx = 0;
  let timer: NodeJS.Timeout | null = null;
  let lastText = 'downloading';

  const start = (text?: string) => {
    if (text) lastText = text;
    if (!enabled || timer) return;
    timer = setInterval(() => {
      const txt = dim(`  ${frames[frameIdx]} ${lastText}`);
      frameIdx = (frameIdx + 1) % frames.length;
      out.write(`\r\x1b[2K${txt}`);
    }, intervalMs);
    // never keep the process alive just to animate
    timer.unref();
  };

  const setText = (text: string) => {
    lastText = text;
  };

  const stop = () => {
    if (!timer) return;
    clearInterval(timer);
    timer = null;
    out.write('\r\x1b[2K');
  };

  return {
    start,
    setText,
    stop,
    get active() {
      return timer !== null;
    },
  };
}

/**
 * Scan Progress
 *
 * A single stderr status line advanced as regions finish.
 */

/**
 * Progress reporter interface
 */
export type ProgressReporter = {
  setLabel: (label: string) => void;
  tick: (delta?: number) => void;
  done: () => void;
};

export type ScanProgressOptions = {
  label?: string;
  total: number;
  enabled?: boolean;
  /** Sink for rendered frames; defaults to process.stderr. */
  write?: (chunk: string) => void;
};

/**
 * No-op progress reporter for when progress is disabled
 */
export const noopProgress: ProgressReporter = {
  setLabel: () => {},
  tick: () => {},
  done: () => {},
};

/**
 * Create a progress line of the form `Scanning regions 2/5 (40%)`.
 */
export function createScanProgress(options: ScanProgressOptions): ProgressReporter {
  if (options.enabled === false || options.total <= 0) return noopProgress;

  const write = options.write ?? ((chunk: string) => process.stderr.write(chunk));
  let label = options.label ?? "Scanning regions";
  let completed = 0;
  let finished = false;
  let lastWidth = 0;

  const render = () => {
    if (finished) return;
    const percent = Math.round((completed / options.total) * 100);
    const line = `${label} ${completed}/${options.total} (${percent}%)`;
    lastWidth = line.length;
    write(`\r${line}  `);
  };

  render();

  return {
    setLabel: (newLabel) => {
      label = newLabel;
      render();
    },
    tick: (delta = 1) => {
      completed = Math.min(options.total, completed + delta);
      render();
    },
    done: () => {
      if (finished) return;
      finished = true;
      write("\r" + " ".repeat(lastWidth + 2) + "\r");
    },
  };
}

export interface ProgressLoggerOptions {
  label: string;
  total?: number;
  intervalMs: number;
  now?: () => number;
  log?: (message: string) => void;
}

export interface ProgressLogger {
  onItem: (key: string) => void;
  flush: () => void;
}

export function createProgressLogger(
  options: ProgressLoggerOptions
): ProgressLogger {
  const now = options.now ?? Date.now;
  const log = options.log ?? console.error;
  const intervalMs = Math.max(1, options.intervalMs);

  const startedAtMs = now();
  let lastLoggedAtMs = startedAtMs;
  let completed = 0;
  let latestKey: string | null = null;

  const maybeLog = (force: boolean): void => {
    const currentMs = now();
    const elapsedSinceLastMs = currentMs - lastLoggedAtMs;

    if (!force && elapsedSinceLastMs < intervalMs) {
      return;
    }

    const elapsedSeconds = Math.max(0.001, (currentMs - startedAtMs) / 1000);
    const itemsPerSecond = completed / elapsedSeconds;
    const progress =
      options.total === undefined ? `${completed}` : `${completed}/${options.total}`;

    log(
      `${options.label} progress (completed=${progress}, rate=${itemsPerSecond.toFixed(1)}/s, last=${latestKey ?? "null"})`
    );

    lastLoggedAtMs = currentMs;
  };

  return {
    onItem(key: string): void {
      completed += 1;
      latestKey = key;
      maybeLog(false);
    },
    flush(): void {
      maybeLog(true);
    }
  };
}

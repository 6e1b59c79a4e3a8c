/**
 * Step logger used by the CLI and pipelines.
 *
 * Lines look like `  [1.2s] [CONVERT] 01.intro.tex`: elapsed seconds since the
 * logger was created, then the step tag.
 */

export interface LogSink {
  info(line: string): void;
  warn(line: string): void;
  error(line: string): void;
}

export interface StepLogger {
  info(step: string, msg: string): void;
  warn(step: string, msg: string): void;
  error(step: string, msg: string): void;
  /** Warnings emitted so far, without the elapsed prefix. */
  readonly warnings: string[];
}

export interface StepLoggerOptions {
  quiet?: boolean;
  sink?: LogSink;
  /** Epoch ms the elapsed counter starts from. */
  startTime?: number;
  now?: () => number;
}

export const consoleSink: LogSink = {
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

export function createStepLogger(options: StepLoggerOptions = {}): StepLogger {
  const now = options.now ?? Date.now;
  const startTime = options.startTime ?? now();
  const sink = options.sink ?? consoleSink;
  const warnings: string[] = [];

  function prefix(step: string): string {
    const elapsed = ((now() - startTime) / 1000).toFixed(1);
    return `  [${elapsed}s] [${step}]`;
  }

  return {
    info(step, msg) {
      if (options.quiet) return;
      sink.info(`${prefix(step)} ${msg}`);
    },
    warn(step, msg) {
      warnings.push(`[${step}] ${msg}`);
      sink.warn(`${prefix(step)} WARN ${msg}`);
    },
    error(step, msg) {
      sink.error(`${prefix(step)} ERROR ${msg}`);
    },
    warnings,
  };
}

/** Logger that records everything and prints nothing. */
export function createSilentLogger(): StepLogger {
  return createStepLogger({
    sink: { info: () => {}, warn: () => {}, error: () => {} },
  });
}

/**
 * Step spinners for the cook command. Animated through ora on a terminal;
 * piped output gets one line per change so CI logs stay readable.
 */

import ora, { Ora } from 'ora';

export type SpinnerColor = 'cyan' | 'yellow' | 'green' | 'red' | 'gray';

/** How a spinner ends; each maps to the ora symbol of the same meaning */
export type SpinnerOutcome = 'success' | 'failure' | 'warning';

export interface Spinner {
  start(): void;
  update(text: string): void;
  /** Stop and leave a status line behind */
  settle(outcome: SpinnerOutcome, text: string): void;
  /** Stop and leave nothing behind */
  discard(): void;
  readonly running: boolean;
}

export interface SpinnerServiceConfig {
  isTTY: boolean;
  /** No output at all, used for --json */
  quiet: boolean;
  stream: NodeJS.WritableStream;
}

const OUTCOME_SYMBOLS: Record<SpinnerOutcome, string> = {
  success: '✔',
  failure: '✖',
  warning: '⚠',
};

/**
 * Plain-text spinner. A null stream makes it silent.
 */
class LineSpinner implements Spinner {
  running = false;

  constructor(
    private text: string,
    private readonly stream: NodeJS.WritableStream | null
  ) {}

  start(): void {
    this.running = true;
    this.emit('>', this.text);
  }

  update(text: string): void {
    const changed = text !== this.text;
    this.text = text;
    if (changed && this.running) {
      this.emit('>', text);
    }
  }

  settle(outcome: SpinnerOutcome, text: string): void {
    this.running = false;
    this.emit(OUTCOME_SYMBOLS[outcome], text);
  }

  discard(): void {
    this.running = false;
  }

  private emit(symbol: string, text: string): void {
    this.stream?.write(`${symbol} ${text}\n`);
  }
}

class AnimatedSpinner implements Spinner {
  private readonly instance: Ora;

  constructor(text: string, stream: NodeJS.WritableStream, color: SpinnerColor | undefined) {
    this.instance = ora({ text, color, stream });
  }

  get running(): boolean {
    return this.instance.isSpinning;
  }

  start(): void {
    this.instance.start();
  }

  update(text: string): void {
    this.instance.text = text;
  }

  settle(outcome: SpinnerOutcome, text: string): void {
    switch (outcome) {
      case 'success':
        this.instance.succeed(text);
        break;
      case 'failure':
        this.instance.fail(text);
        break;
      case 'warning':
        this.instance.warn(text);
        break;
    }
  }

  discard(): void {
    this.instance.stop();
  }
}

/**
 * Hands out spinners and keeps at most one running
 */
export class SpinnerService {
  private readonly config: SpinnerServiceConfig;
  private current: Spinner | null = null;

  constructor(config: Partial<SpinnerServiceConfig> = {}) {
    this.config = {
      isTTY: config.isTTY ?? process.stdout.isTTY ?? false,
      quiet: config.quiet ?? false,
      stream: config.stream ?? process.stdout,
    };
  }

  /**
   * A spinner that has not been started; settling it prints only its status line
   */
  create(text: string, color?: SpinnerColor): Spinner {
    this.stopActive();
    const { quiet, isTTY, stream } = this.config;
    this.current =
      !quiet && isTTY ? new AnimatedSpinner(text, stream, color) : new LineSpinner(text, quiet ? null : stream);
    return this.current;
  }

  start(text: string, color?: SpinnerColor): Spinner {
    const spinner = this.create(text, color);
    spinner.start();
    return spinner;
  }

  print(line: string): void {
    if (!this.config.quiet) {
      this.config.stream.write(`${line}\n`);
    }
  }

  stopActive(): void {
    if (this.current?.running) {
      this.current.discard();
    }
    this.current = null;
  }
}

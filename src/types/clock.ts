/**
 * Time source for record timestamps, simulated tool delays and decision
 * timeouts. Tests drive a MockClock by hand.
 */

import { cancellationFromSignal } from './errors';

/**
 * Cancels a scheduled callback; calling it after the callback fired is a no-op
 */
export type CancelTimer = () => void;

export interface Clock {
  now(): Date;
  /** Epoch milliseconds */
  timestamp(): number;
  iso(): string;
  schedule(ms: number, callback: () => void): CancelTimer;

  /**
   * Wait for a duration. Rejects with CancellationRequested as soon as the
   * signal aborts, and clears its timer.
   */
  delay(ms: number, signal?: AbortSignal): Promise<void>;
}

function abortableDelay(clock: Clock, ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(cancellationFromSignal(signal));
      return;
    }

    const onAbort = (): void => {
      cancel();
      if (signal) {
        reject(cancellationFromSignal(signal));
      }
    };

    const cancel = clock.schedule(ms, () => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    });

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }

  timestamp(): number {
    return Date.now();
  }

  iso(): string {
    return new Date().toISOString();
  }

  schedule(ms: number, callback: () => void): CancelTimer {
    const handle = setTimeout(callback, Math.max(0, ms));
    return () => clearTimeout(handle);
  }

  delay(ms: number, signal?: AbortSignal): Promise<void> {
    return abortableDelay(this, ms, signal);
  }
}

interface PendingTimer {
  id: number;
  time: number;
  callback: () => void;
}

/**
 * Frozen clock; timers fire in due order during advance() and setTime()
 */
export class MockClock implements Clock {
  private currentTime: Date;
  private timers: PendingTimer[] = [];
  private nextId = 1;

  constructor(initialTime?: Date) {
    this.currentTime = initialTime ?? new Date('2025-01-01T00:00:00.000Z');
  }

  now(): Date {
    return new Date(this.currentTime);
  }

  timestamp(): number {
    return this.currentTime.getTime();
  }

  iso(): string {
    return this.currentTime.toISOString();
  }

  schedule(ms: number, callback: () => void): CancelTimer {
    const id = this.nextId++;
    this.timers.push({ id, time: this.currentTime.getTime() + Math.max(0, ms), callback });
    return () => {
      this.timers = this.timers.filter((timer) => timer.id !== id);
    };
  }

  delay(ms: number, signal?: AbortSignal): Promise<void> {
    return abortableDelay(this, ms, signal);
  }

  advance(ms: number): void {
    this.currentTime = new Date(this.currentTime.getTime() + ms);
    this.fireDueTimers();
  }

  setTime(time: Date): void {
    this.currentTime = new Date(time);
    this.fireDueTimers();
  }

  /**
   * Number of scheduled callbacks that have neither fired nor been cancelled
   */
  pendingTimers(): number {
    return this.timers.length;
  }

  private fireDueTimers(): void {
    const now = this.currentTime.getTime();
    const due = this.timers.filter((timer) => timer.time <= now);
    this.timers = this.timers.filter((timer) => timer.time > now);
    due.sort((a, b) => a.time - b.time).forEach((timer) => timer.callback());
  }
}

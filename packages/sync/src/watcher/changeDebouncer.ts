/**
 * Change Debouncer
 *
 * Coalesces bursts of raw notifications into one settled change per
 * name. Every notification (re)starts that name's quiet-period timer;
 * only when the timer runs out is the file probed and a single change
 * forwarded. Names debounce independently.
 *
 * A create followed by a delete inside one quiet period probes as
 * missing and is forwarded as a removal of a name the registry never
 * held, which the sequencer drops: net zero.
 */

import { createLogger, isErrnoException, type Logger } from '@meshwatch/utils';
import type { FileProbe, FileStat } from './fileProbe.js';

export type SettledChange =
  | { kind: 'upsert'; name: string; stat: FileStat }
  | { kind: 'remove'; name: string };

export interface ChangeDebouncerOptions {
  probe: FileProbe;
  onSettled: (change: SettledChange) => void;
  // Quiet period in ms
  quietPeriodMs?: number;
  logger?: Logger;
}

export const DEFAULT_QUIET_PERIOD_MS = 100;

export class ChangeDebouncer {
  private readonly probe: FileProbe;
  private readonly onSettled: (change: SettledChange) => void;
  private readonly quietPeriodMs: number;
  private readonly logger: Logger;
  private timers: Map<string, NodeJS.Timeout> = new Map();
  // Latest generation per unsettled name. Generations come from one
  // counter and are never reused, so a probe whose generation is no longer
  // current lost the race against a newer burst and is discarded. Entries
  // go once their current generation settles: the map holds only names
  // with a timer running or a probe in flight.
  private generations: Map<string, number> = new Map();
  private lastGeneration = 0;
  private inFlight: Set<Promise<void>> = new Set();
  private stopped = false;

  constructor(options: ChangeDebouncerOptions) {
    this.probe = options.probe;
    this.onSettled = options.onSettled;
    this.quietPeriodMs = options.quietPeriodMs ?? DEFAULT_QUIET_PERIOD_MS;
    this.logger = options.logger ?? createLogger({ component: 'change-debouncer' });
  }

  /**
   * Record a raw notification for a name
   */
  notify(name: string): void {
    if (this.stopped) {
      return;
    }

    const generation = ++this.lastGeneration;
    this.generations.set(name, generation);

    const existingTimer = this.timers.get(name);
    if (existingTimer) {
      clearTimeout(existingTimer);
    }

    const timer = setTimeout(() => {
      this.timers.delete(name);
      this.track(this.settle(name, generation));
    }, this.quietPeriodMs);

    this.timers.set(name, timer);
  }

  /**
   * Settle every pending name immediately
   */
  async flush(): Promise<void> {
    for (const [name, timer] of this.timers) {
      clearTimeout(timer);
      this.timers.delete(name);
      this.track(this.settle(name, this.generations.get(name) ?? 0));
    }
    await Promise.allSettled(this.inFlight);
  }

  /**
   * Cancel all timers; nothing is forwarded afterwards
   */
  stop(): void {
    this.stopped = true;
    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();
    this.generations.clear();
  }

  /**
   * Names notified but not yet settled
   */
  get pendingCount(): number {
    return this.generations.size;
  }

  get quietPeriod(): number {
    return this.quietPeriodMs;
  }

  // Private methods

  private track(work: Promise<void>): void {
    this.inFlight.add(work);
    void work
      .catch((error: unknown) => {
        this.logger.error({ err: error }, 'Settling a change failed');
      })
      .finally(() => {
        this.inFlight.delete(work);
      });
  }

  private async settle(name: string, generation: number): Promise<void> {
    let stat: FileStat | null;
    try {
      stat = await this.probe.probe(name);
    } catch (error) {
      // Transient I/O: the next notification for this name retries
      this.logger.warn(
        { err: error, name, code: isErrnoException(error) ? error.code : undefined },
        'Could not read file metadata, waiting for the next change'
      );
      this.release(name, generation);
      return;
    }

    if (this.stopped || !this.release(name, generation)) {
      return;
    }

    const change: SettledChange = stat
      ? { kind: 'upsert', name, stat }
      : { kind: 'remove', name };

    this.logger.debug({ name, kind: change.kind }, 'Change settled');
    this.onSettled(change);
  }

  // Forget a name whose current generation just settled
  private release(name: string, generation: number): boolean {
    if (this.generations.get(name) !== generation) {
      return false;
    }
    this.generations.delete(name);
    return true;
  }
}

import type { TimerFiredMessage } from '@lightcue/pipeline-events';
import type { TimeUnit } from './commandParser';
import type { Clock } from './stage';

export const UNIT_MS: Readonly<Record<TimeUnit, number>> = {
  second: 1_000,
  minute: 60_000,
  hour: 3_600_000,
};

/** setTimeout fires immediately beyond this */
const MAX_DELAY_MS = 2_147_483_647;

export interface ScheduledTimer {
  id: string;
  fireAt: number;
  deferredActionText: string;
}

interface TimerRecord extends ScheduledTimer {
  handle: NodeJS.Timeout;
}

/**
 * Deferred re-submission of commands. Expired timers leave the active set
 * before their TimerFired message is handed to the sink.
 */
export class TimerService {
  private readonly timers = new Map<string, TimerRecord>();
  private nextId = 1;

  constructor(
    private readonly sink: (message: TimerFiredMessage) => void,
    private readonly clock: Clock = Date.now,
  ) {}

  schedule(amount: number, unit: TimeUnit, actionText: string): string {
    if (!Number.isFinite(amount) || amount <= 0) {
      throw new RangeError(`Timer amount must be positive, got ${amount}`);
    }
    const delayMs = amount * UNIT_MS[unit];
    if (delayMs > MAX_DELAY_MS) {
      throw new RangeError(`Timer of ${amount} ${unit}s is too long`);
    }

    const id = `timer-${this.nextId++}`;
    const handle = setTimeout(() => {
      this.timers.delete(id);
      this.sink({ kind: 'TimerFired', timerId: id, actionText, at: this.clock() });
    }, delayMs);

    this.timers.set(id, { id, fireAt: this.clock() + delayMs, deferredActionText: actionText, handle });
    return id;
  }

  cancel(id: string): boolean {
    const timer = this.timers.get(id);
    if (!timer) return false;
    clearTimeout(timer.handle);
    return this.timers.delete(id);
  }

  cancelAll(): void {
    for (const timer of this.timers.values()) clearTimeout(timer.handle);
    this.timers.clear();
  }

  active(): ScheduledTimer[] {
    return [...this.timers.values()].map(({ id, fireAt, deferredActionText }) => ({
      id,
      fireAt,
      deferredActionText,
    }));
  }
}

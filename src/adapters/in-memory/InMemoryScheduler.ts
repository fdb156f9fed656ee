/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import { PhaseTimeout } from "../../domain/commands/PhaseTimeout.js";
import type { Scheduler } from "../../domain/ports/Scheduler.js";
import type { RoomId, TimePoint, TimerPhase } from "../../domain/typedefs.js";

/**
 * Deterministic in-memory scheduler used exclusively in tests.
 *
 * Instead of relying on {@link setTimeout}, the scheduler records queued commands and exposes a
 * {@link runFor} helper that advances the virtual clock (in milliseconds). This makes it possible
 * for tests to control timer progression without depending on real time or fake timers.
 */
interface ScheduledTimeout {
  readonly key: string;
  readonly command: PhaseTimeout;
}

interface SchedulerState {
  readonly now: TimePoint;
  readonly queue: readonly ScheduledTimeout[];
}

export class InMemoryScheduler implements Scheduler {
  readonly #dispatch: (command: PhaseTimeout) => Promise<void> | void;
  #state: SchedulerState;

  constructor(
    dispatch: (command: PhaseTimeout) => Promise<void> | void,
    startAt: TimePoint = 0,
  ) {
    this.#dispatch = dispatch;
    this.#state = { now: startAt, queue: [] };
  }

  get now(): TimePoint {
    return this.#state.now;
  }

  /** Timers that have neither fired nor been cancelled, in firing order. */
  get pending(): readonly PhaseTimeout[] {
    return this.#state.queue.map(({ command }) => command);
  }

  async scheduleTimeout(
    roomId: RoomId,
    phase: TimerPhase,
    round: number,
    delayMs: number,
    timerSeq: number,
  ): Promise<void> {
    if (delayMs < 0) {
      throw new Error("Timeout delay must be non-negative");
    }

    const key = toKey(roomId, phase);
    const command = new PhaseTimeout(roomId, phase, round, this.#state.now + delayMs, timerSeq);
    const remaining = this.#state.queue.filter((entry) => entry.key !== key);
    const insertAt = remaining.findIndex((existing) => existing.command.at > command.at);
    const entry: ScheduledTimeout = { key, command };
    const queue =
      insertAt === -1
        ? [...remaining, entry]
        : [...remaining.slice(0, insertAt), entry, ...remaining.slice(insertAt)];

    this.#state = { ...this.#state, queue };
  }

  async cancelTimeout(roomId: RoomId, phase: TimerPhase): Promise<void> {
    const key = toKey(roomId, phase);
    this.#state = {
      ...this.#state,
      queue: this.#state.queue.filter((entry) => entry.key !== key),
    };
  }

  async cancelAll(): Promise<void> {
    this.#state = { ...this.#state, queue: [] };
  }

  async runFor(milliseconds: number): Promise<void> {
    if (milliseconds < 0) {
      throw new Error("Cannot run scheduler backwards in time");
    }

    const targetTime = this.#state.now + milliseconds;
    let state = this.#state;

    while (state.queue.length > 0) {
      const [next, ...remaining] = state.queue;
      if (!next) {
        break;
      }
      if (next.command.at > targetTime) {
        break;
      }

      state = { now: next.command.at, queue: remaining };
      this.#state = state;
      await this.#dispatch(next.command);
      state = this.#state;
    }

    this.#state = { now: targetTime, queue: state.queue };
  }
}

function toKey(roomId: RoomId, phase: TimerPhase): string {
  return `${roomId}:${phase}`;
}

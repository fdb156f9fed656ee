/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import type { CommandContext, Logger, RoomId, Scheduler, TimerPhase } from "../core.js";
import { PhaseTimeout, dispatchCommand } from "../core.js";

interface RealSchedulerOptions {
  readonly dispatch?: typeof dispatchCommand;
  readonly contextFactory: () => Promise<CommandContext>;
  readonly logger?: Logger;
}

type TimeoutKey = string;

/**
 * `setTimeout`-backed scheduler. Cancelling clears the pending handle; a
 * callback that already started is left to the stale-timeout guard.
 */
export class RealScheduler implements Scheduler {
  #timers: Map<TimeoutKey, ReturnType<typeof setTimeout>> = new Map();
  readonly #dispatch: typeof dispatchCommand;
  readonly #contextFactory: RealSchedulerOptions["contextFactory"];
  readonly #logger: Logger | undefined;

  constructor(options: RealSchedulerOptions) {
    this.#dispatch = options.dispatch ?? dispatchCommand;
    this.#contextFactory = options.contextFactory;
    this.#logger = options.logger;
  }

  get size(): number {
    return this.#timers.size;
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

    const key = this.#toKey(roomId, phase);
    const existing = this.#timers.get(key);
    if (existing) {
      clearTimeout(existing);
      this.#timers.delete(key);
      this.#logger?.debug("Rescheduling timeout", { roomId, phase, round, delayMs });
    }

    const timer = setTimeout(async () => {
      this.#timers.delete(key);
      try {
        const context = await this.#contextFactory();
        await this.#dispatch(new PhaseTimeout(roomId, phase, round, Date.now(), timerSeq), context);
      } catch (error) {
        this.#logger?.error("Failed to dispatch scheduled timeout", {
          roomId,
          phase,
          round,
          error,
        });
      }
    }, delayMs);

    this.#timers.set(key, timer);
    this.#logger?.info("Timeout scheduled", { roomId, phase, round, delayMs });
  }

  async cancelTimeout(roomId: RoomId, phase: TimerPhase): Promise<void> {
    const key = this.#toKey(roomId, phase);
    const timer = this.#timers.get(key);
    if (!timer) return;

    clearTimeout(timer);
    this.#timers.delete(key);
    this.#logger?.debug("Timeout cancelled", { roomId, phase });
  }

  async cancelAll(): Promise<void> {
    for (const timer of this.#timers.values()) {
      clearTimeout(timer);
    }
    this.#timers.clear();
  }

  #toKey(roomId: RoomId, phase: TimerPhase): TimeoutKey {
    return `${roomId}:${phase}`;
  }
}

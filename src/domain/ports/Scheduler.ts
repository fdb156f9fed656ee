import type { RoomId, TimerPhase } from "../typedefs.js";

/**
 * Infrastructure abstraction responsible for delivering time-based commands to the domain.
 *
 * Each room owns at most one timer per phase. Scheduling under an occupied key replaces the
 * previous timer, and a cancelled timer never fires afterwards. Timers deliver a
 * `PhaseTimeout` command carrying `timerSeq`; a delivery whose callback was already
 * running when the timer was cancelled is discarded by the command once the room's
 * sequence has moved on.
 */
export interface Scheduler {
  scheduleTimeout(
    roomId: RoomId,
    phase: TimerPhase,
    round: number,
    delayMs: number,
    timerSeq: number,
  ): Promise<void>;
  cancelTimeout(roomId: RoomId, phase: TimerPhase): Promise<void>;
  cancelAll(): Promise<void>;
}

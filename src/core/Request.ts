/**
 * A unit of work flowing through the simulated system.
 *
 * Both counters count down in ticks and saturate at zero. A request waiting
 * in the queue only ages toward its timeout; a request held by a worker also
 * makes progress toward completion.
 *
 * @example
 * ```typescript
 * const request = new Request(1, 3, 2, 0);
 * request.workingTick();
 * request.isDone;     // false, one work tick left
 * request.workingTick();
 * request.isDone;     // true
 * request.isTimedOut; // true, the deadline passed while it was served
 * ```
 */
export class Request {
  private workTicks: number;
  private timeoutTicks: number;

  /**
   * @param id - Creation-order identifier, unique within one simulation
   * @param workTicks - Ticks of processing still needed
   * @param timeoutTicks - Ticks left before the client gives up
   * @param createdAt - Tick on which the request arrived
   */
  constructor(
    public readonly id: number,
    workTicks: number,
    timeoutTicks: number,
    public readonly createdAt: number
  ) {
    this.workTicks = Math.max(0, workTicks);
    this.timeoutTicks = Math.max(0, timeoutTicks);
  }

  get remainingWorkTicks(): number {
    return this.workTicks;
  }

  get remainingTimeoutTicks(): number {
    return this.timeoutTicks;
  }

  /** True once the work counter has reached zero */
  get isDone(): boolean {
    return this.workTicks === 0;
  }

  /** True once the timeout counter has reached zero */
  get isTimedOut(): boolean {
    return this.timeoutTicks === 0;
  }

  /**
   * One tick spent waiting in the queue: closer to the deadline, no progress.
   */
  waitingTick(): void {
    if (this.timeoutTicks !== 0) {
      this.timeoutTicks--;
    }
  }

  /**
   * One tick spent on a worker: closer to the deadline and to completion.
   */
  workingTick(): void {
    if (this.timeoutTicks !== 0) {
      this.timeoutTicks--;
    }
    if (this.workTicks !== 0) {
      this.workTicks--;
    }
  }
}

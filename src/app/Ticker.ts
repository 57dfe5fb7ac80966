export const DEFAULT_TICK_MS = 1000;

/** Calls `onTick` at a fixed interval from the event loop. Start and stop are idempotent. */
export class Ticker {
  private _handle: ReturnType<typeof setInterval> | null = null;

  constructor(
    private onTick: () => void,
    private intervalMs = DEFAULT_TICK_MS,
  ) {}

  get running(): boolean { return this._handle !== null; }

  start(): void {
    if (this._handle !== null) return;
    this._handle = setInterval(this.onTick, this.intervalMs);
  }

  stop(): void {
    if (this._handle === null) return;
    clearInterval(this._handle);
    this._handle = null;
  }
}

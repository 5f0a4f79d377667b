import { CaptureResult } from '../types/smartthings.js';
import { errorMessage } from '../types/errors.js';

export interface LiveCaptureOptions {
  onResult: (result: CaptureResult) => void;
  onError?: (error: unknown) => void;
  log?: (line: string) => void;
}

/**
 * Repeats a capture at a fixed interval.
 *
 * Ticks that arrive while a capture is still running, scheduled or run
 * through runExclusive(), are skipped, never queued. stop() clears the
 * timer before returning; a capture already in flight runs to completion.
 */
export class LiveCaptureScheduler {
  private runCapture: () => Promise<CaptureResult>;
  private onResult: (result: CaptureResult) => void;
  private onError: (error: unknown) => void;
  private log: (line: string) => void;
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<void> | null = null;

  constructor(runCapture: () => Promise<CaptureResult>, options: LiveCaptureOptions) {
    this.runCapture = runCapture;
    this.onResult = options.onResult;
    this.log = options.log ?? console.log;
    this.onError = options.onError ?? ((error) => this.log(`✗ Live capture failed: ${errorMessage(error)}`));
  }

  get running(): boolean {
    return this.timer !== null;
  }

  get busy(): boolean {
    return this.inFlight !== null;
  }

  start(intervalSeconds: number): boolean {
    if (this.timer !== null) {
      return false;
    }
    if (!Number.isFinite(intervalSeconds) || intervalSeconds <= 0) {
      throw new RangeError(`Invalid live capture interval: ${intervalSeconds}`);
    }

    this.timer = setInterval(() => this.tick(), intervalSeconds * 1000);
    this.log(`Starting live capture every ${intervalSeconds}s...`);
    return true;
  }

  stop(): boolean {
    if (this.timer === null) {
      return false;
    }
    clearInterval(this.timer);
    this.timer = null;
    this.log('Live capture stopped.');
    return true;
  }

  async waitForIdle(): Promise<void> {
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  /**
   * Runs a capture outside the timer under the same guard as the ticks, so
   * no tick starts until it settles. Resolves to null without calling the
   * task when a capture is already in flight.
   */
  async runExclusive<T>(task: () => Promise<T>): Promise<T | null> {
    if (this.inFlight) {
      return null;
    }
    let settle: () => void = () => undefined;
    this.inFlight = new Promise<void>((resolve) => {
      settle = resolve;
    });
    try {
      return await task();
    } finally {
      this.inFlight = null;
      settle();
    }
  }

  private tick(): void {
    if (this.timer === null) {
      return;
    }
    if (this.inFlight) {
      this.log('⚠️ Previous capture still running, skipping this tick');
      return;
    }
    this.inFlight = this.runOnce().finally(() => {
      this.inFlight = null;
    });
  }

  private async runOnce(): Promise<void> {
    try {
      this.onResult(await this.runCapture());
    } catch (error) {
      this.onError(error);
    }
  }
}

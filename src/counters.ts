import type { CounterSnapshot } from './types';

/**
 * Request totals for the lifetime of the process.
 * Counts only go up; they reset when the process restarts.
 */
export class TrafficCounters {
  private goodRequests = 0;
  private badRequests = 0;
  private dataMeter = 0;

  /**
   * Records one response: its body size and whether the status was 200.
   * @param status - HTTP status code.
   * @param bytes - Length of the body that was read.
   */
  recordResponse(status: number, bytes: number): void {
    this.dataMeter += bytes;
    if (status === 200) {
      this.goodRequests++;
    } else {
      this.badRequests++;
    }
  }

  snapshot(): CounterSnapshot {
    return {
      goodRequests: this.goodRequests,
      badRequests: this.badRequests,
      dataMeter: this.dataMeter,
    };
  }
}

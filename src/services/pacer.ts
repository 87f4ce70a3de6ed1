/**
 * Pacer
 * Fixed pauses between outbound calls. The origins and the geocoder ban
 * clients that go faster, so every pause is awaited by the caller.
 */

export type SleepFn = (ms: number) => Promise<void>;

export const realSleep: SleepFn = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

export class Pacer {
  private readonly delayMs: number;
  private readonly sleep: SleepFn;
  private pauses = 0;

  constructor(delayMs: number, sleep: SleepFn = realSleep) {
    this.delayMs = Math.max(0, delayMs);
    this.sleep = sleep;
  }

  /**
   * Build from a delay in seconds, as configured
   */
  static fromSeconds(seconds: number, sleep?: SleepFn): Pacer {
    return new Pacer(Math.round(seconds * 1000), sleep);
  }

  async pause(): Promise<void> {
    this.pauses++;
    if (this.delayMs === 0) return;
    await this.sleep(this.delayMs);
  }

  getDelayMs(): number {
    return this.delayMs;
  }

  /** Number of pauses taken so far */
  getPauseCount(): number {
    return this.pauses;
  }
}

/**
 * Pacers used by one harvest run
 */
export interface Pacers {
  /** After each route page */
  request: Pacer;
  /** After each live geocoder call */
  geocode: Pacer;
  /** Between crawler fetches */
  crawl: Pacer;
  /** Between root-probe fetches */
  probe: Pacer;
}

export const CRAWL_DELAY_MS = 150;
export const PROBE_DELAY_MS = 100;

export function createPacers(
  requestDelaySec: number,
  geocodeDelaySec: number,
  sleep: SleepFn = realSleep
): Pacers {
  return {
    request: Pacer.fromSeconds(requestDelaySec, sleep),
    geocode: Pacer.fromSeconds(geocodeDelaySec, sleep),
    crawl: new Pacer(CRAWL_DELAY_MS, sleep),
    probe: new Pacer(PROBE_DELAY_MS, sleep),
  };
}

import { setTimeout as delay } from "node:timers/promises";
import type { ClockPort, SleepPort } from "../../core/ports/outboundPorts";

/**
 * Wall-clock boundary; tests pass a fixed clock instead.
 */
export class SystemClock implements ClockPort {
  now(): Date {
    return new Date();
  }
}

export class SystemSleeper implements SleepPort {
  async sleep(ms: number): Promise<void> {
    if (ms <= 0) {
      return;
    }
    await delay(ms);
  }
}

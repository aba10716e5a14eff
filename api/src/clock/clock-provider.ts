import { ZonedDateTime } from "../shared/calendar";

export interface ClockProvider {
  now(): ZonedDateTime;
}

export interface SystemClockDeps {
  timeZone: string;
}

export class SystemClock implements ClockProvider {
  private readonly timeZone: string;

  constructor(deps: SystemClockDeps) {
    this.timeZone = deps.timeZone;
  }

  now(): ZonedDateTime {
    return ZonedDateTime.of(new Date(), this.timeZone);
  }
}

/**
 * Always answers the same moment.
 */
export class FixedClock implements ClockProvider {
  private readonly moment: ZonedDateTime;

  constructor(instant: Date | string, timeZone = "UTC") {
    this.moment = ZonedDateTime.of(
      typeof instant === "string" ? new Date(instant) : instant,
      timeZone
    );
  }

  now(): ZonedDateTime {
    return this.moment;
  }
}

// Local date and time values. A JS Date is always an instant, so TOML's local
// dates, local times and offset-carrying date-times get their own types.

function pad(value: number, width = 2): string {
  return String(Math.abs(value)).padStart(width, "0");
}

function formatOffset(minutes: number): string {
  const sign = minutes < 0 ? "-" : "+";
  return `${sign}${pad(Math.trunc(Math.abs(minutes) / 60))}:${pad(Math.abs(minutes) % 60)}`;
}

export class CalendarDate {
  constructor(
    readonly year: number,
    readonly month: number,
    readonly day: number,
  ) {}

  /** `YYYY-MM-DD` */
  toISOString(): string {
    return `${pad(this.year, 4)}-${pad(this.month)}-${pad(this.day)}`;
  }

  toString(): string {
    return this.toISOString();
  }
}

export interface TimeOfDayInit {
  hour: number;
  minute: number;
  second?: number;
  millisecond?: number;
  /** Offset from UTC in minutes; undefined for a local time. */
  utcOffset?: number;
}

export class TimeOfDay {
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
  readonly millisecond: number;
  readonly utcOffset?: number;

  constructor(init: TimeOfDayInit) {
    this.hour = init.hour;
    this.minute = init.minute;
    this.second = init.second ?? 0;
    this.millisecond = init.millisecond ?? 0;
    this.utcOffset = init.utcOffset;
  }

  /** `HH:MM:SS[.fff][±HH:MM]` */
  toISOString(): string {
    let text = `${pad(this.hour)}:${pad(this.minute)}:${pad(this.second)}`;
    if (this.millisecond) text += `.${pad(this.millisecond, 3)}`;
    if (this.utcOffset !== undefined) text += formatOffset(this.utcOffset);
    return text;
  }

  toString(): string {
    return this.toISOString();
  }
}

export class DateTime {
  constructor(
    readonly date: CalendarDate,
    readonly time: TimeOfDay,
  ) {}

  get utcOffset(): number | undefined {
    return this.time.utcOffset;
  }

  /** `YYYY-MM-DDTHH:MM:SS[.fff][±HH:MM]`, local when the time has no offset. */
  toISOString(): string {
    return `${this.date.toISOString()}T${this.time.toISOString()}`;
  }

  toString(): string {
    return this.toISOString();
  }
}

const MS_PER_SECOND = 1000;
const SECONDS_PER_DAY = 86400;
const MS_PER_DAY = SECONDS_PER_DAY * MS_PER_SECOND;

/**
 * A span of time, normalised the way calendar arithmetic does it: whole
 * `days` (possibly negative) plus `seconds` in [0, 86400).
 */
export class Duration {
  readonly kind = 'duration' as const;

  private constructor(readonly milliseconds: number) {}

  static fromMilliseconds(ms: number) {
    return new Duration(ms);
  }

  static fromSeconds(seconds: number) {
    return new Duration(seconds * MS_PER_SECOND);
  }

  static ofHours(hours: number) {
    return new Duration(hours * 3600 * MS_PER_SECOND);
  }

  static ofDays(days: number) {
    return new Duration(days * MS_PER_DAY);
  }

  static between(start: Date, end: Date) {
    return new Duration(end.getTime() - start.getTime());
  }

  get days() {
    return Math.floor(this.milliseconds / MS_PER_DAY);
  }

  get seconds() {
    return Math.floor((this.milliseconds - this.days * MS_PER_DAY) / MS_PER_SECOND);
  }

  /** Whole seconds; the sub-second remainder is dropped. */
  totalSeconds() {
    return this.days * SECONDS_PER_DAY + this.seconds;
  }

  hours() {
    return this.days * 24 + this.seconds / 3600;
  }

  before(date: Date) {
    return new Date(date.getTime() - this.milliseconds);
  }

  dividedBy(divisor: number) {
    return new Duration(this.milliseconds / divisor);
  }

  compareTo(other: Duration) {
    return this.milliseconds - other.milliseconds;
  }

  isLongerThan(other: Duration) {
    return this.milliseconds > other.milliseconds;
  }
}

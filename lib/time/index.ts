import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc.js';
import timezone from 'dayjs/plugin/timezone.js';
import type { Clock, TimeConversionResult, TimeResult } from '@/types/data';
import { ValidationError } from '@/lib/errors';
import { TimeOfDaySchema } from '@/lib/validation/schemas';

dayjs.extend(utc);
dayjs.extend(timezone);

const LOCAL_ALIASES = ['system', 'local'];
const DISPLAY_FORMAT = 'MMMM DD, YYYY [at] hh:mm:ss A';
const ISO_SECONDS_FORMAT = 'YYYY-MM-DDTHH:mm:ssZ';

export interface TimeServiceOptions {
  localTimezone?: string;
  clock?: Clock;
}

export function isValidTimezone(name: string): boolean {
  if (!name) return false;
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: name });
    return true;
  } catch {
    return false;
  }
}

export function validateTimeOfDay(time: string): string {
  const result = TimeOfDaySchema.safeParse(time);
  if (!result.success) {
    throw new ValidationError(`Invalid time format '${time}'. Expected 24-hour format HH:MM (00:00-23:59)`, {
      field: 'time',
    });
  }
  return result.data;
}

function formatHoursDifference(minutes: number): string {
  const hours = minutes / 60;
  const sign = hours < 0 ? '-' : '+';
  const magnitude = Math.abs(hours);
  if (Number.isInteger(magnitude)) {
    return `${sign}${magnitude.toFixed(1)}h`;
  }
  return `${sign}${magnitude.toFixed(2).replace(/0+$/, '').replace(/\.$/, '')}h`;
}

export class TimeService {
  readonly localTimezone: string;
  private readonly clock: Clock;

  constructor(options: TimeServiceOptions = {}) {
    const local = options.localTimezone ?? dayjs.tz.guess();
    if (!isValidTimezone(local)) {
      throw new ValidationError(`Invalid local timezone '${local}'`, { field: 'localTimezone' });
    }
    this.localTimezone = local;
    this.clock = options.clock ?? (() => new Date());
  }

  /** Maps `system`/`local` to the local zone and rejects unknown IANA names. */
  resolveZone(name: string): string {
    const trimmed = name.trim();
    if (LOCAL_ALIASES.includes(trimmed.toLowerCase())) {
      return this.localTimezone;
    }
    if (!isValidTimezone(trimmed)) {
      throw new ValidationError(
        `Invalid timezone '${name}'. Supported formats: 'system', 'local', or IANA names like ` +
          `'America/New_York', 'Europe/London', 'Asia/Tokyo', 'UTC'`,
        { field: 'timezone' }
      );
    }
    return trimmed;
  }

  currentTime(zone: string): TimeResult {
    const resolved = this.resolveZone(zone);
    const moment = dayjs(this.clock()).tz(resolved);
    return this.describe(moment, zone, resolved);
  }

  convertTime(sourceZone: string, time: string, targetZone: string): TimeConversionResult {
    const source = this.resolveZone(sourceZone);
    const target = this.resolveZone(targetZone);
    const hhmm = validateTimeOfDay(time);

    const today = dayjs(this.clock()).tz(source).format('YYYY-MM-DD');
    const sourceMoment = dayjs.tz(`${today} ${hhmm}`, source);
    const targetMoment = sourceMoment.tz(target);

    return {
      source: this.describe(sourceMoment, sourceZone, source),
      target: this.describe(targetMoment, targetZone, target),
      timeDifference: formatHoursDifference(targetMoment.utcOffset() - sourceMoment.utcOffset()),
    };
  }

  private describe(moment: dayjs.Dayjs, requested: string, resolved: string): TimeResult {
    const isLocal = LOCAL_ALIASES.includes(requested.trim().toLowerCase());
    let suffix: string;
    if (isLocal) {
      suffix = ` (System Time - ${resolved})`;
    } else if (resolved.toUpperCase() === 'UTC') {
      suffix = ' UTC';
    } else {
      suffix = ` (${resolved})`;
    }

    return {
      timezone: isLocal ? `System (${resolved})` : resolved,
      datetime: moment.format(ISO_SECONDS_FORMAT),
      formattedTime: `${moment.format(DISPLAY_FORMAT)}${suffix}`,
      dayOfWeek: moment.format('dddd'),
      isDst: this.isDst(moment, resolved),
    };
  }

  private isDst(moment: dayjs.Dayjs, zone: string): boolean {
    const year = moment.year();
    const january = dayjs.tz(`${year}-01-01 12:00`, zone).utcOffset();
    const july = dayjs.tz(`${year}-07-01 12:00`, zone).utcOffset();
    if (january === july) return false;
    return moment.utcOffset() === Math.max(january, july);
  }
}

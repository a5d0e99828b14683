/**
 * Date parsing and formatting for spoken calendar commands.
 *
 * Accepted forms: "2026-03-01", "2026-03-01 14:30", "今天", "明天下午3点",
 * "后天 9:15", "tomorrow 8点半". All dates are local time.
 */

const DAY_OFFSETS: Record<string, number> = {
  today: 0,
  tomorrow: 1,
  '今天': 0,
  '明天': 1,
  '后天': 2
};

const WEEKDAY_NAMES = ['周日', '周一', '周二', '周三', '周四', '周五', '周六'];

const ISO_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[ T](\d{1,2}):(\d{2}))?$/;

const RELATIVE_PATTERN =
  /^(今天|明天|后天|today|tomorrow)?\s*(上午|早上|中午|下午|晚上)?\s*(?:(\d{1,2})(?:[:：](\d{1,2})|点(?:(半)|(\d{1,2})分?)?))?$/i;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

function build(year: number, month: number, day: number, hour: number, minute: number): Date | undefined {
  if (month < 1 || month > 12 || day < 1 || day > 31 || hour > 23 || minute > 59) {
    return undefined;
  }
  const date = new Date(year, month - 1, day, hour, minute, 0, 0);
  // Rejects 2026-02-31 and the like
  return date.getDate() === day ? date : undefined;
}

/**
 * Parse a date/time phrase relative to `now`. A phrase without a time keeps
 * the current hour and minute.
 */
export function parseDateTime(text: string, now: Date): Date | undefined {
  const value = text.trim();
  if (value === '') {
    return undefined;
  }

  const iso = ISO_PATTERN.exec(value);
  if (iso) {
    const hour = iso[4] !== undefined ? Number(iso[4]) : now.getHours();
    const minute = iso[5] !== undefined ? Number(iso[5]) : now.getMinutes();
    return build(Number(iso[1]), Number(iso[2]), Number(iso[3]), hour, minute);
  }

  const relative = RELATIVE_PATTERN.exec(value);
  if (!relative) {
    return undefined;
  }
  const [, dayWord, period, hourText, colonMinute, half, pointMinute] = relative;
  if (dayWord === undefined && hourText === undefined) {
    return undefined;
  }

  const offset = dayWord !== undefined ? DAY_OFFSETS[dayWord.toLowerCase()] : 0;
  const target = new Date(now.getFullYear(), now.getMonth(), now.getDate() + offset);

  let hour = hourText !== undefined ? Number(hourText) : now.getHours();
  const minute = colonMinute !== undefined
    ? Number(colonMinute)
    : half !== undefined
      ? 30
      : pointMinute !== undefined
        ? Number(pointMinute)
        : hourText !== undefined ? 0 : now.getMinutes();

  if ((period === '下午' || period === '晚上') && hour < 12) {
    hour += 12;
  }

  return build(target.getFullYear(), target.getMonth() + 1, target.getDate(), hour, minute);
}

/**
 * Day offset word ("今天", "明天", "后天") or a YYYY-MM-DD date
 */
export function parseDay(text: string, now: Date): Date | undefined {
  const value = text.trim();
  const offset = DAY_OFFSETS[value.toLowerCase()];
  if (offset !== undefined) {
    return new Date(now.getFullYear(), now.getMonth(), now.getDate() + offset);
  }
  const match = /^(\d{4})-(\d{1,2})-(\d{1,2})$/.exec(value);
  return match ? build(Number(match[1]), Number(match[2]), Number(match[3]), 0, 0) : undefined;
}

export function isSameDay(a: Date, b: Date): boolean {
  return a.getFullYear() === b.getFullYear() && a.getMonth() === b.getMonth() && a.getDate() === b.getDate();
}

/** 2026年03月01日 */
export function formatChineseDate(date: Date): string {
  return `${date.getFullYear()}年${pad(date.getMonth() + 1)}月${pad(date.getDate())}日`;
}

/** 14:05 */
export function formatClock(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

/** 2026-03-01 */
export function formatIsoDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

export function weekdayName(date: Date): string {
  return WEEKDAY_NAMES[date.getDay()];
}

export function dayOfYear(date: Date): number {
  const start = new Date(date.getFullYear(), 0, 1);
  const today = new Date(date.getFullYear(), date.getMonth(), date.getDate());
  return Math.round((today.getTime() - start.getTime()) / 86400000) + 1;
}

/**
 * Whole calendar days from `from` to `to`
 */
export function daysBetween(from: Date, to: Date): number {
  const start = Date.UTC(from.getFullYear(), from.getMonth(), from.getDate());
  const end = Date.UTC(to.getFullYear(), to.getMonth(), to.getDate());
  return Math.round((end - start) / 86400000);
}

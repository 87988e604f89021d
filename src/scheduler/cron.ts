import { validate } from 'node-cron';
import { ConfigError } from '../shared/errors.js';

const MACROS: Record<string, string> = {
  '@yearly': '0 0 1 1 *',
  '@annually': '0 0 1 1 *',
  '@monthly': '0 0 1 * *',
  '@weekly': '0 0 * * 0',
  '@daily': '0 0 * * *',
  '@midnight': '0 0 * * *',
  '@hourly': '0 * * * *',
  'every minute': '* * * * *',
};

const MONTH_NAMES = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];
const DAY_NAMES = ['sun', 'mon', 'tue', 'wed', 'thu', 'fri', 'sat'];

interface FieldSpec {
  label: string;
  min: number;
  max: number;
  names?: string[];
  /** Value of the first entry in `names`. */
  nameBase?: number;
}

const FIELDS: readonly FieldSpec[] = [
  { label: 'minute', min: 0, max: 59 },
  { label: 'hour', min: 0, max: 23 },
  { label: 'day of month', min: 1, max: 31 },
  { label: 'month', min: 1, max: 12, names: MONTH_NAMES, nameBase: 1 },
  // 7 is accepted as Sunday and folded into 0
  { label: 'day of week', min: 0, max: 7, names: DAY_NAMES, nameBase: 0 },
];

export interface CronSchedule {
  expression: string;
  minutes: ReadonlySet<number>;
  hours: ReadonlySet<number>;
  days: ReadonlySet<number>;
  months: ReadonlySet<number>;
  weekdays: ReadonlySet<number>;
  /** Both day fields restricted: a day matches when either field does. */
  eitherDay: boolean;
}

const DAY_MS = 24 * 60 * 60 * 1000;
/** How far ahead to look before declaring an expression impossible (covers Feb 29). */
const SEARCH_HORIZON_MS = 5 * 366 * DAY_MS;

/** Expand macros and collapse whitespace. */
export function normalizeCron(expression: string): string {
  const trimmed = expression.trim().replace(/\s+/g, ' ');
  return MACROS[trimmed.toLowerCase()] ?? trimmed;
}

function fieldValue(token: string, spec: FieldSpec, expression: string): number {
  if (/^\d+$/.test(token)) return Number(token);
  const index = spec.names?.indexOf(token.toLowerCase()) ?? -1;
  if (index < 0) {
    throw new ConfigError(`Invalid cron expression: ${expression} (bad ${spec.label} "${token}")`);
  }
  return index + (spec.nameBase ?? 0);
}

function parseField(text: string, spec: FieldSpec, expression: string): Set<number> {
  const values = new Set<number>();
  const invalid = (): ConfigError =>
    new ConfigError(`Invalid cron expression: ${expression} (bad ${spec.label} "${text}")`);

  for (const part of text.split(',')) {
    const pieces = part.split('/');
    if (pieces.length > 2) throw invalid();
    const [range = '', stepText] = pieces;
    const step = stepText === undefined ? 1 : Number(stepText);
    if (!Number.isInteger(step) || step < 1) throw invalid();

    let lo: number;
    let hi: number;
    if (range === '*') {
      lo = spec.min;
      hi = spec.max;
    } else if (range.includes('-')) {
      const bounds = range.split('-');
      if (bounds.length !== 2) throw invalid();
      lo = fieldValue(bounds[0] ?? '', spec, expression);
      hi = fieldValue(bounds[1] ?? '', spec, expression);
    } else {
      lo = fieldValue(range, spec, expression);
      hi = stepText === undefined ? lo : spec.max;
    }
    if (lo > hi || lo < spec.min || hi > spec.max) throw invalid();
    for (let v = lo; v <= hi; v += step) values.add(v);
  }
  return values;
}

/** Parse a 5-field expression (or macro). Throws ConfigError when invalid. */
export function parseCron(expression: string): CronSchedule {
  const normalized = normalizeCron(expression);
  const parts = normalized.split(' ');
  if (parts.length !== 5 || !validate(normalized)) {
    throw new ConfigError(`Invalid cron expression: ${expression}`);
  }
  const sets = FIELDS.map((spec, i) => parseField(parts[i] ?? '', spec, expression));
  const [minutes, hours, days, months, weekdays] = sets;
  if (!minutes || !hours || !days || !months || !weekdays) {
    throw new ConfigError(`Invalid cron expression: ${expression}`);
  }
  if (weekdays.delete(7)) weekdays.add(0);

  const dayOfMonth = parts[2] ?? '*';
  const dayOfWeek = parts[4] ?? '*';
  return {
    expression: normalized,
    minutes,
    hours,
    days,
    months,
    weekdays,
    eitherDay: !dayOfMonth.startsWith('*') && !dayOfWeek.startsWith('*'),
  };
}

export function isValidCron(expression: string): boolean {
  try {
    parseCron(expression);
    return true;
  } catch (e) {
    if (e instanceof ConfigError) return false;
    throw e;
  }
}

function dayMatches(cron: CronSchedule, t: Date): boolean {
  const dom = cron.days.has(t.getUTCDate());
  const dow = cron.weekdays.has(t.getUTCDay());
  return cron.eitherDay ? dom || dow : dom && dow;
}

/**
 * First time strictly after `from` (whole minutes, UTC) that the
 * expression matches.
 */
export function nextRunTime(expression: string, from: Date = new Date()): Date {
  const cron = parseCron(expression);
  const t = new Date(from.getTime());
  t.setUTCSeconds(0, 0);
  t.setUTCMinutes(t.getUTCMinutes() + 1);
  const limit = from.getTime() + SEARCH_HORIZON_MS;

  while (t.getTime() <= limit) {
    if (!cron.months.has(t.getUTCMonth() + 1)) {
      t.setUTCMonth(t.getUTCMonth() + 1, 1);
      t.setUTCHours(0, 0, 0, 0);
    } else if (!dayMatches(cron, t)) {
      t.setUTCDate(t.getUTCDate() + 1);
      t.setUTCHours(0, 0, 0, 0);
    } else if (!cron.hours.has(t.getUTCHours())) {
      t.setUTCHours(t.getUTCHours() + 1, 0, 0, 0);
    } else if (!cron.minutes.has(t.getUTCMinutes())) {
      t.setUTCMinutes(t.getUTCMinutes() + 1, 0, 0);
    } else {
      return t;
    }
  }
  throw new ConfigError(`Cron expression never fires: ${expression}`);
}

export function nextRunTimes(expression: string, count: number, from: Date = new Date()): Date[] {
  const times: Date[] = [];
  let current = from;
  for (let i = 0; i < count; i++) {
    current = nextRunTime(expression, current);
    times.push(current);
  }
  return times;
}

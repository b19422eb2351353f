/**
 * Parsing and formatting of the free-text durations used by templates
 * ("5 days", "1.5 weeks", "2-3 days", "4 hours").
 */

const NUMBER_TOKEN = /^\d+(?:\.\d+)?$/;
const RANGE_TOKEN = /^(\d+(?:\.\d+)?)(?:-\d+(?:\.\d+)?)?$/;

const HOURS_PER_DAY = 8;
const DAYS_PER_WEEK = 7;
const DAYS_PER_MONTH = 30;
const WORKING_DAYS_PER_WEEK = 5;
const WEEKS_PER_MONTH = 4;

function tokens(text: string): string[] {
  return text.toLowerCase().split(/\s+/).filter((token) => token.length > 0);
}

/**
 * First number of the first token that is a number or a range ("2-3" -> 2)
 */
function firstQuantity(text: string): number | undefined {
  for (const token of tokens(text)) {
    const match = RANGE_TOKEN.exec(token);
    if (match?.[1]) {
      return Number.parseFloat(match[1]);
    }
  }
  return undefined;
}

/**
 * Leading number of an effort string, only when the first token is a plain number
 */
function leadingNumber(text: string): number | undefined {
  const first = tokens(text)[0];
  return first !== undefined && NUMBER_TOKEN.test(first) ? Number.parseFloat(first) : undefined;
}

/**
 * Whole calendar days in a phase duration. Weeks count 7 days, months 30;
 * ranges use their lower bound; anything unparseable counts as 1 day.
 */
export function parseDurationDays(duration: string): number {
  const lower = duration.toLowerCase();
  const quantity = firstQuantity(lower);

  if (lower.includes('day')) {
    return quantity === undefined ? 1 : Math.trunc(quantity);
  }
  if (lower.includes('week')) {
    return quantity === undefined ? 1 : Math.trunc(quantity * DAYS_PER_WEEK);
  }
  if (lower.includes('month')) {
    return quantity === undefined ? 1 : Math.trunc(quantity * DAYS_PER_MONTH);
  }
  return 1;
}

/**
 * @example
 * formatDays(1)  // => '1 day'
 * formatDays(10) // => '1.4 weeks'
 * formatDays(45) // => '1.5 months'
 */
export function formatDays(days: number): string {
  if (days === 0) return '0 days';
  if (days === 1) return '1 day';
  if (days < DAYS_PER_WEEK) return `${days} days`;
  if (days < DAYS_PER_MONTH) return `${(days / DAYS_PER_WEEK).toFixed(1)} weeks`;
  return `${(days / DAYS_PER_MONTH).toFixed(1)} months`;
}

/**
 * Scale a phase duration, truncating to whole days with a floor of one day.
 */
export function scaleDuration(duration: string, multiplier: number): string {
  const adjusted = Math.max(1, Math.trunc(parseDurationDays(duration) * multiplier));
  return formatDays(adjusted);
}

/**
 * Effort in (fractional) working days: "N day(s)" as N, "N hour(s)" as N / 8.
 * Unparseable day efforts count 1 day, unparseable hour efforts 1 hour,
 * anything else 1 day.
 */
export function parseEffortDays(effort: string): number {
  const lower = effort.toLowerCase();
  const value = leadingNumber(lower);

  if (lower.includes('day')) {
    return value ?? 1;
  }
  if (lower.includes('hour')) {
    return value === undefined ? 1 / HOURS_PER_DAY : value / HOURS_PER_DAY;
  }
  return 1;
}

function hours(count: number): string {
  return count === 1 ? '1 hour' : `${count} hours`;
}

/**
 * Effort of a verification task: 40% of an hour estimate (at least one
 * hour), 30% of a day estimate (at least a quarter day).
 */
export function estimateVerificationEffort(implementationEffort: string | undefined): string {
  if (!implementationEffort) {
    return '0.5 days';
  }

  const lower = implementationEffort.toLowerCase();
  const value = leadingNumber(lower);

  if (lower.includes('hour')) {
    return value === undefined ? '2 hours' : hours(Math.max(1, Math.trunc(Math.trunc(value) * 0.4)));
  }

  if (lower.includes('day')) {
    if (value === undefined) return '0.5 days';
    const days = Math.max(0.25, value * 0.3);
    return days < 1 ? hours(Math.trunc(days * HOURS_PER_DAY)) : `${days.toFixed(1)} days`;
  }

  return '0.5 days';
}

/**
 * Human-readable total effort: hours below a day, then days, then 5-day
 * weeks, then 4-week months.
 */
export function formatEffortTotal(days: number): string {
  if (days < 1) {
    return hours(Math.trunc(days * HOURS_PER_DAY));
  }
  if (days < DAYS_PER_WEEK) {
    return `${days.toFixed(1)} days`;
  }
  const weeks = days / WORKING_DAYS_PER_WEEK;
  if (weeks < WEEKS_PER_MONTH) {
    return `${weeks.toFixed(1)} weeks`;
  }
  return `${(weeks / WEEKS_PER_MONTH).toFixed(1)} months`;
}

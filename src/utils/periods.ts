/**
 * Period keys.
 *
 * The engine orders periods by integer key. Inputs may also name a period by
 * ISO week label ("2026-W03"), which maps to YYYY*100+WW so that numeric order
 * matches calendar order across year boundaries.
 */

import { getISOWeek, getISOWeeksInYear, getISOWeekYear, isValid, parseISO } from 'date-fns';
import { PeriodInput } from '../types';
import { InvalidInputError } from './errors';

const ISO_WEEK_LABEL = /^(\d{4})-W(\d{2})$/;

export function parseWeekLabel(label: string): number {
  const match = ISO_WEEK_LABEL.exec(label.trim());
  if (!match) {
    throw new InvalidInputError(`Invalid ISO week label '${label}'`, { label });
  }

  const year = Number(match[1]);
  const week = Number(match[2]);
  // January 4th always falls in week 1 of its ISO year
  const weeksInYear = getISOWeeksInYear(new Date(year, 0, 4));
  if (week < 1 || week > weeksInYear) {
    throw new InvalidInputError(`Week number out of range in '${label}'`, { label, weeksInYear });
  }

  return year * 100 + week;
}

export function toPeriodKey(value: PeriodInput): number {
  return typeof value === 'number' ? value : parseWeekLabel(value);
}

/**
 * ISO week key for a calendar date (yyyy-MM-dd or full ISO timestamp).
 */
export function weekKeyForDate(date: string | Date): number {
  const parsed = typeof date === 'string' ? parseISO(date) : date;
  if (!isValid(parsed)) {
    throw new InvalidInputError(`Invalid date '${String(date)}'`);
  }
  return getISOWeekYear(parsed) * 100 + getISOWeek(parsed);
}

/**
 * Render a period key for display. Keys built from ISO weeks come back as
 * labels; plain week indices are shown as-is.
 */
export function formatPeriodKey(period: number): string {
  const year = Math.floor(period / 100);
  const week = period % 100;
  if (year >= 1000 && week >= 1 && week <= 53) {
    return `${year}-W${String(week).padStart(2, '0')}`;
  }
  return String(period);
}

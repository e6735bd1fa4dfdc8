import Joi from 'joi';
import { ExtractedTimes, PlayerRoster } from '../types';

export interface EntrySubmission {
  date?: string;
  times: Record<string, string | number | null>;
}

export interface NormalizedTimes {
  times: ExtractedTimes;
  errors: string[];
}

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const TIME_PATTERN = /^\+?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

function isCalendarDate(value: string): boolean {
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

export const dateSchema = Joi.string()
  .pattern(DATE_PATTERN)
  .custom((value: string, helpers) => (isCalendarDate(value) ? value : helpers.error('any.invalid')))
  .messages({ 'string.pattern.base': '"date" must be formatted as YYYY-MM-DD' });

export function createSubmissionSchema(roster: PlayerRoster): Joi.ObjectSchema<EntrySubmission> {
  const names = roster.map((entry) => entry.name);

  return Joi.object<EntrySubmission>({
    date: dateSchema,
    times: Joi.object()
      .pattern(
        Joi.string().valid(...names),
        Joi.alternatives().try(Joi.string().allow(''), Joi.number()).allow(null)
      )
      .required(),
  });
}

/**
 * Accept the values from the editable table or the manual form. Blank
 * cells are skipped; anything else has to read as a non-negative number
 * and is kept as entered.
 */
export function normalizeTimes(raw: EntrySubmission['times'], roster: PlayerRoster): NormalizedTimes {
  const times: ExtractedTimes = {};
  const errors: string[] = [];

  for (const { name } of roster) {
    const value = raw[name];
    if (value === undefined || value === null) continue;

    const text = String(value).trim();
    if (text === '') continue;

    const parsed = Number(text);
    if (!TIME_PATTERN.test(text) || !Number.isFinite(parsed)) {
      errors.push(`Invalid time format for ${name}. Please enter a number.`);
      continue;
    }

    times[name] = text;
  }

  return { times, errors };
}

import Joi from 'joi';
import rosterData from '../data/roster.json';
import { PlayerRoster, RosterEntry } from '../types';

interface RosterFile {
  defaultPatterns: string[];
  players: { name: string; patterns?: string[] }[];
}

export const NAME_PLACEHOLDER = '{name}';

function isValidTemplate(template: string): boolean {
  try {
    new RegExp(template.split(NAME_PLACEHOLDER).join('name'), 'i');
    return true;
  } catch {
    return false;
  }
}

const patternSchema = Joi.string()
  .pattern(/\{name\}/)
  .custom((template: string, helpers) => (isValidTemplate(template) ? template : helpers.error('any.invalid')))
  .messages({ 'any.invalid': '{{#label}} is not a valid regular expression' })
  .required();

const rosterSchema = Joi.object<RosterFile>({
  defaultPatterns: Joi.array().items(patternSchema).min(1).required(),
  players: Joi.array()
    .items(
      Joi.object({
        name: Joi.string().trim().min(1).required(),
        patterns: Joi.array().items(patternSchema).min(1),
      })
    )
    .unique((a: { name: string }, b: { name: string }) => a.name.toLowerCase() === b.name.toLowerCase())
    .min(1)
    .required(),
});

/**
 * Build the player roster from its data file. Players without their own
 * pattern list use the default templates, in the listed order.
 */
export function loadRoster(data: unknown = rosterData): PlayerRoster {
  const { error, value } = rosterSchema.validate(data);

  if (error || !value) {
    throw new Error(`Invalid roster: ${error ? error.message : 'empty document'}`);
  }

  const entries: RosterEntry[] = value.players.map((player) =>
    Object.freeze({
      name: player.name,
      patterns: Object.freeze([...(player.patterns ?? value.defaultPatterns)]),
    })
  );

  return Object.freeze(entries);
}

export function rosterNames(roster: PlayerRoster): string[] {
  return roster.map((entry) => entry.name);
}

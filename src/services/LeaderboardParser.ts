import { NAME_PLACEHOLDER } from '../config/roster';
import { ExtractedTimes, PlayerName, PlayerRoster } from '../types';

interface CompiledPlayer {
  name: PlayerName;
  matchers: RegExp[];
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Decimal form of a parsed time. Whole numbers keep one fractional digit
 * ("2.0") so they read the same as the rows already in the table.
 */
export function formatTime(value: number): string {
  if (Number.isInteger(value) && Math.abs(value) < 1e16) {
    return value.toFixed(1);
  }
  return String(value);
}

/**
 * Pulls per-player times out of OCR text.
 *
 * Each roster entry carries an ordered list of templates; the first one
 * whose capture parses as a finite number wins for that player. Players
 * are matched independently of each other, so a name that is a prefix of
 * another name (e.g. "Vy" in "Vyvyan") can pick up the wrong line. That is
 * a known limitation of plain pattern matching.
 */
export class LeaderboardParser {
  private readonly players: CompiledPlayer[];

  constructor(roster: PlayerRoster) {
    this.players = roster.map((entry) => ({
      name: entry.name,
      matchers: entry.patterns.map((template) => this.compile(template, entry.name)),
    }));
  }

  parse(rawText: string): ExtractedTimes {
    const times: ExtractedTimes = {};

    for (const player of this.players) {
      for (const matcher of player.matchers) {
        const match = matcher.exec(rawText);
        if (!match || match[1] === undefined) {
          continue;
        }

        const value = Number.parseFloat(match[1]);
        if (!Number.isFinite(value) || value < 0) {
          continue;
        }

        times[player.name] = formatTime(value);
        break;
      }
    }

    return times;
  }

  private compile(template: string, name: PlayerName): RegExp {
    // No 'g' flag: exec() must not carry lastIndex between calls
    return new RegExp(template.split(NAME_PLACEHOLDER).join(escapeRegExp(name)), 'i');
  }
}

export function parseLeaderboard(rawText: string, roster: PlayerRoster): ExtractedTimes {
  return new LeaderboardParser(roster).parse(rawText);
}

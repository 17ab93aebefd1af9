import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { readFileSync } from 'fs';
import { TeamDefinition, TeamRoster } from '@talktime/shared-models';
import { analyticsConfig } from '../config/analytics.config';
import bundledTeams from '../config/teams.json';
import { NameMatcherService } from './name-matcher.service';

/**
 * Read-only table of team rosters.
 *
 * Loaded once at startup from the bundled teams.json, or from TEAMS_FILE
 * when set. Member names are normalized once here; matching reuses them.
 */
@Injectable()
export class TeamRosterService {
  private readonly logger = new Logger(TeamRosterService.name);
  private readonly teams: ReadonlyMap<string, TeamRoster>;

  constructor(
    @Inject(analyticsConfig.KEY)
    config: ConfigType<typeof analyticsConfig>,
    private readonly nameMatcher: NameMatcherService
  ) {
    const definitions = config.teamsFile
      ? parseTeamsDocument(JSON.parse(readFileSync(config.teamsFile, 'utf-8')), config.teamsFile)
      : parseTeamsDocument(bundledTeams, 'teams.json');

    const teams = new Map<string, TeamRoster>();
    for (const definition of definitions) {
      const key = definition.tag.toUpperCase();
      if (teams.has(key)) {
        throw new Error(`Duplicate team tag "${definition.tag}"`);
      }
      teams.set(key, {
        ...definition,
        normalizedMembers: Object.freeze(this.nameMatcher.normalizeRoster(definition.members)),
      });
    }
    this.teams = teams;

    this.logger.log(
      `Loaded ${teams.size} team rosters: ${[...teams.values()]
        .map((t) => `${t.tag} (${t.members.length})`)
        .join(', ')}`
    );
  }

  getTeams(): TeamRoster[] {
    return [...this.teams.values()];
  }

  /**
   * Look up a team by tag, case-insensitively.
   */
  getTeam(tag: string): TeamRoster | undefined {
    return this.teams.get(tag.toUpperCase());
  }

  /**
   * Whether an agent name belongs to the team. Unknown tags match nobody.
   */
  isMember(agent: string | null, tag: string): boolean {
    const team = this.getTeam(tag);
    return team !== undefined && this.nameMatcher.isMember(agent, team.normalizedMembers);
  }
}

/**
 * Validate a `{ teams: [...] }` document.
 */
export function parseTeamsDocument(document: unknown, source: string): TeamDefinition[] {
  const list = isObject(document) ? document['teams'] : undefined;
  if (!Array.isArray(list)) {
    throw new Error(`${source}: expected an object with a "teams" array`);
  }

  const teams: unknown[] = list;
  return teams.map((team, index): TeamDefinition => {
    if (!isObject(team)) {
      throw new Error(`${source}: team #${index + 1} must be an object`);
    }
    const { tag, label, members } = team;
    if (typeof tag !== 'string' || tag.trim() === '' || !Array.isArray(members)) {
      throw new Error(`${source}: team #${index + 1} needs a "tag" and a "members" array`);
    }
    const names: unknown[] = members;
    if (!names.every((m): m is string => typeof m === 'string')) {
      throw new Error(`${source}: members of team "${tag}" must be strings`);
    }
    return {
      tag: tag.trim(),
      label: typeof label === 'string' ? label : tag.trim(),
      members: names,
    };
  });
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

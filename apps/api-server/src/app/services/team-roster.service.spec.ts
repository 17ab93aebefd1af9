import { Test } from '@nestjs/testing';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { analyticsConfig, DEFAULT_ANALYTICS_CONFIG } from '../config/analytics.config';
import { NameMatcherService } from './name-matcher.service';
import { parseTeamsDocument, TeamRosterService } from './team-roster.service';

async function createRoster(teamsFile: string | null): Promise<TeamRosterService> {
  const moduleRef = await Test.createTestingModule({
    providers: [
      TeamRosterService,
      NameMatcherService,
      { provide: analyticsConfig.KEY, useValue: { ...DEFAULT_ANALYTICS_CONFIG, teamsFile } },
    ],
  }).compile();
  return moduleRef.get(TeamRosterService);
}

describe('TeamRosterService', () => {
  describe('bundled rosters', () => {
    let roster: TeamRosterService;

    beforeAll(async () => {
      roster = await createRoster(null);
    });

    it('loads the bundled teams', () => {
      expect(roster.getTeams().map((t) => t.tag)).toEqual(['B2C', 'MT']);
      expect(roster.getTeam('b2c')?.members).toHaveLength(13);
      expect(roster.getTeam('MT')?.normalizedMembers).toEqual(['devansh']);
    });

    it('looks up tags case-insensitively', () => {
      expect(roster.getTeam('mt')?.tag).toBe('MT');
      expect(roster.getTeam('ENTERPRISE')).toBeUndefined();
    });

    it('matches agents against a team', () => {
      expect(roster.isMember('Devansh (MT)', 'MT')).toBe(true);
      expect(roster.isMember('Devansh', 'B2C')).toBe(false);
      expect(roster.isMember('Riya Sen', 'B2C')).toBe(true);
      expect(roster.isMember(null, 'B2C')).toBe(false);
      expect(roster.isMember('Riya Sen', 'ENTERPRISE')).toBe(false);
    });
  });

  describe('roster file', () => {
    let dir: string;

    beforeAll(() => {
      dir = mkdtempSync(join(tmpdir(), 'teams-'));
    });

    afterAll(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it('loads teams from TEAMS_FILE', async () => {
      const file = join(dir, 'teams.json');
      writeFileSync(file, JSON.stringify({ teams: [{ tag: 'EDU', members: ['Ira Paul'] }] }));

      const roster = await createRoster(file);

      expect(roster.getTeams()).toEqual([
        { tag: 'EDU', label: 'EDU', members: ['Ira Paul'], normalizedMembers: ['ira paul'] },
      ]);
    });

    it('rejects duplicate tags', async () => {
      const file = join(dir, 'duplicate.json');
      writeFileSync(
        file,
        JSON.stringify({ teams: [{ tag: 'EDU', members: [] }, { tag: 'edu', members: [] }] })
      );

      await expect(createRoster(file)).rejects.toThrow('Duplicate team tag "edu"');
    });
  });
});

describe('parseTeamsDocument', () => {
  it('validates the document shape', () => {
    expect(() => parseTeamsDocument([], 'x.json')).toThrow('x.json: expected an object with a "teams" array');
    expect(() => parseTeamsDocument({ teams: [{ tag: 'A' }] }, 'x.json')).toThrow(
      'x.json: team #1 needs a "tag" and a "members" array'
    );
    expect(() => parseTeamsDocument({ teams: [{ tag: 'A', members: [1] }] }, 'x.json')).toThrow(
      'x.json: members of team "A" must be strings'
    );
  });

  it('trims tags and defaults the label', () => {
    expect(parseTeamsDocument({ teams: [{ tag: ' A ', members: ['x'] }] }, 'x.json')).toEqual([
      { tag: 'A', label: 'A', members: ['x'] },
    ]);
  });
});

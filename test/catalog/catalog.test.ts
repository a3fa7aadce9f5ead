import { describe, it, expect } from 'vitest';
import { TEAM_CODES, isTeamCode, teamInfo, teamPagePath } from '../../src/catalog/teams.js';
import { subheaderLabel } from '../../src/catalog/sections.js';

describe('teams', () => {
  it('should list all 30 codes in sorted order', () => {
    expect(TEAM_CODES).toHaveLength(30);
    expect(TEAM_CODES.slice(0, 3)).toEqual(['ARI', 'ATH', 'ATL']);
  });

  it('should only accept exact team codes', () => {
    expect(isTeamCode('NYY')).toBe(true);
    expect(isTeamCode('nyy')).toBe(false);
    expect(isTeamCode('Indy Ball')).toBe(false);
    expect(isTeamCode('toString')).toBe(false);
  });

  it('should resolve names and page paths', () => {
    expect(teamInfo('BOS')).toEqual({ name: 'Boston Red Sox', short: 'Red Sox' });
    expect(teamPagePath('KCR')).toBe('kcr.html');
  });
});

describe('subheaderLabel', () => {
  it('should relabel trade and Rule-5 categories', () => {
    expect(subheaderLabel('Traded For')).toBe('Acquired');
    expect(subheaderLabel('Rule-5 Draft Losses')).toBe('Losses');
  });

  it('should fall back to the category name', () => {
    expect(subheaderLabel('Released')).toBe('Released');
  });
});

export interface TeamInfo {
  name: string;
  short: string;
}

export const TEAMS = {
  ARI: { name: 'Arizona Diamondbacks', short: 'Diamondbacks' },
  ATH: { name: 'Athletics', short: 'Athletics' },
  ATL: { name: 'Atlanta Braves', short: 'Braves' },
  BAL: { name: 'Baltimore Orioles', short: 'Orioles' },
  BOS: { name: 'Boston Red Sox', short: 'Red Sox' },
  CHC: { name: 'Chicago Cubs', short: 'Cubs' },
  CHW: { name: 'Chicago White Sox', short: 'White Sox' },
  CIN: { name: 'Cincinnati Reds', short: 'Reds' },
  CLE: { name: 'Cleveland Guardians', short: 'Guardians' },
  COL: { name: 'Colorado Rockies', short: 'Rockies' },
  DET: { name: 'Detroit Tigers', short: 'Tigers' },
  HOU: { name: 'Houston Astros', short: 'Astros' },
  KCR: { name: 'Kansas City Royals', short: 'Royals' },
  LAA: { name: 'Los Angeles Angels', short: 'Angels' },
  LAD: { name: 'Los Angeles Dodgers', short: 'Dodgers' },
  MIA: { name: 'Miami Marlins', short: 'Marlins' },
  MIL: { name: 'Milwaukee Brewers', short: 'Brewers' },
  MIN: { name: 'Minnesota Twins', short: 'Twins' },
  NYM: { name: 'New York Mets', short: 'Mets' },
  NYY: { name: 'New York Yankees', short: 'Yankees' },
  PHI: { name: 'Philadelphia Phillies', short: 'Phillies' },
  PIT: { name: 'Pittsburgh Pirates', short: 'Pirates' },
  SDP: { name: 'San Diego Padres', short: 'Padres' },
  SEA: { name: 'Seattle Mariners', short: 'Mariners' },
  SFG: { name: 'San Francisco Giants', short: 'Giants' },
  STL: { name: 'St. Louis Cardinals', short: 'Cardinals' },
  TBR: { name: 'Tampa Bay Rays', short: 'Rays' },
  TEX: { name: 'Texas Rangers', short: 'Rangers' },
  TOR: { name: 'Toronto Blue Jays', short: 'Blue Jays' },
  WSH: { name: 'Washington Nationals', short: 'Nationals' },
} as const satisfies Record<string, TeamInfo>;

export type TeamCode = keyof typeof TEAMS;

/** Sheets that share the workbook but never hold a team's moves. */
export const EXCLUDED_SHEETS: ReadonlySet<string> = new Set(['Indy Ball']);

export const TEAM_CODES: readonly TeamCode[] = Object.freeze(Object.keys(TEAMS).filter(isTeamCode).sort());

export function isTeamCode(value: string): value is TeamCode {
  return Object.hasOwn(TEAMS, value);
}

export function teamInfo(code: TeamCode): TeamInfo {
  return TEAMS[code];
}

/** File name of a team's page, relative to the site root. */
export function teamPagePath(code: TeamCode): string {
  return `${code.toLowerCase()}.html`;
}

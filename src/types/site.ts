import type { TeamCode } from '../catalog/teams.js';

/** Record shape read by the client-side search in search.js. */
export interface SearchRecord {
  entry: string;
  team: TeamCode;
  category: string;
  date: string | null;
  team_page: string;
}

export interface SiteFile {
  /** Path relative to the output directory */
  path: string;
  contents: string;
}

export interface SiteAssets {
  stylesheet: string;
  /** Client search code appended after the serialized records */
  searchClient: string;
}

export interface RenderOptions {
  siteName: string;
  /** Render the homepage transaction feeds */
  feed: boolean;
  feedLimit: number;
  seasonStartYear: number;
}

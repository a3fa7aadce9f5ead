import { teamInfo, type TeamCode } from '../catalog/teams.js';
import { FEED_EXCLUDED_CATEGORIES } from '../catalog/sections.js';
import { sortNewestFirst } from '../pipeline/sort-key.js';
import type { CategoryBuckets, Corpus, Transaction } from '../types/transaction.js';
import type { RenderOptions } from '../types/site.js';
import { renderFeedItems, renderTeamGrid, renderTeamSections } from './fragments.js';
import { escapeHtml } from './markup.js';

export const STYLESHEET_PATH = 'styles.css';
export const SEARCH_SCRIPT_PATH = 'search.js';

export interface HomepageFeeds {
  mlb: Transaction[];
  all: Transaction[];
}

/**
 * Newest-first feeds for the homepage. Categories that restate another
 * team's move are dropped before the MLB filter is applied.
 */
export function selectFeeds(
  transactions: readonly Transaction[],
  options: Pick<RenderOptions, 'feedLimit' | 'seasonStartYear'>,
): HomepageFeeds {
  const visible = transactions.filter((t) => !FEED_EXCLUDED_CATEGORIES.has(t.category));
  const sorted = sortNewestFirst(visible, options.seasonStartYear);
  return {
    mlb: sorted.filter((t) => t.isMlb).slice(0, options.feedLimit),
    all: sorted.slice(0, options.feedLimit),
  };
}

/** '2025-26' for a season starting in 2025. */
export function seasonLabel(startYear: number): string {
  return `${startYear}-${String(startYear + 1).slice(-2)}`;
}

export function renderHomepage(corpus: Corpus, options: RenderOptions): string {
  const season = seasonLabel(options.seasonStartYear);
  const feeds = options.feed ? renderFeeds(selectFeeds(corpus.transactions, options), options) : '';

  const body = `    <section class="hero">
        <h1>${season} MLB Offseason Tracker</h1>
        <p>Comprehensive transaction tracking across all 30 MLB organizations</p>
    </section>
${feeds}
    <section class="teams-section">
        <div class="section-header">
            <h2 class="section-title">Teams</h2>
        </div>
${renderTeamGrid()}
    </section>

${renderLegend()}`;

  return renderDocument({
    title: `${options.siteName} - ${season} MLB Offseason Tracker`,
    siteName: options.siteName,
    homeActive: true,
    body,
  });
}

export function renderTeamPage(
  code: TeamCode,
  buckets: CategoryBuckets,
  options: Pick<RenderOptions, 'siteName' | 'seasonStartYear'>,
): string {
  const { name } = teamInfo(code);
  const season = seasonLabel(options.seasonStartYear);

  const body = `    <div class="team-header">
        <h1 class="team-name">${escapeHtml(name)}</h1>
        <p class="team-subtitle">${season} Offseason Transactions</p>
    </div>

    <div class="accordion-container">
${renderTeamSections(buckets, options.seasonStartYear)}
    </div>

    <section class="teams-section">
        <div class="section-header">
            <h2 class="section-title">Other Teams</h2>
        </div>
${renderTeamGrid(code)}
    </section>`;

  return renderDocument({
    title: `${name} - ${options.siteName}`,
    siteName: options.siteName,
    homeActive: false,
    body,
    inlineScript: `        function toggleAccordion(header) {
            const section = header.parentElement;
            section.classList.toggle('open');
        }`,
  });
}

function renderFeeds(feeds: HomepageFeeds, options: Pick<RenderOptions, 'feedLimit'>): string {
  return `
    <section class="feeds-container">
${renderFeed('Latest MLB Moves', feeds.mlb, options.feedLimit)}
${renderFeed('All Moves', feeds.all, options.feedLimit)}
    </section>
`;
}

function renderFeed(title: string, transactions: readonly Transaction[], limit: number): string {
  return `        <div class="feed">
            <div class="feed-header">
                <h2 class="feed-title">${escapeHtml(title)}</h2>
            </div>
            <div class="feed-body">
${renderFeedItems(transactions, limit)}
            </div>
        </div>`;
}

export function renderLegend(): string {
  return `    <section class="key-section">
        <div class="section-header">
            <h2 class="section-title">Key</h2>
        </div>
        <div class="key-content">
            <div class="key-group">
                <h3 class="key-heading">General Notation</h3>
                <ul class="key-list">
                    <li><strong>*</strong> = Re-signed (MLB Signings, MiLB Signings)</li>
                    <li><strong>(Team)</strong> = Last team played for</li>
                    <li><strong>(Team, Level)</strong> = Last team and highest level reached (MiLB Signings, trades, waivers)</li>
                    <li><strong><em>Italics</em></strong> = MLB portion of Rule-5 Draft, or player subsequently outrighted (Waiver Claims)</li>
                    <li><strong><s>Strikethrough</s></strong> = No longer in organization (except if lost off waivers then re-joined)</li>
                    <li><strong>No date</strong> = Transaction not yet official (MLB/MiLB Signings), except re-signed players at top (*), who are MiLB players who re-signed before reaching MiLB Free Agency</li>
                </ul>
            </div>
            <div class="key-group">
                <h3 class="key-heading">Position Designations</h3>
                <ul class="key-list">
                    <li><strong>RHSP/LHSP</strong> = Right/Left-handed Starting Pitcher</li>
                    <li><strong>RHRP/LHRP</strong> = Right/Left-handed Relief Pitcher</li>
                    <li>Pitchers listed as SP if more starts than relief appearances in most recent season</li>
                    <li>Position players listed by most-played position in most recent season</li>
                </ul>
            </div>
            <div class="key-group">
                <h3 class="key-heading">Free Agents &amp; Released Players</h3>
                <ul class="key-list">
                    <li><strong>New Team (Contract Type)</strong> = Where player signed and contract level</li>
                    <li>Example: "TBR (MiLB)" = Signed with Rays on Minor League contract</li>
                    <li>Example: "Rakuten (NPB)" = Signed with team in foreign league</li>
                </ul>
            </div>
            <div class="key-group">
                <h3 class="key-heading">International Amateur Signings</h3>
                <ul class="key-list">
                    <li><strong>(Three-letter code)</strong> = Player's country using ISO Alpha-3 codes</li>
                    <li>Example: "DOM" = Dominican Republic, "VEN" = Venezuela, "CUB" = Cuba</li>
                </ul>
            </div>
        </div>
    </section>`;
}

interface DocumentParts {
  title: string;
  siteName: string;
  homeActive: boolean;
  body: string;
  inlineScript?: string;
}

function renderDocument({ title, siteName, homeActive, body, inlineScript }: DocumentParts): string {
  const inline = inlineScript ? `\n    <script>\n${inlineScript}\n    </script>` : '';

  return `<!DOCTYPE html>
<html lang="en">
<head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>${escapeHtml(title)}</title>
    <link rel="preconnect" href="https://fonts.googleapis.com">
    <link rel="preconnect" href="https://fonts.gstatic.com" crossorigin>
    <link href="https://fonts.googleapis.com/css2?family=JetBrains+Mono:wght@400;600&family=Space+Grotesk:wght@400;600;700&display=swap" rel="stylesheet">
    <link rel="stylesheet" href="${STYLESHEET_PATH}">
</head>
<body>
    <header class="header">
        <a href="index.html" class="logo">${renderLogo(siteName)}</a>
        <nav class="nav">
            <a href="index.html"${homeActive ? ' class="active"' : ''}>Home</a>
            <div class="search-container">
                <span class="search-icon">⌕</span>
                <input type="text" class="search-input" placeholder="Search players..." id="searchInput">
                <div class="search-results" id="searchResults"></div>
            </div>
        </nav>
    </header>

${body}

    <footer class="footer">
        <p>${escapeHtml(siteName)} | Data updated daily during the offseason</p>
    </footer>

    <script src="${SEARCH_SCRIPT_PATH}"></script>${inline}
</body>
</html>
`;
}

/** Last word of the site name carries the accent colour. */
function renderLogo(siteName: string): string {
  const split = siteName.lastIndexOf(' ');
  if (split === -1) return escapeHtml(siteName);
  return `${escapeHtml(siteName.slice(0, split + 1))}<span>${escapeHtml(siteName.slice(split + 1))}</span>`;
}

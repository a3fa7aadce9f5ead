import { TEAM_CODES, teamInfo, teamPagePath, type TeamCode } from '../catalog/teams.js';
import { SECTIONS, subheaderLabel, type SectionConfig } from '../catalog/sections.js';
import { DEFAULT_SEASON_START_YEAR, sortChronologically } from '../pipeline/sort-key.js';
import type { CategoryBuckets, Transaction } from '../types/transaction.js';
import { categoryClass, escapeHtml, formatEntry } from './markup.js';

const NO_DATE = '—';
const PAIRED_SEPARATOR = ' → ';

export interface CategoryGroup {
  category: string;
  transactions: readonly Transaction[];
}

export interface SectionGroup {
  section: SectionConfig;
  /** One entry per configured category, empty ones included */
  groups: CategoryGroup[];
  count: number;
}

/** Directory of every team, sorted by code. `current` marks the page's own team. */
export function renderTeamGrid(current?: TeamCode): string {
  const cards = TEAM_CODES.map((code) => {
    const active = code === current ? ' current' : '';
    return `            <a href="${teamPagePath(code)}" class="team-card${active}"><span class="team-abbr">${code}</span><span class="team-name">${escapeHtml(teamInfo(code).short)}</span></a>`;
  });

  return `        <div class="teams-grid">
${cards.join('\n')}
        </div>`;
}

/** Pair each configured section with the team's transactions for its categories. */
export function groupSections(buckets: CategoryBuckets): SectionGroup[] {
  return SECTIONS.map((section) => {
    const groups = section.categories.map((category) => ({
      category,
      transactions: buckets.get(category) ?? [],
    }));
    const count = groups.reduce((sum, g) => sum + g.transactions.length, 0);
    return { section, groups, count };
  });
}

/** Categories present in the sheet that no section displays. */
export function unsectionedCategories(buckets: CategoryBuckets): string[] {
  const shown = new Set(SECTIONS.flatMap((s) => s.categories));
  return [...buckets.keys()].filter((category) => !shown.has(category));
}

export function renderTeamSections(
  buckets: CategoryBuckets,
  seasonStartYear = DEFAULT_SEASON_START_YEAR,
): string {
  return groupSections(buckets)
    .filter((g) => g.count > 0)
    .map((g) => renderAccordionSection(g, seasonStartYear))
    .join('');
}

/**
 * One collapsible section. Empty sections render as ''. With subheaders on
 * and more than one category, each category gets its own labelled,
 * separately sorted run; otherwise everything is merged and sorted once.
 */
export function renderAccordionSection(
  { section, groups, count }: SectionGroup,
  seasonStartYear = DEFAULT_SEASON_START_YEAR,
  isOpen = false,
): string {
  if (count === 0) return '';

  let items: string[];
  if (section.subheaders && groups.length > 1) {
    items = groups
      .filter((g) => g.transactions.length > 0)
      .flatMap((g) => [
        `                    <li class="subheader">${escapeHtml(subheaderLabel(g.category))}</li>`,
        ...sortChronologically(g.transactions, seasonStartYear).map(renderTransactionItem),
      ]);
  } else {
    const merged = groups.flatMap((g) => g.transactions);
    items = sortChronologically(merged, seasonStartYear).map(renderTransactionItem);
  }

  return `        <div class="accordion-section${isOpen ? ' open' : ''}">
            <div class="accordion-header" onclick="toggleAccordion(this)">
                <div class="accordion-title">
                    ${escapeHtml(section.title)}
                    <span class="accordion-count">${count}</span>
                </div>
                <span class="accordion-icon">▼</span>
            </div>
            <div class="accordion-content">
                <ul class="transaction-list">
${items.join('\n')}
                </ul>
            </div>
        </div>
`;
}

export function renderTransactionItem(t: Transaction): string {
  const paired = t.pairedValue ? `${PAIRED_SEPARATOR}${escapeHtml(t.pairedValue)}` : '';
  return `                    <li class="transaction-item">
                        <span class="tx-date">${dateLabel(t)}</span>
                        <span class="tx-player">${formatEntry(t.text)}${paired}</span>
                    </li>`;
}

/** Feed rows for the homepage, in the order given. */
export function renderFeedItems(transactions: readonly Transaction[], limit: number): string {
  return transactions
    .slice(0, limit)
    .map((t) => {
      const cls = categoryClass(t.category);
      return `                <div class="feed-item">
                    <span class="feed-team">${t.teamCode}</span>
                    <span class="feed-date">${dateLabel(t)}</span>
                    <div class="feed-content">
                        <span class="feed-player">${formatEntry(t.text)}</span>
                        <span class="feed-category ${cls}">${escapeHtml(t.category)}</span>
                    </div>
                </div>`;
    })
    .join('\n');
}

function dateLabel(t: Transaction): string {
  return t.date ? escapeHtml(t.date) : NO_DATE;
}

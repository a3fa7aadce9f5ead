import type { ParsedEntry } from '../types/transaction.js';

const STRIKE = '~~';
const ITALIC = '_';
const DATE_DELIMITER = ': ';
const DATE_PART = /^\d{1,2}$/;

/**
 * Split a cell like "9/15: Signed RHSP" into its date and text.
 *
 * Cells wrapped whole in ~~strikethrough~~ or _italics_ keep the wrapping
 * around the text that follows the date. When no valid date prefix is found
 * the cell comes back untouched, wrapping included.
 */
export function parseEntry(raw: string): ParsedEntry {
  let working = raw;

  const isStrikethrough =
    working.length >= STRIKE.length * 2 && working.startsWith(STRIKE) && working.endsWith(STRIKE);
  if (isStrikethrough) {
    working = working.slice(STRIKE.length, -STRIKE.length);
  }

  const isItalic =
    working.length >= 2 &&
    working.startsWith(ITALIC) &&
    working.endsWith(ITALIC) &&
    !working.startsWith(ITALIC + ITALIC);
  if (isItalic) {
    working = working.slice(1, -1);
  }

  const delimiterAt = working.indexOf(DATE_DELIMITER);
  if (delimiterAt === -1) return { date: null, text: raw };

  const head = working.slice(0, delimiterAt);
  if (!isDatePrefix(head)) return { date: null, text: raw };

  let text = working.slice(delimiterAt + DATE_DELIMITER.length);
  if (isItalic) text = `${ITALIC}${text}${ITALIC}`;
  if (isStrikethrough) text = `${STRIKE}${text}${STRIKE}`;

  return { date: head, text };
}

/** 'M/D' with month 1-12 and day 1-31; days per month are not checked. */
export function isDatePrefix(head: string): boolean {
  if (head.length > 5 || !head.includes('/')) return false;

  const parts = head.split('/');
  if (parts.length !== 2) return false;

  const [monthStr = '', dayStr = ''] = parts;
  if (!DATE_PART.test(monthStr) || !DATE_PART.test(dayStr)) return false;

  const month = parseInt(monthStr, 10);
  const day = parseInt(dayStr, 10);
  return month >= 1 && month <= 12 && day >= 1 && day <= 31;
}

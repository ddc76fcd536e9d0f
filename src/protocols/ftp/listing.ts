/**
 * Directory listing parsers
 *
 * Two independent strategies share one entry shape:
 * - MLSD: `fact=value;fact=value; name`, machine readable
 * - LIST: `ls -l` style text, best effort
 *
 * A bad MLSD line is skipped; a bad LIST line degrades to an `unknown`
 * entry so every non-blank LIST line is still visible to the caller.
 */

import { getDefaultLogger, type Logger } from '../../types/logger.js';
import { parsePermissions } from '../../utils/permissions.js';

// ============================================================================
// Types
// ============================================================================

export type ListingEntryType = 'file' | 'dir' | 'unknown';

export interface ListingEntry {
  readonly name: string;
  readonly type: ListingEntryType;
  readonly size?: number;
  /** Nine-character string for LIST, the `perm` fact for MLSD */
  readonly permissions?: string;
  /** Numeric mode decoded from a LIST permission string */
  readonly mode?: number;
  readonly links?: number;
  readonly owner?: string;
  readonly group?: string;
  /** Timestamp as the server sent it */
  readonly modified?: string;
  readonly modifiedAt?: Date;
  /** MLSD facts with lower-cased keys */
  readonly facts?: Readonly<Record<string, string>>;
}

export interface ListingParseOptions {
  logger?: Logger;
  /** Reference time for LIST dates that omit the year */
  now?: Date;
}

/**
 * Split a data-connection payload into lines
 */
export function splitListingLines(payload: string): string[] {
  return payload.split(/\r?\n/);
}

// ============================================================================
// MLSD
// ============================================================================

const DIRECTORY_TYPES = new Set(['dir', 'cdir', 'pdir']);

/**
 * Parse MLSD lines into entries
 *
 * Only the first whitespace after the facts separates them from the name,
 * so names keep their spaces.
 *
 * @example
 * ```typescript
 * parseStructuredListing(['size=1024;type=file; report.txt']);
 * // [{ name: 'report.txt', type: 'file', size: 1024, facts: { size: '1024', type: 'file' } }]
 * ```
 */
export function parseStructuredListing(
  lines: Iterable<string>,
  options: ListingParseOptions = {}
): ListingEntry[] {
  const logger = options.logger ?? getDefaultLogger();
  const entries: ListingEntry[] = [];

  for (const line of lines) {
    const trimmed = line.trim();
    if (!trimmed) continue;

    const separator = trimmed.search(/\s/);
    if (separator === -1) {
      logger.warn({ line, reason: 'missing name' }, 'Skipping unparsable MLSD line');
      continue;
    }

    const facts = parseFacts(trimmed.slice(0, separator));
    if (!facts) {
      logger.warn({ line, reason: 'fact without "="' }, 'Skipping unparsable MLSD line');
      continue;
    }

    entries.push(buildStructuredEntry(trimmed.slice(separator + 1), facts));
  }

  return entries;
}

function parseFacts(text: string): Record<string, string> | null {
  // Null prototype so that a `__proto__` fact is stored like any other
  const facts: Record<string, string> = Object.create(null);

  for (const fact of text.split(';')) {
    if (!fact) continue;

    const eq = fact.indexOf('=');
    if (eq === -1) return null;

    facts[fact.slice(0, eq).toLowerCase()] = fact.slice(eq + 1);
  }

  return facts;
}

function buildStructuredEntry(name: string, facts: Record<string, string>): ListingEntry {
  const typeFact = facts.type?.toLowerCase();
  const type: ListingEntryType = typeFact === 'file'
    ? 'file'
    : typeFact !== undefined && DIRECTORY_TYPES.has(typeFact) ? 'dir' : 'unknown';

  const sizeFact = facts.size ?? facts.sizd;
  const modified = facts.modify;
  const modifiedAt = modified !== undefined ? parseFactTimestamp(modified) : undefined;

  return Object.freeze({
    name,
    type,
    ...(sizeFact !== undefined && /^\d+$/.test(sizeFact) && { size: parseInt(sizeFact, 10) }),
    ...(facts.perm !== undefined && { permissions: facts.perm }),
    ...(facts['unix.owner'] !== undefined && { owner: facts['unix.owner'] }),
    ...(facts['unix.group'] !== undefined && { group: facts['unix.group'] }),
    ...(modified !== undefined && { modified }),
    ...(modifiedAt && { modifiedAt }),
    facts: Object.freeze(facts),
  });
}

/**
 * Decode an MLSD time value (`YYYYMMDDHHMMSS[.sss]`, always UTC)
 */
export function parseFactTimestamp(value: string): Date | undefined {
  const match = value.match(/^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})(?:\.(\d{1,3}))?$/);
  if (!match) return undefined;

  const [, year, month, day, hours, minutes, seconds, fraction] = match;
  const millis = fraction ? parseInt(fraction.padEnd(3, '0'), 10) : 0;
  const date = new Date(Date.UTC(
    parseInt(year, 10),
    parseInt(month, 10) - 1,
    parseInt(day, 10),
    parseInt(hours, 10),
    parseInt(minutes, 10),
    parseInt(seconds, 10),
    millis
  ));

  return Number.isNaN(date.getTime()) ? undefined : date;
}

// ============================================================================
// LIST (Unix format)
// ============================================================================

// drwxr-xr-x 2 user group 4096 Jan 1 12:00 filename
const UNIX_LINE = /^([-dlbcps])([-rwxsStTl]{9})[+@.]?\s+(\d+)\s+(\S+)\s+(\S+)\s+(\d+)\s+(\w{3}\s+\d{1,2}\s+[\d:]+)\s+(.+)$/;

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

/**
 * Parse Unix-style LIST lines into entries
 *
 * @example
 * ```typescript
 * parseTextListing(['drwxr-xr-x 2 user group 4096 Jan 1 12:00 mydir']);
 * // [{ name: 'mydir', type: 'dir', permissions: 'rwxr-xr-x', links: 2, ... }]
 * ```
 */
export function parseTextListing(
  lines: Iterable<string>,
  options: ListingParseOptions = {}
): ListingEntry[] {
  const logger = options.logger ?? getDefaultLogger();
  const now = options.now ?? new Date();
  const entries: ListingEntry[] = [];

  for (const line of lines) {
    if (!line.trim()) continue;

    // Lines split on LF alone still carry the CR of a CRLF payload
    const match = line.replace(/[\r\n]+$/, '').match(UNIX_LINE);
    if (!match) {
      logger.debug({ line }, 'Not a Unix listing line');
      entries.push(Object.freeze({ name: line.trim(), type: 'unknown' as const }));
      continue;
    }

    const [, typeChar, permissions, links, owner, group, size, date, name] = match;
    const mode = parsePermissions(permissions);
    const modifiedAt = parseListDate(date, now);

    entries.push(Object.freeze({
      name,
      type: typeChar === 'd' ? 'dir' as const : 'file' as const,
      size: parseInt(size, 10),
      permissions,
      ...(mode !== undefined && { mode }),
      links: parseInt(links, 10),
      owner,
      group,
      modified: date,
      ...(modifiedAt && { modifiedAt }),
    }));
  }

  return entries;
}

/**
 * Decode a LIST date column (`Jan 1 12:00` or `Jan 1 2024`) as UTC
 *
 * A date without a year is placed in the most recent year that keeps it
 * from being in the future relative to `now`.
 */
export function parseListDate(rawDate: string, now: Date = new Date()): Date | undefined {
  const parts = rawDate.trim().split(/\s+/);
  if (parts.length !== 3) return undefined;

  const [monthName, dayText, timeOrYear] = parts;
  const month = MONTHS.indexOf(monthName.toLowerCase());
  const day = parseInt(dayText, 10);
  if (month === -1 || !(day >= 1 && day <= 31)) return undefined;

  const time = timeOrYear.match(/^(\d{1,2}):(\d{2})$/);
  if (time) {
    const hours = parseInt(time[1], 10);
    const minutes = parseInt(time[2], 10);
    let year = now.getUTCFullYear();
    if (Date.UTC(year, month, day, hours, minutes) > now.getTime()) {
      year--;
    }
    return calendarDate(year, month, day, hours, minutes);
  }

  if (/^\d{4}$/.test(timeOrYear)) {
    return calendarDate(parseInt(timeOrYear, 10), month, day, 0, 0);
  }

  return undefined;
}

// Date.UTC rolls Feb 30 over into March; such days are rejected instead
function calendarDate(year: number, month: number, day: number, hours: number, minutes: number): Date | undefined {
  const date = new Date(Date.UTC(year, month, day, hours, minutes));
  return date.getUTCMonth() === month && date.getUTCDate() === day ? date : undefined;
}

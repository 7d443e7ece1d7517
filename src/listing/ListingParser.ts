import { Archive, ArchiveFamilies } from '../types/Archive';
import { PruneError } from '../types/PruneError';

export class InvalidListingLineError extends PruneError {
  constructor(
    public readonly line: string,
    reason: string
  ) {
    super(`failed to parse line '${line}': ${reason}`, 'listing');
    this.name = 'InvalidListingLineError';
  }
}

const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

// Lazy name, then an optional "-<digits and dashes>" tail anchored at the end
const BASE_NAME_PATTERN = /^(.*?)(?:-[0-9-]*)?$/s;

/**
 * Parse the verbose archive listing and group the archives by base name.
 * Any malformed line fails the whole listing.
 */
export function parseListing(listing: string): ArchiveFamilies {
  const families: ArchiveFamilies = new Map();

  for (const line of splitLines(listing)) {
    const archive = parseArchiveLine(line);
    const baseName = archiveBaseName(archive.name);
    const family = families.get(baseName);
    if (family) {
      family.push(archive);
    } else {
      families.set(baseName, [archive]);
    }
  }

  return families;
}

/**
 * Parse one `name<TAB>YYYY-MM-DD HH:MM:SS` line
 */
export function parseArchiveLine(line: string): Archive {
  const fields = line.split('\t');
  if (fields.length !== 2) {
    throw new InvalidListingLineError(line, `expected 2 tab-separated fields, got ${fields.length}`);
  }

  const [name, timestampText] = fields;
  const timestamp = parseListingTimestamp(timestampText);
  if (!timestamp) {
    throw new InvalidListingLineError(line, `invalid timestamp '${timestampText}'`);
  }

  return { name, timestamp };
}

/**
 * Parse `YYYY-MM-DD HH:MM:SS` as UTC; null unless it names a real instant
 */
export function parseListingTimestamp(text: string): Date | null {
  const match = TIMESTAMP_PATTERN.exec(text);
  if (!match) {
    return null;
  }

  const [year, month, day, hour, minute, second] = match.slice(1).map(Number);
  const date = new Date(Date.UTC(2000, 0, 1, hour, minute, second));
  // Date.UTC maps years 0-99 onto 1900-1999
  date.setUTCFullYear(year, month - 1, day);

  // Overflowing fields roll over (Feb 30 -> Mar 1), reject those
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute ||
    date.getUTCSeconds() !== second
  ) {
    return null;
  }

  return date;
}

/**
 * Strip a trailing `-<digits and dashes>` run: "name-20200101-1200" -> "name"
 */
export function archiveBaseName(name: string): string {
  const match = BASE_NAME_PATTERN.exec(name);
  return match ? match[1] : name;
}

function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

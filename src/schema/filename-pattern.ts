/**
 * Filename patterns for artifacts.
 *
 * A pattern is literal text with exactly one `{logicalId}` and one
 * `{timestamp}` placeholder, e.g. "{timestamp} {logicalId} report.json".
 *
 * Logical ids are written URI-component encoded and timestamps are digits,
 * so neither can contain a character that `encodeURIComponent` escapes. The
 * literal text between the two placeholders must contain at least one such
 * separator character. Together these make rendering injective: every
 * separator-delimited token holds at most one placeholder, so a filename
 * determines both of its values. `parse` relies on this to invert it.
 */

import {
  parseTimestamp,
  timestampPattern,
  type Timestamp,
  type TimestampFormat,
} from "../timestamp/index.js";

const LOGICAL_ID = "{logicalId}";
const TIMESTAMP = "{timestamp}";

/** Characters an encoded logical id may contain (after encodeURIComponent). */
const ENCODED_ID_CLASS = "[A-Za-z0-9\\-_.!~*'()%]+";

function countOccurrences(text: string, needle: string): number {
  return text.split(needle).length - 1;
}

function isSeparator(ch: string): boolean {
  return ch !== "/" && ch !== "%" && encodeURIComponent(ch) !== ch;
}

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Problems with a pattern, empty when it is usable.
 */
export function filenamePatternIssues(pattern: string): string[] {
  const issues: string[] = [];

  if (pattern.includes("/")) {
    issues.push("must not contain '/'");
  }
  const idCount = countOccurrences(pattern, LOGICAL_ID);
  const tsCount = countOccurrences(pattern, TIMESTAMP);
  if (idCount !== 1) {
    issues.push(`must contain ${LOGICAL_ID} exactly once (found ${idCount})`);
  }
  if (tsCount !== 1) {
    issues.push(`must contain ${TIMESTAMP} exactly once (found ${tsCount})`);
  }
  if (issues.length > 0) {
    return issues;
  }

  const idAt = pattern.indexOf(LOGICAL_ID);
  const tsAt = pattern.indexOf(TIMESTAMP);
  const between =
    idAt < tsAt
      ? pattern.slice(idAt + LOGICAL_ID.length, tsAt)
      : pattern.slice(tsAt + TIMESTAMP.length, idAt);
  if (![...between].some(isSeparator)) {
    issues.push(
      `text between ${LOGICAL_ID} and ${TIMESTAMP} must contain a separator such as ' ' or '@' (got "${between}")`
    );
  }

  return issues;
}

export interface ParsedFilename {
  logicalId: string;
  timestamp: Timestamp;
}

/**
 * A validated, compiled filename pattern.
 */
export class FilenamePattern {
  private readonly matcher: RegExp;
  private readonly idFirst: boolean;

  constructor(
    readonly pattern: string,
    private readonly format: TimestampFormat
  ) {
    const issues = filenamePatternIssues(pattern);
    if (issues.length > 0) {
      throw new TypeError(`Invalid filename pattern "${pattern}": ${issues.join("; ")}`);
    }

    this.idFirst = pattern.indexOf(LOGICAL_ID) < pattern.indexOf(TIMESTAMP);
    const source = pattern
      .split(LOGICAL_ID)
      .map((part) =>
        part
          .split(TIMESTAMP)
          .map(escapeRegex)
          .join(`(${timestampPattern(format)})`)
      )
      .join(`(${ENCODED_ID_CLASS})`);
    this.matcher = new RegExp(`^${source}$`);
  }

  render(logicalId: string, timestamp: string): string {
    return this.pattern
      .replace(LOGICAL_ID, encodeURIComponent(logicalId))
      .replace(TIMESTAMP, timestamp);
  }

  /**
   * Invert `render`. Returns null for names this pattern did not produce.
   */
  parse(filename: string): ParsedFilename | null {
    const match = this.matcher.exec(filename);
    if (!match) {
      return null;
    }
    const [, first, second] = match;
    const encodedId = this.idFirst ? first : second;
    const timestampText = this.idFirst ? second : first;
    if (encodedId === undefined || timestampText === undefined) {
      return null;
    }
    try {
      return {
        logicalId: decodeURIComponent(encodedId),
        timestamp: parseTimestamp(timestampText, this.format),
      };
    } catch {
      return null;
    }
  }
}

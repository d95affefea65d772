import type { Commit } from '@/commit';
import { config } from '@/config';
import type { CommitMessageParser, CommitParserOptions, ParseResult, ReleaseType } from '@/types';
import { BUMP_LEVELS, BUMP_SEVERITY } from '@/utils/constants';
import { debug, warning } from '@actions/core';
import { CommitParser } from 'conventional-commits-parser';

/**
 * Header parser for the Angular commit convention: `<type>[(<scope>)][!]: <subject>`.
 *
 * - `headerPattern` captures the `!` marker as its own group so a bang-style breaking change is
 *   visible on the parsed result as `breaking: '!'`. We deliberately do not set
 *   `breakingHeaderPattern`: the library would turn the subject into a synthetic note, and
 *   breaking descriptions are only ever taken from explicit `BREAKING CHANGE:` paragraphs.
 * - The scope and subject must be non-empty, otherwise the header does not match at all.
 * - Only the first line is ever handed to it, so body lines cannot be read as fields or notes.
 */
const headerParser = new CommitParser({
  headerPattern: /^(\w*)(?:\((.+)\))?(!)?: (.+)$/,
  headerCorrespondence: ['type', 'scope', 'breaking', 'subject'],
});

const BREAKING_PARAGRAPH_REGEX = /^BREAKING[ -]CHANGE: (.*)$/;

/**
 * Splits commit body text into paragraphs.
 *
 * Paragraphs are separated by a blank line. Empty paragraphs are dropped and the single line
 * breaks inside a paragraph are folded into spaces.
 *
 * @param {string} text - Body text following the header's blank line
 * @returns {string[]} The non-empty paragraphs in order
 */
export function parseParagraphs(text: string): string[] {
  return text
    .split('\n\n')
    .filter((paragraph) => paragraph.length > 0)
    .map((paragraph) => paragraph.replace(/\n/g, ' '));
}

/**
 * Builds a commit message parser bound to a set of commit types.
 *
 * @param {CommitParserOptions} options - Accepted types and the types that bump minor / patch
 * @returns {CommitMessageParser} A pure parser; it never throws for malformed messages
 *
 * @example
 * ```typescript
 * const parse = createCommitParser({ allowedTypes: ['feat', 'fix'], minorTypes: ['feat'], patchTypes: ['fix'] });
 * parse('feat(api)!: drop v1 routes');
 * // → { recognized: true, commit: { type: 'feat', scope: 'api', descriptions: ['drop v1 routes'],
 * //                                  breakingDescriptions: [], bump: 3 } }
 * parse('update readme');
 * // → { recognized: false, reason: 'header does not match <type>[(<scope>)][!]: <subject>' }
 * ```
 */
export function createCommitParser(options: CommitParserOptions): CommitMessageParser {
  const { allowedTypes, minorTypes, patchTypes } = options;

  return (message: string): ParseResult => {
    const trimmed = message.trim();
    if (!trimmed) {
      return { recognized: false, reason: 'empty message' };
    }

    const [header] = trimmed.split('\n');
    const { type, scope, breaking, subject } = headerParser.parse(header);

    if (!type || !subject) {
      return { recognized: false, reason: 'header does not match <type>[(<scope>)][!]: <subject>' };
    }
    if (!allowedTypes.includes(type)) {
      return { recognized: false, reason: `type '${type}' is not one of: ${allowedTypes.join(', ')}` };
    }

    // The body only counts when it is separated from the header by a blank line.
    const rest = trimmed.slice(header.length);
    const paragraphs = rest.startsWith('\n\n') ? parseParagraphs(rest.slice(2)) : [];

    const breakingDescriptions: string[] = [];
    for (const paragraph of paragraphs) {
      const match = BREAKING_PARAGRAPH_REGEX.exec(paragraph);
      if (match) {
        breakingDescriptions.push(match[1]);
      }
    }

    let bump: number = breaking || breakingDescriptions.length > 0 ? BUMP_SEVERITY.MAJOR : BUMP_SEVERITY.NONE;
    if (minorTypes.includes(type)) {
      bump = Math.max(bump, BUMP_SEVERITY.MINOR);
    } else if (patchTypes.includes(type)) {
      bump = Math.max(bump, BUMP_SEVERITY.PATCH);
    }

    return {
      recognized: true,
      commit: {
        type,
        scope: scope ?? null,
        descriptions: [subject, ...paragraphs],
        breakingDescriptions,
        bump,
      },
    };
  };
}

/**
 * Parses a commit message using the commit types from the global `config` singleton.
 *
 * @param {string} message - The normalized commit message
 * @returns {ParseResult} The structured record, or `recognized: false` when the message does not
 *   follow the convention
 */
export function parseCommitMessage(message: string): ParseResult {
  return createCommitParser(config)(message);
}

/**
 * Reduces a list of commits to the single release type they call for.
 *
 * Each commit is parsed; unrecognized commits and commits with no bump are ignored. A severity
 * outside of `BUMP_LEVELS` (only possible with a custom parser) is reported as a warning and
 * ignored as well. The highest remaining severity decides the result, so the order of the
 * commits does not matter.
 *
 * @param {ReadonlyArray<Commit>} commits - Commits since the last release
 * @param {CommitMessageParser} parser - Defaults to a parser built from `config`
 * @returns {ReleaseType | null} The release type, or `null` when no commit warrants a release
 *
 * @example
 * ```typescript
 * evaluateVersionBump([new Commit('a1', 'fix: typo'), new Commit('b2', 'feat: add login')]);
 * // → 'minor'
 * ```
 */
export function evaluateVersionBump(
  commits: ReadonlyArray<Commit>,
  parser: CommitMessageParser = createCommitParser(config),
): ReleaseType | null {
  let highest: number | null = null;

  for (const commit of commits) {
    const result = parser(commit.message);
    if (!result.recognized) {
      debug(`Skipping ${commit}: ${result.reason}`);
      continue;
    }

    const { bump } = result.commit;
    if (bump === BUMP_SEVERITY.NONE) {
      continue;
    }
    if (!(bump in BUMP_LEVELS)) {
      warning(`Unknown bump level ${bump} for ${commit}`);
      continue;
    }

    highest = highest === null ? bump : Math.max(highest, bump);
  }

  return highest === null ? null : BUMP_LEVELS[highest];
}

import type { Commit } from '@/commit';
import { createCommitParser } from '@/commit-analyzer';
import { config } from '@/config';
import type { ChangelogEntry, CommitMessageParser, RenderChangelogOptions } from '@/types';
import { BREAKING_SECTION, BUMP_SEVERITY, VERSION_TAG_PREFIX } from '@/utils/constants';
import { capitalizeFirstLetter } from '@/utils/string';

/**
 * Thrown when a parsed commit has an empty first description. A parser must never produce one,
 * so this signals a broken parser rather than a bad commit.
 */
export class InvalidParsedCommitError extends Error {
  constructor(public readonly sha: string) {
    super(`Parsed commit ${sha} has an empty first description`);
    this.name = 'InvalidParsedCommitError';
  }
}

/**
 * Changelog entries grouped by commit type.
 *
 * Sections keep the order in which they were first added; the reserved `breaking` section always
 * exists and always comes first. Entries inside a section keep insertion order.
 */
export class ChangelogIndex implements Iterable<[string, ReadonlyArray<ChangelogEntry>]> {
  private readonly order: string[] = [BREAKING_SECTION];
  private readonly entries = new Map<string, ChangelogEntry[]>([[BREAKING_SECTION, []]]);

  /**
   * Appends an entry to a section, creating the section at the end of the order if needed.
   */
  public add(section: string, entry: ChangelogEntry): void {
    let list = this.entries.get(section);
    if (list === undefined) {
      list = [];
      this.entries.set(section, list);
      this.order.push(section);
    }
    list.push(entry);
  }

  /**
   * Entries of a section; empty when the section does not exist.
   */
  public get(section: string): ReadonlyArray<ChangelogEntry> {
    return this.entries.get(section) ?? [];
  }

  public has(section: string): boolean {
    return this.entries.has(section);
  }

  public get sections(): ReadonlyArray<string> {
    return [...this.order];
  }

  public get breaking(): ReadonlyArray<ChangelogEntry> {
    return this.get(BREAKING_SECTION);
  }

  public *[Symbol.iterator](): Iterator<[string, ReadonlyArray<ChangelogEntry>]> {
    for (const section of this.order) {
      yield [section, this.get(section)];
    }
  }

  public toJSON(): Record<string, ChangelogEntry[]> {
    return Object.fromEntries(this.order.map((section) => [section, [...this.get(section)]]));
  }
}

/**
 * Groups commits by type into a {@link ChangelogIndex}.
 *
 * Every recognized commit contributes its capitalized first description to the section named
 * after its type. Breaking changes are also listed under `breaking`: each `BREAKING CHANGE:`
 * paragraph when the commit has any, otherwise the first description as written, when the commit
 * is of major severity (e.g. `feat!: ...` without a footer).
 *
 * @param {ReadonlyArray<Commit>} commits - Commits since the last release, newest first
 * @param {CommitMessageParser} parser - Defaults to a parser built from `config`
 * @returns {ChangelogIndex} The grouped changelog
 * @throws {InvalidParsedCommitError} If the parser yields an empty first description
 */
export function generateChangelog(
  commits: ReadonlyArray<Commit>,
  parser: CommitMessageParser = createCommitParser(config),
): ChangelogIndex {
  const changelog = new ChangelogIndex();

  for (const { sha, message } of commits) {
    const result = parser(message);
    if (!result.recognized) {
      continue;
    }

    const { type, descriptions, breakingDescriptions, bump } = result.commit;
    const [summary] = descriptions;
    if (!summary) {
      throw new InvalidParsedCommitError(sha);
    }

    changelog.add(type, { sha, description: capitalizeFirstLetter(summary) });

    if (breakingDescriptions.length > 0) {
      for (const paragraph of breakingDescriptions) {
        changelog.add(BREAKING_SECTION, { sha, description: paragraph });
      }
    } else if (bump === BUMP_SEVERITY.MAJOR) {
      changelog.add(BREAKING_SECTION, { sha, description: summary });
    }
  }

  return changelog;
}

/**
 * Renders a changelog as Markdown release notes.
 *
 * Empty sections are left out entirely, including `breaking`.
 *
 * @param {string} version - The version being released, without prefix
 * @param {ChangelogIndex} changelog - The grouped changelog
 * @param {RenderChangelogOptions} options - Set `header` to start with a `## v<version>` heading
 * @returns {string} The Markdown text
 *
 * @example
 * ```typescript
 * renderMarkdownChangelog('1.3.0', changelog, { header: true });
 * // ## v1.3.0
 * //
 * // ### Feat
 * // * Add login (0a1b2c3d4e5f)
 * ```
 */
export function renderMarkdownChangelog(
  version: string,
  changelog: ChangelogIndex,
  options: RenderChangelogOptions = {},
): string {
  let output = options.header ? `## ${VERSION_TAG_PREFIX}${version}\n` : '';

  for (const [section, entries] of changelog) {
    if (entries.length === 0) {
      continue;
    }

    output += `\n### ${capitalizeFirstLetter(section)}\n`;
    for (const { sha, description } of entries) {
      output += `* ${description} (${sha})\n`;
    }
  }

  return output;
}

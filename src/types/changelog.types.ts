/**
 * A single changelog line, attributed to the commit that produced it.
 */
export interface ChangelogEntry {
  sha: string;
  description: string;
}

/**
 * Options for rendering a changelog as Markdown.
 */
export interface RenderChangelogOptions {
  /** Prepend a `## v<version>` heading. */
  header?: boolean;
}

import type { BumpSeverity } from '@/types/common.types';

/**
 * Types for the commit analyzer module.
 */

/**
 * Structured view of a single conventional commit message.
 */
export interface ParsedCommit {
  /** The commit type (e.g., 'feat', 'fix', 'chore') */
  type: string;
  /** The optional scope (e.g., 'parser', 'api') without parentheses */
  scope: string | null;
  /** The header subject followed by each non-empty body paragraph. Never empty. */
  descriptions: string[];
  /** Text of every `BREAKING CHANGE:` paragraph in the body, in order */
  breakingDescriptions: string[];
  /** Bump severity derived from the type and breaking-change markers */
  bump: BumpSeverity;
}

/**
 * Outcome of parsing a commit message. Unrecognized messages are an expected outcome,
 * not an error, so callers branch on `recognized` instead of catching.
 */
export type ParseResult = { recognized: true; commit: ParsedCommit } | { recognized: false; reason: string };

/**
 * Type lists controlling which commit types are accepted and how much they bump.
 */
export interface CommitParserOptions {
  allowedTypes: ReadonlyArray<string>;
  minorTypes: ReadonlyArray<string>;
  patchTypes: ReadonlyArray<string>;
}

/**
 * Function signature of a commit message parser. The evaluator and changelog builder accept
 * any parser of this shape.
 */
export type CommitMessageParser = (message: string) => ParseResult;

import { Commit } from '@/commit';
import { createCommitParser, evaluateVersionBump, parseCommitMessage, parseParagraphs } from '@/commit-analyzer';
import { config } from '@/mocks/config';
import type { CommitMessageParser, ParseResult } from '@/types';
import { DEFAULT_ALLOWED_TYPES, DEFAULT_MINOR_TYPES, DEFAULT_PATCH_TYPES, RELEASE_TYPE } from '@/utils/constants';
import { debug, warning } from '@actions/core';
import { describe, expect, it, vi } from 'vitest';

const parse = createCommitParser({
  allowedTypes: DEFAULT_ALLOWED_TYPES,
  minorTypes: DEFAULT_MINOR_TYPES,
  patchTypes: DEFAULT_PATCH_TYPES,
});

const HEADER_MISMATCH = 'header does not match <type>[(<scope>)][!]: <subject>';

describe('commit-analyzer', () => {
  describe('parseParagraphs', () => {
    it('should split on blank lines and fold single line breaks', () => {
      expect(parseParagraphs('First line\nstill first\n\nSecond')).toEqual(['First line still first', 'Second']);
    });

    it('should drop empty paragraphs', () => {
      expect(parseParagraphs('\n\nOne\n\n\n\nTwo\n\n')).toEqual(['One', 'Two']);
    });

    it('should return an empty list for empty text', () => {
      expect(parseParagraphs('')).toEqual([]);
    });
  });

  describe('createCommitParser', () => {
    it('should parse type, scope and subject', () => {
      expect(parse('feat(api): add login')).toEqual({
        recognized: true,
        commit: {
          type: 'feat',
          scope: 'api',
          descriptions: ['add login'],
          breakingDescriptions: [],
          bump: 2,
        },
      });
    });

    it('should parse a header without a scope', () => {
      expect(parse('fix: handle empty input')).toEqual({
        recognized: true,
        commit: {
          type: 'fix',
          scope: null,
          descriptions: ['handle empty input'],
          breakingDescriptions: [],
          bump: 1,
        },
      });
    });

    it('should treat the bang marker as a major change without a breaking description', () => {
      expect(parse('feat(api)!: drop v1 routes')).toEqual({
        recognized: true,
        commit: {
          type: 'feat',
          scope: 'api',
          descriptions: ['drop v1 routes'],
          breakingDescriptions: [],
          bump: 3,
        },
      });
    });

    it('should collect body paragraphs and breaking change paragraphs', () => {
      const result = parse(
        'fix: reject nulls\n\nThe parser crashed\non empty input.\n\nBREAKING CHANGE: null values are now rejected',
      );

      expect(result).toEqual({
        recognized: true,
        commit: {
          type: 'fix',
          scope: null,
          descriptions: [
            'reject nulls',
            'The parser crashed on empty input.',
            'BREAKING CHANGE: null values are now rejected',
          ],
          breakingDescriptions: ['null values are now rejected'],
          bump: 3,
        },
      });
    });

    it('should accept the hyphenated breaking change keyword', () => {
      const result = parse('refactor: rename option\n\nBREAKING-CHANGE: `foo` is now `bar`');

      expect(result.recognized && result.commit.breakingDescriptions).toEqual(['`foo` is now `bar`']);
      expect(result.recognized && result.commit.bump).toBe(3);
    });

    it('should require a space after the breaking change colon', () => {
      const result = parse('feat: add x\n\nBREAKING CHANGE:no space');

      expect(result.recognized && result.commit.breakingDescriptions).toEqual([]);
      expect(result.recognized && result.commit.bump).toBe(2);
    });

    it('should ignore the body when it is not separated by a blank line', () => {
      const result = parse('fix: crash\nBREAKING CHANGE: not a paragraph');

      expect(result).toEqual({
        recognized: true,
        commit: {
          type: 'fix',
          scope: null,
          descriptions: ['crash'],
          breakingDescriptions: [],
          bump: 1,
        },
      });
    });

    it('should not read field-like body lines as header fields', () => {
      expect(parse('docs: tidy\n\n-breaking-\nnot really')).toEqual({
        recognized: true,
        commit: {
          type: 'docs',
          scope: null,
          descriptions: ['tidy', '-breaking- not really'],
          breakingDescriptions: [],
          bump: 0,
        },
      });
      expect(parse('docs: x\n\n-type-\nfeat')).toEqual({
        recognized: true,
        commit: { type: 'docs', scope: null, descriptions: ['x', '-type- feat'], breakingDescriptions: [], bump: 0 },
      });
    });

    it('should give a zero bump to types that are neither minor nor patch', () => {
      for (const message of ['docs: update readme', 'chore: bump deps', 'style: format', 'test: add cases']) {
        const result = parse(message);
        expect(result.recognized && result.commit.bump).toBe(0);
      }
    });

    it('should give a patch bump to perf commits', () => {
      const result = parse('perf: cache lookups');
      expect(result.recognized && result.commit.bump).toBe(1);
    });

    it('should trim surrounding whitespace before parsing', () => {
      const result = parse('\n\n  feat: add login\n\n');
      expect(result.recognized && result.commit.descriptions).toEqual(['add login']);
    });

    it.each<[string, ParseResult]>([
      ['', { recognized: false, reason: 'empty message' }],
      ['  \n\n ', { recognized: false, reason: 'empty message' }],
      ['Update readme', { recognized: false, reason: HEADER_MISMATCH }],
      ['feat:missing space', { recognized: false, reason: HEADER_MISMATCH }],
      ['feat(): empty scope', { recognized: false, reason: HEADER_MISMATCH }],
      ['feat: ', { recognized: false, reason: HEADER_MISMATCH }],
      [': no type', { recognized: false, reason: HEADER_MISMATCH }],
      [
        'feature: add login',
        {
          recognized: false,
          reason: "type 'feature' is not one of: feat, fix, test, docs, style, refactor, build, ci, perf, chore",
        },
      ],
      [
        'Feat: add login',
        {
          recognized: false,
          reason: "type 'Feat' is not one of: feat, fix, test, docs, style, refactor, build, ci, perf, chore",
        },
      ],
    ])('should not recognize %j', (message, expected) => {
      expect(parse(message)).toEqual(expected);
    });

    it('should be idempotent', () => {
      const message = 'feat(ui)!: new layout\n\nMoves the sidebar.\n\nBREAKING CHANGE: sidebar ids changed';
      expect(parse(message)).toEqual(parse(message));
    });

    it('should honor custom type lists', () => {
      const custom = createCommitParser({ allowedTypes: ['feature', 'bugfix'], minorTypes: ['feature'], patchTypes: [] });

      expect(custom('feature: add login')).toEqual({
        recognized: true,
        commit: { type: 'feature', scope: null, descriptions: ['add login'], breakingDescriptions: [], bump: 2 },
      });
      expect(custom('bugfix: crash')).toEqual({
        recognized: true,
        commit: { type: 'bugfix', scope: null, descriptions: ['crash'], breakingDescriptions: [], bump: 0 },
      });
      expect(custom('feat: add login').recognized).toBe(false);
    });
  });

  describe('parseCommitMessage', () => {
    it('should use the configured commit types', () => {
      config.set({ allowedTypes: ['feat', 'fix', 'hotfix'], patchTypes: ['fix', 'hotfix'] });

      const result = parseCommitMessage('hotfix: restore login');
      expect(result.recognized && result.commit.bump).toBe(1);
    });
  });

  describe('evaluateVersionBump', () => {
    it('should return null for no commits', () => {
      expect(evaluateVersionBump([], parse)).toBeNull();
    });

    it('should return null when no commit warrants a release', () => {
      const commits = [new Commit('a1', 'docs: update readme'), new Commit('b2', 'chore: tidy')];
      expect(evaluateVersionBump(commits, parse)).toBeNull();
    });

    it('should return the highest release type', () => {
      const commits = [new Commit('a1', 'fix: typo'), new Commit('b2', 'feat: add login'), new Commit('c3', 'docs: x')];
      expect(evaluateVersionBump(commits, parse)).toBe(RELEASE_TYPE.MINOR);
    });

    it('should return patch for fixes only', () => {
      expect(evaluateVersionBump([new Commit('a1', 'fix: typo')], parse)).toBe(RELEASE_TYPE.PATCH);
    });

    it('should return major for a breaking change', () => {
      const commits = [
        new Commit('a1', 'fix: typo'),
        new Commit('b2', 'chore: drop node 18\n\nBREAKING CHANGE: node 20 is required'),
      ];
      expect(evaluateVersionBump(commits, parse)).toBe(RELEASE_TYPE.MAJOR);
    });

    it('should not bump for a breaking field line in the body', () => {
      expect(evaluateVersionBump([new Commit('a1', 'docs: tidy\n\n-breaking-\nnot really')], parse)).toBeNull();
    });

    it('should not depend on commit order', () => {
      const commits = [
        new Commit('a1', 'fix: typo'),
        new Commit('b2', 'feat!: new api'),
        new Commit('c3', 'feat: add login'),
      ];

      expect(evaluateVersionBump(commits, parse)).toBe(RELEASE_TYPE.MAJOR);
      expect(evaluateVersionBump([...commits].reverse(), parse)).toBe(RELEASE_TYPE.MAJOR);
      expect(evaluateVersionBump([commits[2], commits[0], commits[1]], parse)).toBe(RELEASE_TYPE.MAJOR);
    });

    it('should skip unrecognized commits with a debug message', () => {
      const commits = [new Commit('0a1b2c3d4e5f', 'Update readme'), new Commit('b2', 'fix: typo')];

      expect(evaluateVersionBump(commits, parse)).toBe(RELEASE_TYPE.PATCH);
      expect(debug).toHaveBeenCalledWith(`Skipping Commit(sha='0a1b2c3d', message='Update readme'): ${HEADER_MISMATCH}`);
    });

    it('should warn about severities without a release type', () => {
      const customParser: CommitMessageParser = vi.fn((message: string): ParseResult => ({
        recognized: true,
        commit: { type: 'feat', scope: null, descriptions: [message], breakingDescriptions: [], bump: 7 },
      }));

      expect(evaluateVersionBump([new Commit('a1', 'anything')], customParser)).toBeNull();
      expect(warning).toHaveBeenCalledWith("Unknown bump level 7 for Commit(sha='a1', message='anything')");
    });

    it('should use the configured commit types by default', () => {
      config.set({ minorTypes: [] });
      expect(evaluateVersionBump([new Commit('a1', 'feat: add login')])).toBeNull();

      config.set({ minorTypes: ['feat'] });
      expect(evaluateVersionBump([new Commit('a1', 'feat: add login')])).toBe(RELEASE_TYPE.MINOR);
    });
  });
});

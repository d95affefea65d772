import { shortSha } from '@/utils/string';

/**
 * Converts every carriage-return line ending (`\r\n` or a lone `\r`) into `\n`.
 *
 * @param {string} message - Raw commit message as returned by the API.
 * @returns {string} The message using `\n` line endings only.
 */
export function normalizeLineEndings(message: string): string {
  return message.replace(/\r\n?/g, '\n');
}

/**
 * An immutable commit: its SHA and its line-ending-normalized message.
 */
export class Commit {
  public readonly sha: string;
  public readonly message: string;

  constructor(sha: string, message: string) {
    this.sha = sha;
    this.message = normalizeLineEndings(message);
    Object.freeze(this);
  }

  /**
   * Compact single-line form used in logs, e.g. `Commit(sha='0a1b2c3d', message='feat: add login')`.
   */
  public toString(): string {
    const [firstLine] = this.message.split('\n');
    return `Commit(sha='${shortSha(this.sha)}', message='${firstLine}')`;
  }
}

/**
 * Uppercases the first character of a string and leaves the rest untouched.
 *
 * @param {string} input - The string to capitalize
 * @returns {string} The string with its first character uppercased
 *
 * @example
 * // Returns "Add OAuth login"
 * capitalizeFirstLetter("add OAuth login")
 */
export function capitalizeFirstLetter(input: string): string {
  return input.charAt(0).toUpperCase() + input.slice(1);
}

/**
 * Shortens a commit SHA to its first eight characters for display.
 *
 * @param {string} sha - Full commit SHA
 * @returns {string} The abbreviated SHA
 */
export function shortSha(sha: string): string {
  return sha.slice(0, 8);
}

/**
 * Git reference-name rules (see git-check-ref-format).
 */

export const R_HEADS = "refs/heads/";
export const R_TAGS = "refs/tags/";
export const R_REMOTES = "refs/remotes/";

/**
 * Check if a ref name is valid
 *
 * Rules:
 * - not empty, no leading or trailing "/" and no "//"
 * - no "..", no "@{", not ending with "." or ".lock"
 * - no path component starting with "."
 * - no control characters, space, or any of ~ ^ : ? * [ \
 *
 * Single-level names ("main", "HEAD") are accepted.
 */
export function isValidRefName(refName: string): boolean {
  if (refName.length === 0) return false;
  if (refName.startsWith("/") || refName.endsWith("/")) return false;
  if (refName.includes("//")) return false;
  if (refName.includes("..")) return false;
  if (refName.includes("@{")) return false;
  if (refName.endsWith(".") || refName.endsWith(".lock")) return false;
  if (refName.startsWith(".") || refName.includes("/.")) return false;

  // biome-ignore lint/suspicious/noControlCharactersInRegex: control characters are invalid in ref names
  const invalidChars = /[\x00-\x1f\x7f ~^:?*[\\]/;
  if (invalidChars.test(refName)) return false;

  return true;
}

/**
 * Check if a short branch name is valid.
 *
 * Same as {@link isValidRefName}, plus git's extra restrictions on branch names:
 * "@" alone and names starting with "-" are rejected.
 */
export function isValidBranchName(name: string): boolean {
  if (name === "@" || name.startsWith("-")) return false;
  return isValidRefName(name);
}

/**
 * Get short ref name for display
 *
 * @returns Short name (e.g., "main" instead of "refs/heads/main")
 */
export function shortenRefName(refName: string): string {
  for (const prefix of [R_HEADS, R_TAGS, R_REMOTES]) {
    if (refName.startsWith(prefix)) {
      return refName.substring(prefix.length);
    }
  }
  return refName;
}

/**
 * Converts CRLF and lone CR line endings to LF.
 */
export const normalizeLineEndings = (str: string): string => {
  return str.replace(/\r\n?/g, "\n");
};

/**
 * Shortens text to at most `maxLength` characters, cutting at the last word
 * boundary and appending an ellipsis when anything was removed.
 */
export const truncate = (str: string, maxLength: number): string => {
  if (str.length <= maxLength) return str;
  const cut = str.slice(0, Math.max(0, maxLength - 1));
  const lastSpace = cut.lastIndexOf(" ");
  return `${(lastSpace > maxLength / 2 ? cut.slice(0, lastSpace) : cut).trimEnd()}…`;
};

/**
 * Counts the non-overlapping matches of a global pattern.
 */
export const countMatches = (str: string, pattern: RegExp): number => {
  const flags = pattern.flags.includes("g") ? pattern.flags : `${pattern.flags}g`;
  return str.match(new RegExp(pattern.source, flags))?.length ?? 0;
};

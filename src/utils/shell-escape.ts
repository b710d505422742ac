/**
 * POSIX shell quoting for values placed on a `sh -c` command line.
 *
 * Single quotes suppress every expansion, so the only character that needs
 * care is the single quote itself: close the quoted run, emit `'` inside a
 * double-quoted run, then reopen (`'` → `'"'"'`).
 */

const QUOTE_BREAK = `'"'"'`;

/** Quote an arbitrary string as one shell word that expands to exactly that string */
export function escapeShellArg(value: string): string {
  if (value === '') {
    return "''";
  }
  return `'${value.split("'").join(QUOTE_BREAK)}'`;
}


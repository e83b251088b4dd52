const SAFE_WORD = /^[A-Za-z0-9_@%+=:,./-]+$/;

/**
 * Quote a string for a POSIX shell so it reaches the command as one literal
 * argument. Single quotes inside are closed, emitted as "'", and reopened.
 */
export function shellQuote(value: string): string {
  if (value.length === 0) return "''";
  if (SAFE_WORD.test(value)) return value;
  return `'${value.replace(/'/g, `'"'"'`)}'`;
}


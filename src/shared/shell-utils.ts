/**
 * Escapes a string for safe use as a single shell argument.
 * Wraps the value in single quotes and escapes embedded single quotes.
 */
export function escapeShellArg(arg: string): string {
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

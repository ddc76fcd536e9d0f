/**
 * Unix permission string helpers
 */

const EXECUTE_CHARS = new Set(['x', 's', 't']);

/**
 * Convert a nine-character permission string to its numeric mode
 *
 * `s` and `t` imply the execute bit; `S` and `T` do not.
 *
 * @example
 * ```typescript
 * parsePermissions('rwxr-xr--'); // 0o754
 * ```
 */
export function parsePermissions(permissions: string): number | undefined {
  if (permissions.length !== 9) return undefined;

  let mode = 0;
  for (let i = 0; i < 9; i += 3) {
    let triad = 0;
    if (permissions[i] === 'r') triad += 4;
    if (permissions[i + 1] === 'w') triad += 2;
    if (EXECUTE_CHARS.has(permissions[i + 2])) triad += 1;
    mode = mode * 8 + triad;
  }
  return mode;
}

/**
 * Render the low nine bits of a mode as `rwxr-xr-x`
 */
export function formatPermissions(mode: number): string {
  let result = '';
  for (const shift of [6, 3, 0]) {
    const triad = (mode >> shift) & 0o7;
    result += triad & 4 ? 'r' : '-';
    result += triad & 2 ? 'w' : '-';
    result += triad & 1 ? 'x' : '-';
  }
  return result;
}

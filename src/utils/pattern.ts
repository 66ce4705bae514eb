/**
 * Compile a file-name glob (`*` and `?` only) into an anchored RegExp.
 * `*.wiglecsv` matches "capture_20240101.wiglecsv" but not "a.wiglecsv.bak".
 */
export function globToRegExp(pattern: string): RegExp {
  let source = ''
  for (const ch of pattern) {
    if (ch === '*') source += '[^/]*'
    else if (ch === '?') source += '[^/]'
    else source += ch.replace(/[.+^${}()|[\]\\]/g, '\\$&')
  }
  return new RegExp(`^${source}$`)
}

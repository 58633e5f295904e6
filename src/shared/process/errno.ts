/**
 * True when `error` is a Node system error carrying the given errno code
 * (`ENOENT`, `ESRCH`, ...).
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * Row ids are positive integers assigned by SQLite on insert
 */
export function isValidId(id: number): boolean {
  return Number.isSafeInteger(id) && id > 0;
}

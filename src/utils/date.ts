/**
 * Format a date as YYYY-MM-DD in local time, the form used for ledger
 * timestamps and the `translation_date` key.
 */
export function formatDate(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Get the device-local date in YYYY-MM-DD format.
 * This is the calendar day the daily lookup quota belongs to.
 */
export function getLocalDateString(date: Date = new Date()): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

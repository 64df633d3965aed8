/**
 * Month/year conversion utilities for runway projections.
 */

/**
 * Converts months to years as a decimal.
 *
 * @param months - Number of months
 * @returns Number of years as a decimal
 */
export function monthsToYears(months: number): number {
  return months / 12;
}

/**
 * Formats a month index as "2Y 3M", or "Month 5" within the first year.
 */
export function formatMonthIndex(month: number): string {
  const years = Math.floor(month / 12);
  const months = month % 12;
  if (years === 0) {
    return `Month ${months}`;
  }
  return `${years}Y ${months}M`;
}

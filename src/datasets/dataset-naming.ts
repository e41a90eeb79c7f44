/**
 * Dataset naming helpers. All formatting uses the server's local time,
 * which is what people at the cryostat read off the wall clock.
 */

/** Substituted with the creation time, minute resolution. */
export const TIMESTAMP_TOKEN = '[t]';

/** The one independent variable of every logger dataset. */
export const TIME_VARIABLE = 'time [s]';

const pad = (n: number): string => String(n).padStart(2, '0');

/**
 * Calendar day, e.g. '2024-06-15'. Two dates on the same marker belong
 * in the same dataset.
 */
export function dayMarker(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/**
 * Minute-resolution timestamp, e.g. '2024-06-15 09:05'.
 */
export function formatMinute(date: Date): string {
  return `${dayMarker(date)} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

/**
 * @example
 * resolveDatasetName('Ivan log - [t]', new Date(2024, 5, 15, 9, 5))
 * // 'Ivan log - 2024-06-15 09:05'
 */
export function resolveDatasetName(template: string, date: Date): string {
  return template.replaceAll(TIMESTAMP_TOKEN, formatMinute(date));
}

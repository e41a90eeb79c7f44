/**
 * Source of "now" for anything that timestamps data or decides day rollover.
 * Sessions take one in their options so tests can drive time explicitly.
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * Seconds since the Unix epoch, with sub-second precision.
 */
export function toUnixSeconds(date: Date): number {
  return date.getTime() / 1000;
}

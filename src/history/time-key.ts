/** Whole-second key used to match samples across series */
export function timeKey(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

/**
 * Human-readable byte counts for status lines.
 *
 *   0          → 0K
 *   < 10189    → 0.1K … 9.9K
 *   < 1023949  → 10K … 999K
 *   < 10433332 → 1.0M … 9.9M
 *   otherwise  → 10M …
 *
 * The odd thresholds make each range hand over where its rounded value
 * would reach the next one.
 */

export function prettySize(n: number): string {
  if (n <= 0) {
    return "0K";
  }
  if (n < 10189) {
    return `${(n < 103 ? 0.1 : n / 1024).toFixed(1)}K`;
  }
  if (n < 1023949) {
    // 51 rounds 10189/1024 up to 10
    return `${Math.floor((n + 51) / 1024)}K`;
  }
  if (n < 10433332) {
    return `${(n / 1048576).toFixed(1)}M`;
  }
  // (10433332 + 52428) / 1048576 = 10
  return `${Math.floor((n + 52428) / 1048576)}M`;
}

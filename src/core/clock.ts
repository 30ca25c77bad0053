/**
 * Logical time shared by every access of one replay. Each recency update
 * stamps the line with a fresh, strictly larger value, so the line with the
 * smallest stamp in a set is exactly the least recently used one.
 */
export class LogicalClock {
  private value = 0

  now(): number {
    return this.value
  }

  // Returns the current time and advances it
  tick(): number {
    return this.value++
  }
}

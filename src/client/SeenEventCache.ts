/**
 * Capacity-bounded set of recently seen keys. Once full, recording a new key
 * evicts the oldest one, so a very old duplicate may be let through again.
 */
export class SeenEventCache {
  private readonly entries = new Set<string>()

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`SeenEventCache capacity must be a positive integer, got ${capacity}`)
    }
  }

  get size(): number {
    return this.entries.size
  }

  has(key: string): boolean {
    return this.entries.has(key)
  }

  /**
   * Record a key. Returns false when it was already present.
   */
  add(key: string): boolean {
    if (this.entries.has(key)) return false
    this.entries.add(key)
    if (this.entries.size > this.capacity) {
      const oldest = this.entries.values().next()
      if (!oldest.done) this.entries.delete(oldest.value)
    }
    return true
  }

  delete(key: string): void {
    this.entries.delete(key)
  }

  clear(): void {
    this.entries.clear()
  }
}

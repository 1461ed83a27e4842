/**
 * Identities (URLs) of every article the connector has already emitted.
 *
 * Owned by a single connector and mutated only from its poll loop. Entries are never
 * removed, so an identity is emitted at most once for the lifetime of the process.
 */
export class SeenSet {
  private readonly identities = new Set<string>();

  has(identity: string): boolean {
    return this.identities.has(identity);
  }

  /**
   * Record an identity. Returns false when it was already present.
   */
  add(identity: string): boolean {
    if (this.identities.has(identity)) {
      return false;
    }
    this.identities.add(identity);
    return true;
  }

  get size(): number {
    return this.identities.size;
  }
}

import { logger } from "./logger";

export type MigrationListener = (previousId: string, canonicalId: string) => void;

/**
 * Maps every identifier a tool call has been seen under to one canonical
 * id. When an item id that already resolved elsewhere shows up next to a
 * call id, the earlier canonical id is rebound and `onMigrate` moves the
 * state keyed by it.
 */
export class IdentifierResolver {
  private readonly aliases = new Map<string, string>();

  constructor(private readonly onMigrate: MigrationListener) {}

  canonicalize(primaryId: string | undefined, auxiliaryId: string | undefined): string | null {
    const callId = primaryId?.trim() ?? "";
    const itemId = auxiliaryId?.trim() ?? "";

    if (callId) {
      const canonical = this.aliases.get(callId) ?? callId;

      if (itemId) {
        const previous = this.aliases.get(itemId);
        if (previous && previous !== canonical) {
          logger.debug("Rebinding call identifier", { callId: canonical }, { previous, itemId });
          this.onMigrate(previous, canonical);
          this.rebind(previous, canonical);
        }
        this.aliases.set(itemId, canonical);
      }

      this.aliases.set(callId, canonical);
      return canonical;
    }

    if (!itemId) {
      return null;
    }

    const existing = this.aliases.get(itemId);
    if (existing) {
      return existing;
    }
    this.aliases.set(itemId, itemId);
    return itemId;
  }

  resolve(id: string): string | undefined {
    return this.aliases.get(id.trim());
  }

  /** Drops every alias that resolves to one of `canonicalIds`. */
  forget(canonicalIds: Iterable<string>): void {
    const targets = new Set(canonicalIds);
    for (const [alias, canonical] of [...this.aliases]) {
      if (targets.has(canonical)) {
        this.aliases.delete(alias);
      }
    }
  }

  clear(): void {
    this.aliases.clear();
  }

  get size(): number {
    return this.aliases.size;
  }

  private rebind(previous: string, canonical: string): void {
    for (const [alias, target] of this.aliases) {
      if (target === previous) {
        this.aliases.set(alias, canonical);
      }
    }
  }
}

import { createUniqueHash, type IdentityKeyFn } from "./event-parser.js";
import type { UsageEvent } from "./types.js";

/**
 * Drops events whose identity key was already seen in this run. The first
 * occurrence wins, so callers feed files in a fixed order.
 */
export class Deduplicator {
  private readonly processedHashes = new Set<string>();
  private duplicateCount = 0;

  constructor(private readonly keyFn: IdentityKeyFn = createUniqueHash) {}

  accept(event: Pick<UsageEvent, "messageId" | "requestId">): boolean {
    const uniqueHash = this.keyFn(event);
    if (uniqueHash == null) {
      return true;
    }
    if (this.processedHashes.has(uniqueHash)) {
      this.duplicateCount += 1;
      return false;
    }
    this.processedHashes.add(uniqueHash);
    return true;
  }

  get duplicates(): number {
    return this.duplicateCount;
  }

  get size(): number {
    return this.processedHashes.size;
  }
}

import { CandidateOrigin, ENTITY_TYPES, EntityType } from "../utils/types";

export type DropCounts = Partial<Record<EntityType, Record<string, number>>>;

/**
 * Counts candidates that were scanned or supplied but did not make it into a
 * record, keyed by entity type and `origin:reason`.
 */
export class DropTally {
  private counts: DropCounts = {};

  record(type: EntityType, origin: CandidateOrigin, reason: string): void {
    const byReason = this.counts[type] ?? {};
    const key = `${origin}:${reason}`;
    byReason[key] = (byReason[key] ?? 0) + 1;
    this.counts[type] = byReason;
  }

  total(): number {
    let sum = 0;
    for (const type of ENTITY_TYPES) {
      const byReason = this.counts[type];
      if (!byReason) continue;
      for (const count of Object.values(byReason)) sum += count;
    }
    return sum;
  }

  snapshot(): DropCounts {
    const copy: DropCounts = {};
    for (const type of ENTITY_TYPES) {
      const byReason = this.counts[type];
      if (byReason) copy[type] = { ...byReason };
    }
    return copy;
  }
}

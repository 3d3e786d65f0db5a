import { parseAnnotation } from '../domain/annotation.js';
import { compareDates } from '../domain/dates.js';
import type { LedgerSplit } from '../domain/entities/Ledger.js';

/**
 * Per-account index over existing splits, built once before any record is
 * processed
 *
 * - `tagged`: splits whose memo carries a TXID, keyed by that TXID
 * - `untagged`: fuzzy-match candidates, consumed as they match
 * - `byName`: tagged splits grouped by TXNAME, oldest entry first
 */
export class SplitIndex {
  private readonly tagged = new Map<string, LedgerSplit>();
  private readonly untagged: LedgerSplit[] = [];
  private readonly byName = new Map<string, LedgerSplit[]>();

  constructor(splits: LedgerSplit[]) {
    for (const split of splits) {
      const annotation = parseAnnotation(split.memo);
      if (!annotation) {
        this.untagged.push(split);
        continue;
      }
      this.tagged.set(annotation.txid, split);
    }

    for (const split of this.tagged.values()) {
      const annotation = parseAnnotation(split.memo);
      if (!annotation?.txname) {
        continue;
      }
      const group = this.byName.get(annotation.txname);
      if (group) {
        group.push(split);
      } else {
        this.byName.set(annotation.txname, [split]);
      }
    }

    // Array.prototype.sort is stable: same-day entries keep ledger order
    for (const group of this.byName.values()) {
      group.sort((a, b) => compareDates(a.entry.date, b.entry.date));
    }
  }

  findTagged(txid: string): LedgerSplit | undefined {
    return this.tagged.get(txid);
  }

  /**
   * Records a split that gained a TXID during this run
   */
  addTagged(txid: string, split: LedgerSplit): void {
    this.tagged.set(txid, split);
  }

  candidates(): readonly LedgerSplit[] {
    return this.untagged;
  }

  /**
   * Removes a matched split from future fuzzy matching
   */
  consume(split: LedgerSplit): void {
    const index = this.untagged.indexOf(split);
    if (index !== -1) {
      this.untagged.splice(index, 1);
    }
  }

  /**
   * Most recent tagged split recorded under a description
   */
  latestByName(txname: string): LedgerSplit | undefined {
    const group = this.byName.get(txname);
    return group ? group[group.length - 1] : undefined;
  }

  get taggedCount(): number {
    return this.tagged.size;
  }
}

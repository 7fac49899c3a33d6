/**
 * Keeps the smallest rows seen so far, by key
 */

import { compareByKeys } from '@driftcheck/core';
import type { Row } from '@driftcheck/core';

export class SampleCollector {
  private readonly rows: Row[] = [];

  constructor(
    private readonly keys: string[],
    private readonly limit: number
  ) {}

  offer(row: Row): void {
    if (this.limit <= 0) return;

    const index = this.rows.findIndex((kept) => compareByKeys(row, kept, this.keys) < 0);
    if (index === -1) {
      if (this.rows.length < this.limit) this.rows.push(row);
      return;
    }
    this.rows.splice(index, 0, row);
    if (this.rows.length > this.limit) this.rows.pop();
  }

  get samples(): Row[] {
    return [...this.rows];
  }
}

// Change Navigator - step through the changes of a diff result

import type { ChangeRecord, DiffResult } from '../types/diff.types';

export class ChangeNavigator {
  private changes: ChangeRecord[];
  private currentIndex: number = -1;

  constructor(result: DiffResult) {
    this.changes = result.records.filter(record => record.operation !== 'equal');
  }

  get total(): number {
    return this.changes.length;
  }

  current(): ChangeRecord | undefined {
    return this.currentIndex >= 0 ? this.changes[this.currentIndex] : undefined;
  }

  goToNext(): ChangeRecord | undefined {
    if (this.currentIndex < this.changes.length - 1) {
      this.currentIndex++;
    } else if (this.changes.length > 0) {
      // Loop to first change
      this.currentIndex = 0;
    }
    return this.current();
  }

  goToPrevious(): ChangeRecord | undefined {
    if (this.currentIndex > 0) {
      this.currentIndex--;
    } else if (this.changes.length > 0) {
      // Loop to last change
      this.currentIndex = this.changes.length - 1;
    }
    return this.current();
  }

  goToChange(changeId: string): ChangeRecord | undefined {
    const index = this.changes.findIndex(change => change.changeId === changeId);
    if (index >= 0) {
      this.currentIndex = index;
    }
    return this.current();
  }

  /** First change on or after the given page, wrapping to the first change */
  goToPage(pageIndex: number): ChangeRecord | undefined {
    if (this.changes.length === 0) return undefined;
    const index = this.changes.findIndex(change => change.pageIndex >= pageIndex);
    this.currentIndex = index >= 0 ? index : 0;
    return this.current();
  }

  label(): string {
    const total = this.changes.length;
    if (total === 0) {
      return 'No changes';
    }
    return `${this.currentIndex + 1} of ${total} changes`;
  }

  reset(): void {
    this.currentIndex = -1;
  }

  updateResult(result: DiffResult): void {
    this.changes = result.records.filter(record => record.operation !== 'equal');
    this.reset();
  }
}

// Unit tests for ChangeNavigator

import { describe, it, expect, beforeEach } from 'vitest';
import { ChangeNavigator } from '../../src/renderer/change-navigator';
import { assemble } from '../../src/diff/diff-assembler';
import type { DiffResult, PageDiff, TextChange } from '../../src/types/diff.types';
import { createBox } from '../helpers/document-factory';

const record = (pageIndex: number, y: number, operation: TextChange['operation']): TextChange => ({
  kind: 'text',
  operation,
  pageIndex,
  a: { pageIndex, bbox: createBox(y) },
  blockA: y
});

const page = (pageIndex: number, text: TextChange[]): PageDiff => ({
  pageIndex,
  present: { a: true, b: true },
  text,
  tables: [],
  images: []
});

describe('ChangeNavigator', () => {
  let result: DiffResult;

  beforeEach(() => {
    // change-0 and change-1 on page 0, change-2 on page 2
    result = assemble(
      page(0, [record(0, 10, 'delete'), record(0, 20, 'equal'), record(0, 30, 'replace')]),
      page(1, [record(1, 10, 'equal')]),
      page(2, [record(2, 10, 'insert')])
    );
  });

  describe('Constructor', () => {
    it('should count only changes', () => {
      const navigator = new ChangeNavigator(result);

      expect(navigator.total).toBe(3);
    });

    it('should NOT auto-navigate on construction', () => {
      const navigator = new ChangeNavigator(result);

      expect(navigator.current()).toBeUndefined();
      expect(navigator.label()).toBe('0 of 3 changes');
    });
  });

  describe('goToNext()', () => {
    it('should navigate to first change when nothing is selected', () => {
      const navigator = new ChangeNavigator(result);

      expect(navigator.goToNext()?.changeId).toBe('change-0');
      expect(navigator.label()).toBe('1 of 3 changes');
    });

    it('should loop from last to first', () => {
      const navigator = new ChangeNavigator(result);
      navigator.goToNext();
      navigator.goToNext();
      navigator.goToNext();

      expect(navigator.goToNext()?.changeId).toBe('change-0');
    });
  });

  describe('goToPrevious()', () => {
    it('should loop to the last change from the start', () => {
      const navigator = new ChangeNavigator(result);

      expect(navigator.goToPrevious()?.changeId).toBe('change-2');
      expect(navigator.goToPrevious()?.changeId).toBe('change-1');
    });
  });

  describe('goToChange()', () => {
    it('should jump to a change by id', () => {
      const navigator = new ChangeNavigator(result);

      expect(navigator.goToChange('change-1')?.operation).toBe('replace');
      expect(navigator.label()).toBe('2 of 3 changes');
    });

    it('should keep the selection for an unknown id', () => {
      const navigator = new ChangeNavigator(result);
      navigator.goToNext();

      expect(navigator.goToChange('change-9')?.changeId).toBe('change-0');
    });
  });

  describe('goToPage()', () => {
    it('should select the first change on or after the page', () => {
      const navigator = new ChangeNavigator(result);

      expect(navigator.goToPage(1)?.changeId).toBe('change-2');
      expect(navigator.goToPage(5)?.changeId).toBe('change-0');
    });
  });

  describe('updateResult()', () => {
    it('should reset the selection', () => {
      const navigator = new ChangeNavigator(result);
      navigator.goToNext();

      navigator.updateResult(assemble(page(0, [record(0, 10, 'equal')])));

      expect(navigator.total).toBe(0);
      expect(navigator.current()).toBeUndefined();
      expect(navigator.goToNext()).toBeUndefined();
      expect(navigator.label()).toBe('No changes');
    });
  });
});

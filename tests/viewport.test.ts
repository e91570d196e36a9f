import { describe, expect, test } from 'vitest';
import { ViewportManager } from '../core/viewport/viewport-manager';

describe('ViewportManager', () => {
  test('rows inside the reduced window do not scroll', () => {
    const vp = new ViewportManager(24, 80, 5);
    vp.scrollTo(0, 18);
    expect(vp.rowOffset).toBe(0);
  });

  test('scrolls down just enough to keep the margin', () => {
    const vp = new ViewportManager(24, 80, 5);
    vp.scrollTo(0, 19);
    expect(vp.rowOffset).toBe(1);
    vp.scrollTo(0, 40);
    expect(vp.rowOffset).toBe(22);
  });

  test('scrolls back up to the target row', () => {
    const vp = new ViewportManager(24, 80, 5);
    vp.scrollTo(0, 40);
    vp.scrollTo(0, 3);
    expect(vp.rowOffset).toBe(3);
  });

  test('horizontal scrolling', () => {
    const vp = new ViewportManager(24, 80, 5);
    vp.scrollTo(74, 0);
    expect(vp.colOffset).toBe(0);
    vp.scrollTo(75, 0);
    expect(vp.colOffset).toBe(1);
    vp.scrollTo(0, 0);
    expect(vp.colOffset).toBe(0);
  });

  test('screens smaller than the margin keep one usable row', () => {
    const vp = new ViewportManager(3, 4, 5);
    vp.scrollTo(2, 2);
    expect(vp.rowOffset).toBe(2);
    expect(vp.colOffset).toBe(2);
  });

  test('resize changes the window used for scrolling', () => {
    const vp = new ViewportManager(24, 80, 5);
    vp.update(10, 20);
    expect([vp.screenRows, vp.screenCols]).toEqual([10, 20]);
    vp.scrollTo(0, 30);
    expect(vp.rowOffset).toBe(26);
  });

  test('visible range is clipped to the document', () => {
    const vp = new ViewportManager(24, 80, 5);
    expect(vp.getVisibleRange(10)).toEqual({ startLine: 0, endLine: 10 });
    expect(vp.getVisibleRange(100)).toEqual({ startLine: 0, endLine: 24 });
    vp.scrollTo(0, 19);
    expect(vp.getVisibleRange(10)).toEqual({ startLine: 1, endLine: 10 });
    expect(vp.getVisibleRange(0)).toEqual({ startLine: 0, endLine: 0 });
  });
});

/**
 * Span Tests
 */

import { describe, expect, it } from 'vitest';
import {
  createSpan,
  EMPTY_SPAN,
  formatSpan,
  spanCovering,
  spanEquals,
} from '../src/index.js';

describe('Span', () => {
  it('compares by value', () => {
    expect(spanEquals(createSpan(1, 2, 3), createSpan(1, 2, 3))).toBe(true);
    expect(spanEquals(createSpan(1, 2, 3), createSpan(2, 2, 3))).toBe(false);
  });

  it('covers a set of spans', () => {
    const covering = spanCovering([
      createSpan(4, 10, 12),
      createSpan(4, 3, 5),
      createSpan(4, 11, 20),
    ]);

    expect(covering).toEqual({ sourceId: 4, startByte: 3, endByte: 20 });
  });

  it('covers nothing with the empty span', () => {
    expect(spanCovering([])).toBe(EMPTY_SPAN);
  });

  it('formats as a byte range', () => {
    expect(formatSpan(createSpan(0, 7, 19))).toBe('7-19');
  });
});

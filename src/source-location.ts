// ============================================================
// SOURCE SPAN
// ============================================================

/**
 * Byte range inside one source file.
 * Produced by the source map component; compared by value.
 */
export interface Span {
  readonly sourceId: number;
  readonly startByte: number;
  readonly endByte: number;
}

export function createSpan(
  sourceId: number,
  startByte: number,
  endByte: number
): Span {
  return Object.freeze({ sourceId, startByte, endByte });
}

/** Span used for synthesized nodes that have no source text */
export const EMPTY_SPAN: Span = createSpan(0, 0, 0);

export function spanEquals(a: Span, b: Span): boolean {
  return (
    a.sourceId === b.sourceId &&
    a.startByte === b.startByte &&
    a.endByte === b.endByte
  );
}

/**
 * Smallest span enclosing every given span.
 * Uses the source of the first span; returns EMPTY_SPAN for no input.
 */
export function spanCovering(spans: readonly Span[]): Span {
  const [first, ...rest] = spans;
  if (first === undefined) {
    return EMPTY_SPAN;
  }

  let start = first.startByte;
  let end = first.endByte;
  for (const span of rest) {
    start = Math.min(start, span.startByte);
    end = Math.max(end, span.endByte);
  }

  return createSpan(first.sourceId, start, end);
}

/** Format as `start-end`, the form used in node debug strings */
export function formatSpan(span: Span): string {
  return `${span.startByte}-${span.endByte}`;
}

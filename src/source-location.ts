// ============================================================
// SOURCE LOCATION
// ============================================================

export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

/** Half-open range: `end` is the location just past the last character. */
export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

export function makeSpan(
  start: SourceLocation,
  end: SourceLocation
): SourceSpan {
  return { start, end };
}

/** Render as `line:column` */
export function formatLocation(location: SourceLocation): string {
  return `${location.line}:${location.column}`;
}

/**
 * Slice the text a span covers out of its source.
 */
export function spanText(source: string, span: SourceSpan): string {
  return source.slice(span.start.offset, span.end.offset);
}

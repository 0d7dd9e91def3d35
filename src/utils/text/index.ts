/**
 * Text utilities for bounded record fields
 */

/**
 * Truncate text to a maximum length
 * @param text - Input text
 * @param maxLength - Maximum number of characters kept
 * @returns The text, cut to maxLength characters
 */
export function truncate(text: string, maxLength: number): string {
  if (maxLength <= 0) return '';
  return text.length > maxLength ? text.slice(0, maxLength) : text;
}

/**
 * Best-effort line number of a caller, read from the V8 stack trace
 *
 * Frame 0 is this function, frame 1 its caller; `depth` counts further up.
 *
 * @param depth - Frames above the caller of captureLine
 * @returns Line number, or 0 when the stack cannot be parsed
 */
export function captureLine(depth: number): number {
  const stack = new Error().stack;
  if (stack === undefined) return 0;

  // First line is the error message
  const frames = stack.split('\n').slice(1);
  const frame = frames[depth + 1];
  if (frame === undefined) return 0;

  const match = /:(\d+):\d+\)?\s*$/.exec(frame);
  return match ? parseInt(match[1], 10) : 0;
}

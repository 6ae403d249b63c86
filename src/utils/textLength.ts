/**
 * Length in Unicode code points, so an emoji or a supplementary-plane
 * character counts once.
 */
export function codePointLength(text: string): number {
  return Array.from(text).length;
}

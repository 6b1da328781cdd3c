/**
 * visibleWindow — the slice of `total` rows to draw so that `selected`
 * stays on screen, roughly centred once the list overflows `height`.
 */
export function visibleWindow(total: number, selected: number, height: number): { start: number; end: number } {
  if (total <= height) return { start: 0, end: total }
  const start = Math.min(Math.max(0, selected - Math.floor(height / 2)), total - height)
  return { start, end: start + height }
}

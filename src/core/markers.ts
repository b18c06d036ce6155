// Marker matching is plain substring containment over lower-cased text, so
// "fast" also matches inside "breakfast". Scores downstream are tuned to that.

/** Number of distinct markers contained in `text`. */
export function countMarkerHits(text: string, markers: readonly string[]): number {
  let hits = 0;
  for (const marker of markers) {
    if (text.includes(marker)) hits += 1;
  }
  return hits;
}

/** Total non-overlapping occurrences of every marker in `text`. */
export function countMarkerOccurrences(text: string, markers: readonly string[]): number {
  let hits = 0;
  for (const marker of markers) {
    if (!marker) continue;
    hits += text.split(marker).length - 1;
  }
  return hits;
}

export function scaledHits(text: string, markers: readonly string[], perHit: number): number {
  return Math.min(1, countMarkerHits(text, markers) * perHit);
}

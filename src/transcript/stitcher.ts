import { TranscriptFragment, fragmentText, isFailureMarker } from './fragment';

const SEGMENT_HEADER = /^\[Segment \d+\]\n/m;

function order(f: TranscriptFragment): number {
  return f.index === 'whole' ? 0 : f.index;
}

/**
 * Joins per-segment results into one transcript. A lone fragment is returned
 * verbatim; otherwise every fragment gets a 1-based `[Segment n]` header.
 */
export function stitch(fragments: TranscriptFragment[]): string {
  if (fragments.length === 0) return '';
  if (fragments.length === 1) return fragmentText(fragments[0].outcome);

  return [...fragments]
    .sort((a, b) => order(a) - order(b))
    .map((f) => `[Segment ${order(f) + 1}]\n${fragmentText(f.outcome)}`)
    .join('\n\n');
}

/** The per-segment bodies of a stitched transcript, or the whole text when it has no headers. */
export function segmentBodies(text: string): string[] {
  const parts = text.split(SEGMENT_HEADER);
  return parts.length === 1 ? parts : parts.slice(1);
}

export function carriesFailureMarker(text: string): boolean {
  return segmentBodies(text).some(isFailureMarker);
}

// true when no segment produced any speech
export function isFailureOnly(text: string): boolean {
  return segmentBodies(text).every(isFailureMarker);
}

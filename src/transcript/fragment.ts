export type FragmentIndex = number | 'whole';

export type FragmentOutcome =
  | { kind: 'ok'; text: string }
  | { kind: 'empty' }
  | { kind: 'unrecognized' }
  | { kind: 'service_error'; detail: string }
  | { kind: 'timeout' };

export interface TranscriptFragment {
  index: FragmentIndex;
  outcome: FragmentOutcome;
}

export const MARKER_PREFIXES = {
  empty: '[Empty audio',
  unrecognized: '[Unrecognized speech',
  service_error: '[Recognition service error',
  timeout: '[Timeout',
} as const;

export function fragmentText(outcome: FragmentOutcome): string {
  switch (outcome.kind) {
    case 'ok':
      return outcome.text;
    case 'empty':
      return `${MARKER_PREFIXES.empty} or volume too low]`;
    case 'unrecognized':
      return `${MARKER_PREFIXES.unrecognized}: the audio could not be understood]`;
    case 'service_error':
      return `${MARKER_PREFIXES.service_error}: ${outcome.detail}]`;
    case 'timeout':
      return `${MARKER_PREFIXES.timeout}: recognition did not finish in time]`;
  }
}

export function isFailed(fragment: TranscriptFragment): boolean {
  return fragment.outcome.kind !== 'ok';
}

export function isFailureMarker(text: string): boolean {
  const t = text.trimStart();
  return Object.values(MARKER_PREFIXES).some((p) => t.startsWith(p));
}

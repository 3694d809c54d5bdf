import { format } from 'date-fns';

const DEFAULT_LABEL = 'conversation';

/** Keeps letters, digits, spaces, underscores and hyphens. */
export function sanitizeLabel(label: string): string {
  return label.replace(/[^\p{L}\p{N}\s_-]/gu, '').trim();
}

/**
 * `<owner>_<subject>_<yyyyMMdd_HHmmss>`; the subject falls back to
 * "conversation" when absent or empty after sanitizing.
 */
export function buildRecordingId(
  ownerId: string,
  subject: string | null,
  now: Date,
): string {
  const owner = sanitizeLabel(ownerId).replace(/\s+/g, '-');
  const label =
    (subject && sanitizeLabel(subject).replace(/\s+/g, '-')) || DEFAULT_LABEL;
  return `${owner}_${label}_${format(now, 'yyyyMMdd_HHmmss')}`;
}

export function exportTitle(subject: string | null): string {
  return `Visit Summary - ${subject?.trim() || 'Conversation'}`;
}

export function exportFilename(
  recordingId: string,
  source: 'summary' | 'transcript',
  ext: string,
): string {
  return `${recordingId}_${source}.${ext}`;
}

const RULE = '='.repeat(80);

/** Transcript and summary side by side, kept as a reference copy. */
export function conversationRecord(
  transcript: string,
  summary: string,
  now: Date,
): string {
  return `# FULL CONVERSATION - ${format(now, 'dd/MM/yyyy HH:mm')}

## ORIGINAL TRANSCRIPT

${transcript}

${RULE}

## AI-GENERATED SUMMARY

${summary}

${RULE}
Generated automatically. Contains the original transcript and the AI summary for future reference.
`;
}

export interface Recording {
  recordingId: string;
  ownerId: string;
  subject: string | null;
  durationMs: number | null;
  // false when decoding failed and the uploaded bytes were kept as-is
  normalized: boolean;
  audioKey: string;
  createdAt: Date;
  updatedAt: Date;
}

export type ArtifactKind =
  | 'audio'
  | 'transcript'
  | 'refined'
  | 'summary'
  | 'conversation';

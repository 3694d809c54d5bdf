import { TranscriptFragment } from '../transcript/fragment';

export interface Transcript {
  recordingId: string;
  ownerId: string;
  // ascending segment order; exactly one for unsegmented audio
  fragments: TranscriptFragment[];
  text: string;
  createdAt: Date;
}

export interface RefinedTranscript {
  recordingId: string;
  text: string;
  improved: boolean;
}

export interface Summary {
  recordingId: string;
  text: string;
  customInstruction: boolean;
  generated: boolean;
  createdAt: Date;
}

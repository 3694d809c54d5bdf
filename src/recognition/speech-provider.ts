import { PcmFormat } from '../audio/wav';

export interface RecognitionRequest {
  // headerless 16-bit PCM
  pcm: Buffer;
  format: PcmFormat;
  locale: string;
  deadlineMs: number;
}

/**
 * Speech-to-text backend. Resolves with the recognized text or rejects with
 * one of the recognition errors below.
 */
export interface SpeechRecognitionProvider {
  recognize(req: RecognitionRequest): Promise<string>;
}

export const SPEECH_PROVIDER = Symbol('SPEECH_PROVIDER');

export class RecognitionTimeoutError extends Error {
  constructor(readonly deadlineMs: number) {
    super(`recognition did not answer within ${deadlineMs}ms`);
    this.name = 'RecognitionTimeoutError';
  }
}

export class UnrecognizedSpeechError extends Error {
  constructor() {
    super('speech could not be understood');
    this.name = 'UnrecognizedSpeechError';
  }
}

export class RecognitionRequestError extends Error {
  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = 'RecognitionRequestError';
  }
}

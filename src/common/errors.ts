export class DecodeError extends Error {
  constructor(
    message: string,
    readonly detail?: string,
  ) {
    super(message);
    this.name = 'DecodeError';
  }
}

export class GenerativeServiceError extends Error {
  constructor(
    message: string,
    readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'GenerativeServiceError';
  }
}

export class RecordingBusyError extends Error {
  constructor(readonly recordingId: string) {
    super(`Recording ${recordingId} is being processed by another request`);
    this.name = 'RecordingBusyError';
  }
}

export class RecordingNotFoundError extends Error {
  constructor(readonly recordingId: string) {
    super(`Recording ${recordingId} not found`);
    this.name = 'RecordingNotFoundError';
  }
}

export class RecordingAccessError extends Error {
  constructor(readonly recordingId: string) {
    super(`Access to recording ${recordingId} denied`);
    this.name = 'RecordingAccessError';
  }
}

export class ArtifactNotFoundError extends Error {
  constructor(readonly key: string) {
    super(`Artifact ${key} not found`);
    this.name = 'ArtifactNotFoundError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

import { Injectable, Logger } from '@nestjs/common';
import { ArtifactNotFoundError, errorMessage } from '../common/errors';
import { RedisService } from '../db/redis.service';
import { Recording } from '../db/recording.entity';
import { Summary } from '../db/transcript.entity';
import {
  DocumentRendererService,
  ExportFormat,
  ExportedDocument,
} from '../export/document-renderer.service';
import { S3Service, artifactKey } from '../s3/s3.service';
import { RefinementService } from '../summary/refinement.service';
import { conversationRecord, exportFilename, exportTitle } from './naming';

export type ExportSource = 'summary' | 'transcript';

export interface ExportResult extends ExportedDocument {
  filename: string;
}

@Injectable()
export class DocumentsService {
  private readonly log = new Logger(DocumentsService.name);

  constructor(
    private refinement: RefinementService,
    private renderer: DocumentRendererService,
    private redis: RedisService,
    private s3: S3Service,
  ) {}

  /** Refined text when present, else the raw transcript. */
  async transcriptText(recording: Recording): Promise<string> {
    const { ownerId, recordingId } = recording;
    try {
      return await this.s3.getObjectText(artifactKey(ownerId, recordingId, 'refined'));
    } catch (error) {
      if (!(error instanceof ArtifactNotFoundError)) throw error;
      return this.s3.getObjectText(artifactKey(ownerId, recordingId, 'transcript'));
    }
  }

  async summarize(recording: Recording, instruction?: string): Promise<Summary> {
    return this.redis.withLock(recording.recordingId, async () => {
      const transcript = await this.transcriptText(recording);
      const draft = await this.refinement.summarize(transcript, instruction);
      const now = new Date();

      if (draft.generated) {
        await this.s3.putObject(
          artifactKey(recording.ownerId, recording.recordingId, 'summary'),
          draft.text,
          'text/plain; charset=utf-8',
        );
        await this.saveConversation(recording, transcript, draft.text, now);
      }

      return { recordingId: recording.recordingId, ...draft, createdAt: now };
    });
  }

  async export(
    recording: Recording,
    format: ExportFormat,
    source: ExportSource = 'summary',
  ): Promise<ExportResult> {
    const markup =
      source === 'summary'
        ? await this.s3.getObjectText(
            artifactKey(recording.ownerId, recording.recordingId, 'summary'),
          )
        : await this.transcriptText(recording);

    const doc = await this.renderer.render(markup, exportTitle(recording.subject), format);
    return {
      ...doc,
      filename: exportFilename(recording.recordingId, source, format),
    };
  }

  // reference copy only; losing it must not fail the summary
  private async saveConversation(
    recording: Recording,
    transcript: string,
    summary: string,
    now: Date,
  ) {
    try {
      await this.s3.putObject(
        artifactKey(recording.ownerId, recording.recordingId, 'conversation'),
        conversationRecord(transcript, summary, now),
        'text/plain; charset=utf-8',
      );
    } catch (error) {
      this.log.warn(
        `⚠️ Could not save conversation copy for ${recording.recordingId}: ${errorMessage(error)}`,
      );
    }
  }
}

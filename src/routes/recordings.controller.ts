import {
  BadRequestException,
  Body,
  Controller,
  Get,
  Param,
  Post,
  Query,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { RecordingsService } from '../pipeline/recordings.service';
import { TranscriptionService } from '../pipeline/transcription.service';
import { requireOwner } from './owner';

@Controller('recordings')
export class RecordingsController {
  constructor(
    private recordings: RecordingsService,
    private transcription: TranscriptionService,
  ) {}

  @Post()
  @UseInterceptors(FileInterceptor('file'))
  async upload(
    @UploadedFile() file: Express.Multer.File | undefined,
    @Body('ownerId') ownerIdStr?: string,
    @Body('subject') subject?: string,
  ) {
    if (!file) throw new BadRequestException('file is required');
    const ownerId = requireOwner(ownerIdStr);

    const recording = await this.recordings.ingest(
      ownerId,
      file.buffer,
      subject?.trim() || null,
    );
    return { ok: true, recording };
  }

  @Get(':id/audio-url')
  async audioUrl(@Param('id') id: string, @Query('ownerId') ownerIdStr?: string) {
    const recording = await this.recordings.findOwned(requireOwner(ownerIdStr), id);
    return { ok: true, url: await this.recordings.audioUrl(recording) };
  }

  @Post(':id/transcribe')
  async transcribe(
    @Param('id') id: string,
    @Body('ownerId') ownerIdStr?: string,
    @Body('improve') improve?: boolean | string,
  ) {
    const recording = await this.recordings.findOwned(requireOwner(ownerIdStr), id);
    const { transcript, refined } = await this.transcription.transcribe(recording, {
      improve: improve !== false && improve !== 'false',
    });

    return {
      ok: true,
      transcription: refined.text,
      improved: refined.improved,
      rawTranscription: transcript.text,
      segments: transcript.fragments.length,
      failedSegments: transcript.fragments
        .filter((f) => f.outcome.kind !== 'ok')
        .map((f) => f.index),
    };
  }

  @Post(':id/improve')
  async improve(@Param('id') id: string, @Body('ownerId') ownerIdStr?: string) {
    const recording = await this.recordings.findOwned(requireOwner(ownerIdStr), id);
    const refined = await this.transcription.improve(recording);
    return { ok: true, transcription: refined.text, improved: refined.improved };
  }
}

import { Module, Logger } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_FILTER } from '@nestjs/core';
import { AudioNormalizerService } from './audio/audio-normalizer.service';
import { FfmpegCodec } from './audio/ffmpeg.codec';
import { SegmenterService } from './audio/segmenter.service';
import { PipelineExceptionFilter } from './common/pipeline-exception.filter';
import { RedisService } from './db/redis.service';
import { DocumentRendererService } from './export/document-renderer.service';
import { DocumentsService } from './pipeline/documents.service';
import { RecordingsService } from './pipeline/recordings.service';
import { TranscriptionService } from './pipeline/transcription.service';
import { GoogleSpeechProvider } from './recognition/google-speech.provider';
import { RecognitionService } from './recognition/recognition.service';
import { SPEECH_PROVIDER } from './recognition/speech-provider';
import { DocumentsController } from './routes/documents.controller';
import { RecordingsController } from './routes/recordings.controller';
import { S3Service } from './s3/s3.service';
import { GenerativeTextService } from './summary/generative-text.service';
import { RefinementService } from './summary/refinement.service';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
    }),
  ],
  controllers: [RecordingsController, DocumentsController],
  providers: [
    { provide: APP_FILTER, useClass: PipelineExceptionFilter },
    { provide: SPEECH_PROVIDER, useClass: GoogleSpeechProvider },
    FfmpegCodec,
    AudioNormalizerService,
    SegmenterService,
    RecognitionService,
    GenerativeTextService,
    RefinementService,
    DocumentRendererService,
    RedisService,
    S3Service,
    RecordingsService,
    TranscriptionService,
    DocumentsService,
  ],
})
export class AppModule {
  private readonly log = new Logger(AppModule.name);

  onModuleInit() {
    this.log.log('🏗️  AppModule initialized');
    this.log.log(
      `📊 Controllers loaded: ${['RecordingsController', 'DocumentsController'].join(', ')}`,
    );
  }
}

import { Injectable, Logger } from '@nestjs/common';
import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  NoSuchKey,
} from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import { ConfigService } from '@nestjs/config';
import { ArtifactKind } from '../db/recording.entity';
import { ArtifactNotFoundError } from '../common/errors';

const ARTIFACT_FILES: Record<ArtifactKind, string> = {
  audio: 'audio.wav',
  transcript: 'transcript.txt',
  refined: 'refined.txt',
  summary: 'summary.txt',
  conversation: 'conversation.txt',
};

export function artifactKey(
  ownerId: string,
  recordingId: string,
  kind: ArtifactKind,
) {
  return `owners/${ownerId}/recordings/${recordingId}/${ARTIFACT_FILES[kind]}`;
}

@Injectable()
export class S3Service {
  private readonly log = new Logger(S3Service.name);
  private s3: S3Client;
  private bucket: string;

  constructor(cfg: ConfigService) {
    this.log.log('🔧 Initializing S3Service...');
    this.log.log(`   - Region: ${cfg.get('AWS_REGION')}`);
    this.log.log(`   - Bucket: ${cfg.get('S3_BUCKET')}`);

    const accessKeyId = cfg.get<string>('S3_ACCESS_KEY');
    const secretAccessKey = cfg.get<string>('S3_SECRET_KEY');

    this.s3 = new S3Client({
      region: cfg.get<string>('AWS_REGION') || 'us-east-1',
      // fall back to the default provider chain when no static keys are set
      credentials:
        accessKeyId && secretAccessKey
          ? { accessKeyId, secretAccessKey }
          : undefined,
    });
    this.bucket = cfg.get<string>('S3_BUCKET') || 'clinical-voice-notes';
  }

  async getObjectBuffer(key: string): Promise<Buffer> {
    this.log.debug(`📥 S3 GET Object: ${key}`);
    const startTime = Date.now();

    try {
      const res = await this.s3.send(
        new GetObjectCommand({ Bucket: this.bucket, Key: key }),
      );
      if (!res.Body) throw new Error('GetObject returned empty Body');
      const bytes = await res.Body.transformToByteArray();
      this.log.debug(
        `✅ S3 GET Object successful: ${key} (${Date.now() - startTime}ms)`,
      );
      return Buffer.from(bytes);
    } catch (error) {
      if (error instanceof NoSuchKey) throw new ArtifactNotFoundError(key);
      this.log.error(`❌ S3 GET Object failed: ${key}`, error);
      throw error;
    }
  }

  async getObjectText(key: string): Promise<string> {
    const buf = await this.getObjectBuffer(key);
    return buf.toString('utf-8');
  }

  async putObject(key: string, body: Buffer | string, contentType?: string) {
    const payload = typeof body === 'string' ? Buffer.from(body, 'utf-8') : body;
    this.log.debug(
      `📤 S3 PUT Object: ${key} (${contentType || 'application/octet-stream'}, ${payload.length} bytes)`,
    );

    const startTime = Date.now();
    try {
      await this.s3.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: payload,
          ContentType: contentType,
        }),
      );
      this.log.debug(
        `✅ S3 PUT Object successful: ${key} (${Date.now() - startTime}ms)`,
      );
    } catch (error) {
      this.log.error(`❌ S3 PUT Object failed: ${key}`, error);
      throw error;
    }
  }

  async presignGet(key: string, expiresIn = 3600) {
    try {
      return await getSignedUrl(
        this.s3,
        new GetObjectCommand({ Bucket: this.bucket, Key: key }),
        { expiresIn },
      );
    } catch (error) {
      this.log.error(`❌ S3 Presign GET failed: ${key}`, error);
      throw error;
    }
  }
}

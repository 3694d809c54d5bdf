import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { randomUUID } from 'node:crypto';
import { RecordingBusyError } from '../common/errors';
import { Recording } from './recording.entity';

function kRecording(id: string) {
  return `recording:${id}`;
}
function kLock(id: string) {
  return `lock:recording:${id}`;
}

// create the hash only if the id is still free
const CREATE_IF_ABSENT = `
if redis.call("exists", KEYS[1]) == 1 then
  return 0
end
redis.call("hset", KEYS[1], unpack(ARGV))
return 1`;

// delete only if we still own the lock
const RELEASE_LOCK = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
end
return 0`;

@Injectable()
export class RedisService implements OnModuleInit, OnModuleDestroy {
  private readonly log = new Logger(RedisService.name);
  private redis!: Redis;
  private lockTtlMs: number;

  constructor(private configService: ConfigService) {
    this.lockTtlMs = Number(configService.get('LOCK_TTL_MS') ?? 600_000);
  }

  async onModuleInit() {
    this.redis = new Redis({
      host: this.configService.get('REDIS_HOST') || 'localhost',
      port: Number(this.configService.get('REDIS_PORT')) || 6379,
      password: this.configService.get('REDIS_PASSWORD') || undefined,
      db: Number(this.configService.get('REDIS_DB')) || 0,
    });

    this.redis.on('connect', () => {
      this.log.log('✅ Redis connection established successfully');
    });

    this.redis.on('error', (error) => {
      this.log.error('❌ Redis connection error:', error);
    });
  }

  async onModuleDestroy() {
    if (this.redis) await this.redis.quit();
  }

  // ----------------- Recordings -----------------

  /** Stores a new recording; null when the id is already taken. */
  async createRecording(
    recording: Omit<Recording, 'createdAt' | 'updatedAt'>,
  ): Promise<Recording | null> {
    const now = new Date();
    const fields: Record<string, string> = {
      recordingId: recording.recordingId,
      ownerId: recording.ownerId,
      subject: recording.subject ?? '',
      durationMs: recording.durationMs === null ? '' : String(recording.durationMs),
      normalized: recording.normalized ? '1' : '0',
      audioKey: recording.audioKey,
      createdAt: now.toISOString(),
      updatedAt: now.toISOString(),
    };
    const created = await this.redis.eval(
      CREATE_IF_ABSENT,
      1,
      kRecording(recording.recordingId),
      ...Object.entries(fields).flat(),
    );
    if (created !== 1) return null;
    return { ...recording, createdAt: now, updatedAt: now };
  }

  async deleteRecording(recordingId: string): Promise<void> {
    await this.redis.del(kRecording(recordingId));
  }

  async getRecording(recordingId: string): Promise<Recording | null> {
    const data = await this.redis.hgetall(kRecording(recordingId));
    if (!data || Object.keys(data).length === 0) return null;

    return {
      recordingId: data.recordingId,
      ownerId: data.ownerId,
      subject: data.subject || null,
      durationMs: data.durationMs ? Number(data.durationMs) : null,
      normalized: data.normalized === '1',
      audioKey: data.audioKey,
      createdAt: new Date(data.createdAt),
      updatedAt: new Date(data.updatedAt),
    };
  }

  async touchRecording(recordingId: string): Promise<void> {
    await this.redis.hset(kRecording(recordingId), {
      updatedAt: new Date().toISOString(),
    });
  }

  // ----------------- Per-recording lock -----------------

  async acquireLock(recordingId: string): Promise<string | null> {
    const token = randomUUID();
    const res = await this.redis.set(
      kLock(recordingId),
      token,
      'PX',
      this.lockTtlMs,
      'NX',
    );
    return res === 'OK' ? token : null;
  }

  async releaseLock(recordingId: string, token: string): Promise<void> {
    await this.redis.eval(RELEASE_LOCK, 1, kLock(recordingId), token);
  }

  /** Runs `fn` while holding the recording's lock; fails fast if it is taken. */
  async withLock<T>(recordingId: string, fn: () => Promise<T>): Promise<T> {
    const token = await this.acquireLock(recordingId);
    if (!token) throw new RecordingBusyError(recordingId);

    try {
      return await fn();
    } finally {
      await this.releaseLock(recordingId, token);
    }
  }
}

import { Test } from '@nestjs/testing';
import { SegmenterService } from '../audio/segmenter.service';
import { encodeWav } from '../audio/wav';
import { DecodeError, RecordingBusyError } from '../common/errors';
import { RedisService } from '../db/redis.service';
import { RecognitionService, RecognizableAudio } from '../recognition/recognition.service';
import { S3Service } from '../s3/s3.service';
import { GenerativeTextService } from '../summary/generative-text.service';
import { RefinedText, RefinementService } from '../summary/refinement.service';
import { speechLikeWav, squareWave } from '../testing/audio-fixtures';
import { InMemoryRedis, InMemoryS3, recordingFixture } from '../testing/storage-fakes';
import { TranscriptFragment } from '../transcript/fragment';
import { stitch } from '../transcript/stitcher';
import { TranscriptionService } from './transcription.service';

const KEY = 'owners/user1/recordings/user1_Ana_20240105_090703';

describe('TranscriptionService', () => {
  let service: TranscriptionService;
  let s3: InMemoryS3;
  let redis: InMemoryRedis;
  const recognize = jest.fn<Promise<TranscriptFragment>, [RecognizableAudio]>();
  const improve = jest.fn<Promise<RefinedText>, [string]>();

  const answer = (...texts: string[]) => {
    texts.forEach((text) =>
      recognize.mockImplementationOnce(async ({ index }) => ({
        index,
        outcome: { kind: 'ok', text },
      })),
    );
  };

  beforeEach(async () => {
    recognize.mockReset();
    improve.mockReset();
    s3 = new InMemoryS3();
    redis = new InMemoryRedis();

    const moduleRef = await Test.createTestingModule({
      providers: [
        TranscriptionService,
        SegmenterService,
        { provide: RecognitionService, useValue: { recognize } },
        { provide: RefinementService, useValue: { improve } },
        { provide: RedisService, useValue: redis },
        { provide: S3Service, useValue: s3 },
      ],
    }).compile();
    service = moduleRef.get(TranscriptionService);
  });

  it('transcribes short audio whole and stores both artifacts', async () => {
    const recording = recordingFixture();
    await s3.putObject(recording.audioKey, speechLikeWav(1000));
    answer('patient has a fever');
    improve.mockResolvedValue({ text: 'Patient has a fever.', improved: true });

    const { transcript, refined } = await service.transcribe(recording);

    expect(recognize).toHaveBeenCalledTimes(1);
    expect(recognize.mock.calls[0][0].index).toBe('whole');
    expect(transcript.text).toBe('patient has a fever');
    expect(refined).toEqual({
      recordingId: recording.recordingId,
      text: 'Patient has a fever.',
      improved: true,
    });
    expect(s3.text(`${KEY}/transcript.txt`)).toBe('patient has a fever');
    expect(s3.text(`${KEY}/refined.txt`)).toBe('Patient has a fever.');
    expect(redis.touched).toEqual([recording.recordingId]);
    expect(redis.locks.size).toBe(0);
  });

  it('splits long audio and stitches segment results in order', async () => {
    const recording = recordingFixture({ durationMs: 70_000 });
    await s3.putObject(recording.audioKey, encodeWav(squareWave(70_000, 1000)));
    answer('a', 'b');
    improve.mockImplementation(async (text) => ({ text, improved: false }));

    const { transcript } = await service.transcribe(recording);

    expect(recognize.mock.calls.map(([s]) => s.index)).toEqual([0, 1]);
    expect(transcript.fragments.map((f) => f.index)).toEqual([0, 1]);
    expect(transcript.text).toBe('[Segment 1]\na\n\n[Segment 2]\nb');
  });

  it('skips improvement when a segment failed', async () => {
    const recording = recordingFixture();
    await s3.putObject(recording.audioKey, speechLikeWav(1000));
    recognize.mockResolvedValue({ index: 'whole', outcome: { kind: 'timeout' } });

    const { refined } = await service.transcribe(recording);

    expect(improve).not.toHaveBeenCalled();
    expect(refined.improved).toBe(false);
    expect(s3.text(`${KEY}/refined.txt`)).toBe(
      '[Timeout: recognition did not finish in time]',
    );
  });

  it('skips improvement when asked to', async () => {
    const recording = recordingFixture();
    await s3.putObject(recording.audioKey, speechLikeWav(1000));
    answer('words');

    const { refined } = await service.transcribe(recording, { improve: false });

    expect(improve).not.toHaveBeenCalled();
    expect(refined.text).toBe('words');
  });

  it('sends audio the codec could not read as uploaded', async () => {
    const raw = Buffer.alloc(5000, 3);
    const recording = recordingFixture({ normalized: false, durationMs: null });
    await s3.putObject(recording.audioKey, raw);
    answer('words');

    await service.transcribe(recording, { improve: false });

    expect(recognize).toHaveBeenCalledWith({ index: 'whole', audio: raw });
  });

  it('rejects audio under 1000 bytes', async () => {
    const recording = recordingFixture();
    await s3.putObject(recording.audioKey, Buffer.alloc(500));

    await expect(service.transcribe(recording)).rejects.toThrow(DecodeError);
    expect(recognize).not.toHaveBeenCalled();
  });

  it('refuses to run while the recording is locked', async () => {
    const recording = recordingFixture();
    redis.locks.add(recording.recordingId);

    await expect(service.transcribe(recording)).rejects.toThrow(RecordingBusyError);
    expect(recognize).not.toHaveBeenCalled();
  });

  it('improves a stored transcript on request', async () => {
    const recording = recordingFixture();
    await s3.putObject(`${KEY}/transcript.txt`, 'raw words');
    improve.mockResolvedValue({ text: 'Raw words.', improved: true });

    const refined = await service.improve(recording);

    expect(improve).toHaveBeenCalledWith('raw words');
    expect(refined.improved).toBe(true);
    expect(s3.text(`${KEY}/refined.txt`)).toBe('Raw words.');
  });
});

describe('TranscriptionService.improve with the refinement service', () => {
  it('keeps failure markers of a stored segmented transcript', async () => {
    const s3 = new InMemoryS3();
    const generate = jest.fn<Promise<string>, [string]>();
    const moduleRef = await Test.createTestingModule({
      providers: [
        TranscriptionService,
        SegmenterService,
        RefinementService,
        { provide: GenerativeTextService, useValue: { generate, isAvailable: () => true } },
        { provide: RecognitionService, useValue: { recognize: jest.fn() } },
        { provide: RedisService, useValue: new InMemoryRedis() },
        { provide: S3Service, useValue: s3 },
      ],
    }).compile();
    const service = moduleRef.get(TranscriptionService);
    const stored = stitch([
      { index: 0, outcome: { kind: 'ok', text: 'fever' } },
      { index: 1, outcome: { kind: 'unrecognized' } },
    ]);
    await s3.putObject(`${KEY}/transcript.txt`, stored);

    const refined = await service.improve(recordingFixture());

    expect(generate).not.toHaveBeenCalled();
    expect(refined.improved).toBe(false);
    expect(s3.text(`${KEY}/refined.txt`)).toBe(stored);
  });
});

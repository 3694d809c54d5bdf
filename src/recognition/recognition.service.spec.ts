import { Test } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { AudioNormalizerService } from '../audio/audio-normalizer.service';
import { FfmpegCodec } from '../audio/ffmpeg.codec';
import { encodeWav } from '../audio/wav';
import { speechLikeWav, squareWave } from '../testing/audio-fixtures';
import { RecognitionService } from './recognition.service';
import {
  RecognitionRequest,
  RecognitionRequestError,
  RecognitionTimeoutError,
  SPEECH_PROVIDER,
  UnrecognizedSpeechError,
} from './speech-provider';

describe('RecognitionService', () => {
  let service: RecognitionService;
  const recognize = jest.fn<Promise<string>, [RecognitionRequest]>();
  const decodeToPcm = jest.fn<Promise<void>, [string, string]>();

  beforeEach(async () => {
    recognize.mockReset();
    decodeToPcm.mockReset();
    decodeToPcm.mockRejectedValue(new Error('ffmpeg failed: Invalid data found'));

    const moduleRef = await Test.createTestingModule({
      providers: [
        RecognitionService,
        AudioNormalizerService,
        { provide: FfmpegCodec, useValue: { decodeToPcm } },
        { provide: SPEECH_PROVIDER, useValue: { recognize } },
        {
          provide: ConfigService,
          useValue: new ConfigService({ RECOGNITION_BACKOFF_MS: 0 }),
        },
      ],
    }).compile();
    service = moduleRef.get(RecognitionService);
  });

  const whole = (audio: Buffer) => ({ index: 'whole' as const, audio });

  it('returns trimmed text from a single call', async () => {
    recognize.mockResolvedValue('  patient reports headache  ');

    const fragment = await service.recognize(whole(speechLikeWav(1000)));

    expect(fragment).toEqual({
      index: 'whole',
      outcome: { kind: 'ok', text: 'patient reports headache' },
    });
    expect(recognize).toHaveBeenCalledTimes(1);
    expect(recognize.mock.calls[0][0]).toMatchObject({
      locale: 'pt-BR',
      deadlineMs: 30_000,
      format: { sampleRate: 16000, channels: 1, bitsPerSample: 16 },
    });
  });

  it('maps whitespace-only text to empty', async () => {
    recognize.mockResolvedValue('   ');

    const fragment = await service.recognize({ index: 2, audio: speechLikeWav(1000) });

    expect(fragment).toEqual({ index: 2, outcome: { kind: 'empty' } });
  });

  it('does not retry speech the service could not understand', async () => {
    recognize.mockRejectedValue(new UnrecognizedSpeechError());

    const fragment = await service.recognize(whole(speechLikeWav(1000)));

    expect(fragment.outcome).toEqual({ kind: 'unrecognized' });
    expect(recognize).toHaveBeenCalledTimes(1);
  });

  it('does not retry request errors', async () => {
    recognize.mockRejectedValue(
      new RecognitionRequestError('recognition service answered 403 forbidden', 403),
    );

    const fragment = await service.recognize(whole(speechLikeWav(1000)));

    expect(fragment.outcome).toEqual({
      kind: 'service_error',
      detail: 'recognition service answered 403 forbidden',
    });
    expect(recognize).toHaveBeenCalledTimes(1);
  });

  it('retries timeouts three times with widening deadlines', async () => {
    recognize.mockImplementation(async (req) => {
      throw new RecognitionTimeoutError(req.deadlineMs);
    });

    const fragment = await service.recognize(whole(speechLikeWav(1000)));

    expect(fragment.outcome).toEqual({ kind: 'timeout' });
    expect(recognize.mock.calls.map(([req]) => req.deadlineMs)).toEqual([
      30_000, 45_000, 60_000,
    ]);
  });

  it('recovers when a retry succeeds', async () => {
    recognize
      .mockRejectedValueOnce(new RecognitionTimeoutError(30_000))
      .mockResolvedValueOnce('blood pressure normal');

    const fragment = await service.recognize(whole(speechLikeWav(1000)));

    expect(fragment.outcome).toEqual({ kind: 'ok', text: 'blood pressure normal' });
    expect(recognize).toHaveBeenCalledTimes(2);
  });

  it('skips calibration for audio shorter than the calibration window', async () => {
    recognize.mockResolvedValue('yes');
    const shortWav = encodeWav(squareWave(300, 4000));

    const read = await service.readAudio(shortWav);
    const fragment = await service.recognize(whole(shortWav));

    expect(read).toMatchObject({ ok: true, strategy: 'raw-uncalibrated' });
    expect(fragment.outcome).toEqual({ kind: 'ok', text: 'yes' });
    expect(recognize.mock.calls[0][0].pcm).toEqual(squareWave(300, 4000));
  });

  it('falls back to headerless PCM when nothing else reads', async () => {
    recognize.mockResolvedValue('raw words');
    const headerless = Buffer.alloc(2000, 1);

    const fragment = await service.recognize(whole(headerless));

    expect(decodeToPcm).toHaveBeenCalledTimes(1);
    expect(fragment.outcome).toEqual({ kind: 'ok', text: 'raw words' });
    expect(recognize.mock.calls[0][0].pcm).toEqual(headerless);
  });

  it('takes odd-length headerless bytes like even-length ones', async () => {
    recognize.mockResolvedValue('raw words');
    const headerless = Buffer.alloc(2001, 1);

    const fragment = await service.recognize(whole(headerless));

    expect(fragment.outcome).toEqual({ kind: 'ok', text: 'raw words' });
    expect(recognize.mock.calls[0][0].pcm).toEqual(headerless.subarray(0, 2000));
  });

  it('reports the last diagnostic when every read strategy fails', async () => {
    const noData = encodeWav(squareWave(100, 1000));
    noData.write('junk', 36);

    const fragment = await service.recognize(whole(noData));

    expect(fragment.outcome).toEqual({
      kind: 'service_error',
      detail: 'no data chunk',
    });
    expect(recognize).not.toHaveBeenCalled();
  });
});

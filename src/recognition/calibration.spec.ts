import { CANONICAL_FORMAT } from '../audio/wav';
import { squareWave } from '../testing/audio-fixtures';
import { CalibrationError, calibrateAmbientNoise } from './calibration';

describe('calibrateAmbientNoise', () => {
  it('fails when the audio is shorter than the window', () => {
    const audio = { format: CANONICAL_FORMAT, data: squareWave(300, 1000) };

    expect(() => calibrateAmbientNoise(audio, 500)).toThrow(CalibrationError);
  });

  it('silences window frames under the noise-derived threshold', () => {
    const quiet = squareWave(500, 100);
    const loud = squareWave(500, 5000);
    const audio = { format: CANONICAL_FORMAT, data: Buffer.concat([quiet, loud]) };

    const out = calibrateAmbientNoise(audio, 500);

    expect(out.energyThreshold).toBe(300);
    expect(out.data.length).toBe(audio.data.length);
    expect(out.data.subarray(0, quiet.length).every((b) => b === 0)).toBe(true);
    expect(out.data.subarray(quiet.length)).toEqual(loud);
  });

  it('raises the threshold with the ambient level', () => {
    const noise = squareWave(500, 1000);
    const speech = squareWave(500, 1400);
    const audio = { format: CANONICAL_FORMAT, data: Buffer.concat([noise, speech]) };

    const out = calibrateAmbientNoise(audio, 500);

    expect(out.energyThreshold).toBe(1500);
    expect(out.data.subarray(0, noise.length).every((b) => b === 0)).toBe(true);
    expect(out.data.subarray(noise.length)).toEqual(speech);
  });

  it('leaves quiet audio after the window alone', () => {
    const lead = squareWave(500, 100);
    const spike = squareWave(100, 20000);
    const softConsonant = squareWave(100, 200);
    const audio = {
      format: CANONICAL_FORMAT,
      data: Buffer.concat([lead, spike, softConsonant]),
    };

    const out = calibrateAmbientNoise(audio, 500);

    expect(out.energyThreshold).toBe(300);
    expect(out.data.subarray(lead.length)).toEqual(Buffer.concat([spike, softConsonant]));
  });

  it('does not modify its input', () => {
    const data = Buffer.concat([squareWave(500, 100), squareWave(100, 5000)]);
    const copy = Buffer.from(data);

    calibrateAmbientNoise({ format: CANONICAL_FORMAT, data }, 500);

    expect(data).toEqual(copy);
  });
});

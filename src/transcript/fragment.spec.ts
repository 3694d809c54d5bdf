import { fragmentText, isFailed, isFailureMarker } from './fragment';

describe('fragment markers', () => {
  it('renders every failure outcome as a bracketed marker', () => {
    expect(fragmentText({ kind: 'empty' })).toBe('[Empty audio or volume too low]');
    expect(fragmentText({ kind: 'service_error', detail: 'quota exceeded' })).toBe(
      '[Recognition service error: quota exceeded]',
    );
  });

  it.each([
    '[Empty audio or volume too low]',
    '[Unrecognized speech: the audio could not be understood]',
    '  [Recognition service error: boom]',
    '[Timeout: recognition did not finish in time]',
  ])('recognizes %j as a failure marker', (text) => {
    expect(isFailureMarker(text)).toBe(true);
  });

  it.each(['Patient is well.', '[Segment 1]\n[Timeout: x]', ''])(
    'does not treat %j as a failure marker',
    (text) => {
      expect(isFailureMarker(text)).toBe(false);
    },
  );

  it('flags every non-ok outcome as failed', () => {
    expect(isFailed({ index: 0, outcome: { kind: 'ok', text: 'x' } })).toBe(false);
    expect(isFailed({ index: 0, outcome: { kind: 'empty' } })).toBe(true);
  });
});

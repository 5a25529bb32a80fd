import { pathToFileURL } from 'url';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { createFakeProbe, VALID_CLIP, type FakeMediaSpec } from '../test-fixtures';
import type { MediaProbe } from '../types';
import { AssetValidator, type ValidationResult } from './asset-validator';

function createValidator(library: Record<string, FakeMediaSpec>) {
  const probe = createFakeProbe(library);
  const validator = new AssetValidator({ probe, minDurationSeconds: 0.01 });
  return { probe, validator };
}

function expectFailure(result: ValidationResult) {
  if (result.ok) throw new Error('expected validation to fail');
  return result.error;
}

describe('AssetValidator', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  describe('validate', () => {
    it('produces a frozen handle for a valid clip', async () => {
      const { validator } = createValidator({ '/media/clip.mp4': VALID_CLIP });

      const result = await validator.validate('/media/clip.mp4');

      if (!result.ok) throw result.error;
      expect(result.handle.path).toBe('/media/clip.mp4');
      expect(result.handle.locator).toBe('/media/clip.mp4');
      expect(result.handle.duration).toBe(5);
      expect(result.handle.track.codec).toBe('avc');
      expect(result.handle.displaySize).toEqual({ width: 1920, height: 1080, aspectRatio: 1920 / 1080 });
      expect(Object.isFrozen(result.handle)).toBe(true);
      expect(Object.isFrozen(result.handle.displaySize)).toBe(true);
    });

    it('accepts file URLs', async () => {
      const { validator } = createValidator({ '/media/clip.mp4': VALID_CLIP });

      const result = await validator.validate(pathToFileURL('/media/clip.mp4'));

      expect(result.ok).toBe(true);
    });

    it('applies the track rotation to the display size', async () => {
      const { validator } = createValidator({
        '/media/portrait.mp4': {
          ...VALID_CLIP,
          tracks: [{ codec: 'hevc', codedWidth: 1920, codedHeight: 1080, rotation: 90 }],
        },
      });

      const result = await validator.validate('/media/portrait.mp4');

      if (!result.ok) throw result.error;
      expect(result.handle.displaySize).toEqual({ width: 1080, height: 1920, aspectRatio: 1080 / 1920 });
    });

    it('rejects a locator that is not local storage', async () => {
      const { validator, probe } = createValidator({});

      const error = expectFailure(await validator.validate(new URL('https://example.com/clip.mp4')));

      expect(error.kind).toBe('missing-resource');
      expect(error.message).toBe('Not a local file: https://example.com/clip.mp4');
      expect(probe.opened).toEqual([]);
    });

    it('rejects a missing file without opening it', async () => {
      const { validator, probe } = createValidator({ '/media/gone.mp4': { exists: false } });

      const error = expectFailure(await validator.validate('/media/gone.mp4'));

      expect(error.kind).toBe('missing-resource');
      expect(error.message).toBe('File not found: /media/gone.mp4');
      expect(probe.opened).toEqual([]);
    });

    it('rejects an unrecognised container', async () => {
      const { validator } = createValidator({ '/media/notes.txt': { ...VALID_CLIP, playable: false } });

      const error = expectFailure(await validator.validate('/media/notes.txt'));

      expect(error.kind).toBe('not-playable');
    });

    it.each([0, 0.01, -1, Number.NaN, Number.POSITIVE_INFINITY])('rejects a duration of %s', async (duration) => {
      const { validator } = createValidator({ '/media/clip.mp4': { ...VALID_CLIP, duration } });

      const error = expectFailure(await validator.validate('/media/clip.mp4'));

      expect(error.kind).toBe('bad-duration');
    });

    it('accepts a duration just above the minimum', async () => {
      const { validator } = createValidator({ '/media/clip.mp4': { ...VALID_CLIP, duration: 0.02 } });

      const result = await validator.validate('/media/clip.mp4');

      expect(result.ok).toBe(true);
    });

    it('rejects a clip without video tracks', async () => {
      const { validator } = createValidator({ '/media/audio.m4a': { ...VALID_CLIP, tracks: [] } });

      const error = expectFailure(await validator.validate('/media/audio.m4a'));

      expect(error.kind).toBe('no-tracks');
      expect(error.message).toBe('No decodable video track (0 video tracks): /media/audio.m4a');
    });

    it('skips tracks with an unknown codec', async () => {
      const { validator } = createValidator({
        '/media/mixed.mkv': {
          ...VALID_CLIP,
          tracks: [
            { id: 1, codec: null },
            { id: 2, codec: 'vp9', codedWidth: 640, codedHeight: 480 },
          ],
        },
      });

      const result = await validator.validate('/media/mixed.mkv');

      if (!result.ok) throw result.error;
      expect(result.handle.track.id).toBe(2);
      expect(result.handle.displaySize).toEqual({ width: 640, height: 480, aspectRatio: 640 / 480 });
    });

    it('rejects a clip whose only track has an unknown codec', async () => {
      const { validator } = createValidator({ '/media/odd.mkv': { ...VALID_CLIP, tracks: [{ codec: null }] } });

      const error = expectFailure(await validator.validate('/media/odd.mkv'));

      expect(error.kind).toBe('no-tracks');
    });

    it('reports probe errors as unknown with the original message', async () => {
      const cause = new Error('moov atom missing');
      const { validator } = createValidator({ '/media/broken.mp4': { ...VALID_CLIP, probeError: cause } });

      const error = expectFailure(await validator.validate('/media/broken.mp4'));

      expect(error.kind).toBe('unknown');
      expect(error.message).toBe('moov atom missing');
      expect(error.cause).toBe(cause);
    });

    it('rejects with the abort reason when the signal is aborted', async () => {
      const { validator, probe } = createValidator({ '/media/clip.mp4': VALID_CLIP });
      const controller = new AbortController();
      const reason = new Error('superseded');
      controller.abort(reason);

      await expect(validator.validate('/media/clip.mp4', controller.signal)).rejects.toBe(reason);
      expect(probe.opened).toEqual([]);
    });
  });

  describe('start', () => {
    it('delivers the result exactly once', async () => {
      const { validator } = createValidator({ '/media/clip.mp4': VALID_CLIP });
      const onComplete = vi.fn();

      const task = validator.start('/media/clip.mp4', onComplete);

      await vi.waitFor(() => expect(onComplete).toHaveBeenCalledTimes(1));
      expect(onComplete.mock.calls[0][0].ok).toBe(true);
      expect(task.cancelled).toBe(false);
    });

    it('delivers failures through the same callback', async () => {
      const { validator } = createValidator({});
      const onComplete = vi.fn();

      validator.start('/media/missing.mp4', onComplete);

      await vi.waitFor(() => expect(onComplete).toHaveBeenCalledTimes(1));
      expect(onComplete.mock.calls[0][0].error.kind).toBe('missing-resource');
    });

    it('stays silent once cancelled', async () => {
      vi.useFakeTimers();
      const { validator, probe } = createValidator({ '/media/slow.mp4': { ...VALID_CLIP, delayMs: 50 } });
      const onComplete = vi.fn();

      const task = validator.start('/media/slow.mp4', onComplete);
      task.cancel();
      task.cancel();
      await vi.advanceTimersByTimeAsync(100);

      expect(task.cancelled).toBe(true);
      expect(onComplete).not.toHaveBeenCalled();
      expect(probe.opened).toEqual([]);
    });

    it('stays silent when cancelled before the result arrives', async () => {
      const { validator } = createValidator({ '/media/clip.mp4': VALID_CLIP });
      const onComplete = vi.fn();

      const task = validator.start('/media/clip.mp4', onComplete);
      task.cancel();
      await new Promise((resolve) => setTimeout(resolve, 0));

      expect(onComplete).not.toHaveBeenCalled();
    });
  });

  describe('media ownership', () => {
    it.each([
      ['an unrecognised container', { ...VALID_CLIP, playable: false }],
      ['an unusable duration', { ...VALID_CLIP, duration: 0 }],
      ['no video tracks', { ...VALID_CLIP, tracks: [] }],
      ['a probe error', { ...VALID_CLIP, probeError: new Error('truncated file') }],
    ])('closes the media after %s', async (_label, spec: FakeMediaSpec) => {
      const { validator, probe } = createValidator({ '/media/clip.mp4': spec });

      const result = await validator.validate('/media/clip.mp4');

      expect(result.ok).toBe(false);
      expect(probe.closed).toEqual(['/media/clip.mp4']);
    });

    it('hands the open media to the handle on success', async () => {
      const { validator, probe } = createValidator({ '/media/clip.mp4': VALID_CLIP });

      const result = await validator.validate('/media/clip.mp4');

      if (!result.ok) throw result.error;
      expect(probe.closed).toEqual([]);
      result.handle.media.close();
      expect(probe.closed).toEqual(['/media/clip.mp4']);
    });

    it('closes the media when aborted mid-run', async () => {
      const controller = new AbortController();
      const inner = createFakeProbe({ '/media/clip.mp4': VALID_CLIP });
      const probe: MediaProbe = {
        exists: (filePath) => inner.exists(filePath),
        open: (filePath) => {
          const media = inner.open(filePath);
          return {
            ...media,
            isPlayable: async () => {
              controller.abort();
              return true;
            },
          };
        },
      };
      const validator = new AssetValidator({ probe });

      await expect(validator.validate('/media/clip.mp4', controller.signal)).rejects.toThrow(
        'This operation was aborted'
      );
      expect(inner.closed).toEqual(['/media/clip.mp4']);
    });
  });
});

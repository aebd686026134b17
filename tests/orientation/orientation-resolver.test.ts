import { describe, it, expect, vi } from 'vitest';
import {
  OrientationResolver,
  meanConfidence,
  pickBestAngle,
  rotateImage,
  type OrientationDetector,
  type PageImage,
  type RecognizedToken,
  type TextRecognizer,
} from '@stmtlens/orientation';
import { grayImage, layoutKey } from './helpers.js';

// A 2x1 page [1, 2] as the recognizer sees it under each candidate rotation
const UPRIGHT = '2x1:1,2';
const TURNED_90 = '1x2:2,1';
const TURNED_180 = '2x1:2,1';
const TURNED_270 = '1x2:1,2';

const page = (): PageImage => grayImage(2, 1, [1, 2]);

const tokens = (...confidences: number[]): RecognizedToken[] =>
  confidences.map((confidence, i) => ({ text: `word${i}`, confidence }));

function recognizerFrom(byLayout: Record<string, RecognizedToken[] | Error>): TextRecognizer {
  return {
    recognize: vi.fn(async (image: PageImage) => {
      const result = byLayout[layoutKey(image)];
      if (result instanceof Error) throw result;
      return result ?? [];
    }),
  };
}

function detectorReturning(angle: number | null | Error): OrientationDetector {
  return {
    detect: vi.fn(async () => {
      if (angle instanceof Error) throw angle;
      return angle;
    }),
  };
}

describe('OrientationResolver', () => {
  it('should keep an upright page unmodified', async () => {
    const image = page();
    const resolver = new OrientationResolver({
      recognizer: recognizerFrom({
        [UPRIGHT]: tokens(96, 90),
        [TURNED_90]: tokens(20),
        [TURNED_180]: tokens(20),
        [TURNED_270]: tokens(20),
      }),
    });

    const result = await resolver.resolve(image);

    expect(result.angle).toBe(0);
    expect(result.image).toBe(image);
    expect(result.method).toBe('confidence');
    expect(result.scores).toEqual({ 0: 93, 90: 20, 180: 20, 270: 20 });
  });

  it('should fall back to angle 0 for a blank page', async () => {
    const image = page();
    const resolver = new OrientationResolver({ recognizer: recognizerFrom({}) });

    const result = await resolver.resolve(image);

    expect(result.angle).toBe(0);
    expect(result.image).toBe(image);
    expect(result.scores).toEqual({ 0: -1, 90: -1, 180: -1, 270: -1 });
  });

  it('should rotate to the most confident candidate', async () => {
    const image = page();
    const resolver = new OrientationResolver({
      recognizer: recognizerFrom({ [UPRIGHT]: tokens(30), [TURNED_90]: tokens(88, 92) }),
    });

    const result = await resolver.resolve(image);

    expect(result.angle).toBe(90);
    expect(result.image).toEqual(rotateImage(image, 90));
  });

  it('should ignore tokens without a confidence', async () => {
    const resolver = new OrientationResolver({
      recognizer: recognizerFrom({ [UPRIGHT]: tokens(-1, -1), [TURNED_180]: tokens(40, -1) }),
    });

    const result = await resolver.resolve(page());

    expect(result.scores?.[0]).toBe(-1);
    expect(result.scores?.[180]).toBe(40);
    expect(result.angle).toBe(180);
  });

  it('should score a failing candidate as unavailable', async () => {
    const resolver = new OrientationResolver({
      recognizer: recognizerFrom({ [UPRIGHT]: new Error('engine crashed'), [TURNED_270]: tokens(50) }),
    });

    const result = await resolver.resolve(page());

    expect(result.angle).toBe(270);
    expect(result.scores?.[0]).toBe(-1);
  });

  it('should return angle 0 when every candidate fails', async () => {
    const image = page();
    const failure = new Error('engine crashed');
    const resolver = new OrientationResolver({
      recognizer: recognizerFrom({
        [UPRIGHT]: failure,
        [TURNED_90]: failure,
        [TURNED_180]: failure,
        [TURNED_270]: failure,
      }),
    });

    const result = await resolver.resolve(image);

    expect(result.angle).toBe(0);
    expect(result.image).toBe(image);
  });

  it('should prefer the earliest angle on ties', async () => {
    const resolver = new OrientationResolver({
      recognizer: recognizerFrom({ [TURNED_90]: tokens(70), [TURNED_180]: tokens(70) }),
    });

    expect((await resolver.resolve(page())).angle).toBe(90);
  });

  it('should trust the detector when it returns a right angle', async () => {
    const image = page();
    const recognizer = recognizerFrom({ [UPRIGHT]: tokens(99) });
    const resolver = new OrientationResolver({ detector: detectorReturning(180), recognizer });

    const result = await resolver.resolve(image);

    expect(result.angle).toBe(180);
    expect(result.method).toBe('detector');
    expect(result.scores).toBeUndefined();
    expect(result.image).toEqual(rotateImage(image, 180));
    expect(recognizer.recognize).not.toHaveBeenCalled();
  });

  it.each([45, null, new Error('no script detected')])(
    'should fall back to confidence scoring when the detector returns %s',
    async (answer) => {
      const recognizer = recognizerFrom({ [TURNED_270]: tokens(80) });
      const resolver = new OrientationResolver({ detector: detectorReturning(answer), recognizer });

      const result = await resolver.resolve(page());

      expect(result.method).toBe('confidence');
      expect(result.angle).toBe(270);
      expect(recognizer.recognize).toHaveBeenCalledTimes(4);
    }
  );

  it('should leave the page alone without detector or recognizer', async () => {
    const image = page();

    const result = await new OrientationResolver().resolve(image);

    expect(result.angle).toBe(0);
    expect(result.image).toBe(image);
  });

  it('should apply the EXIF tag before scoring', async () => {
    // tag 6 turns the stored 2x1 page into an upright 1x2 page
    const resolver = new OrientationResolver({
      recognizer: recognizerFrom({ '1x2:1,2': tokens(95), '2x1:2,1': tokens(10) }),
    });

    const result = await resolver.resolve(grayImage(2, 1, [1, 2], 6));

    expect(result.angle).toBe(0);
    expect(result.image).toEqual(grayImage(1, 2, [1, 2]));
  });

  it('should not reject on a malformed buffer', async () => {
    const image: PageImage = { width: 4, height: 4, data: new Uint8Array(3) };
    const recognizer = recognizerFrom({});

    const result = await new OrientationResolver({ recognizer }).resolve(image);

    expect(result.angle).toBe(0);
    expect(result.image).toBe(image);
    expect(recognizer.recognize).not.toHaveBeenCalled();
  });

  it('should resolve pages independently when run concurrently', async () => {
    const resolver = new OrientationResolver({
      recognizer: recognizerFrom({ [UPRIGHT]: tokens(90), '2x1:5,6': tokens(10), '1x2:6,5': tokens(90) }),
    });

    const [first, second] = await Promise.all([
      resolver.resolve(page()),
      resolver.resolve(grayImage(2, 1, [5, 6])),
    ]);

    expect(first.angle).toBe(0);
    expect(second.angle).toBe(90);
  });
});

describe('meanConfidence', () => {
  it('should average confidences and skip the sentinel', () => {
    expect(meanConfidence(tokens(80, -1, 90))).toBe(85);
  });

  it('should return -1 when nothing was recognized', () => {
    expect(meanConfidence([])).toBe(-1);
    expect(meanConfidence(tokens(-1))).toBe(-1);
  });
});

describe('pickBestAngle', () => {
  it('should pick the highest score', () => {
    expect(pickBestAngle({ 0: 10, 90: 20, 180: 60, 270: 59 })).toBe(180);
  });

  it('should pick 0 when all candidates are unavailable', () => {
    expect(pickBestAngle({ 0: -1, 90: -1, 180: -1, 270: -1 })).toBe(0);
  });
});

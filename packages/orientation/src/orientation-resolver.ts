/**
 * Page orientation correction.
 *
 * A detector is asked for the page angle first. When it has no answer, every
 * right-angle rotation is scored by mean text-recognition confidence and the
 * best one wins. Failures only ever lower a candidate's score, so resolve()
 * always settles.
 */

import { OrientationAngleSchema, type OrientationAngle } from '@stmtlens/types';
import { assertPageImage, normalizeExifOrientation, rotateImage, type PageImage } from './page-image.js';

export const CANDIDATE_ANGLES: readonly OrientationAngle[] = [0, 90, 180, 270];

/** Score of a candidate that recognized nothing or failed. */
export const UNAVAILABLE_CONFIDENCE = -1;

export interface RecognizedToken {
  text: string;
  /** 0-100, or -1 when the engine reports no confidence for the token */
  confidence: number;
}

export interface OrientationDetector {
  /** Angle needed to make the page upright, or null when unsure. */
  detect(image: PageImage): Promise<number | null>;
}

export interface TextRecognizer {
  recognize(image: PageImage): Promise<RecognizedToken[]>;
}

export interface OrientationResolverOptions {
  detector?: OrientationDetector | undefined;
  recognizer?: TextRecognizer | undefined;
}

export type CandidateScores = Record<OrientationAngle, number>;

export interface OrientationResult {
  image: PageImage;
  angle: OrientationAngle;
  method: 'detector' | 'confidence';
  /** Present when the confidence fallback ran */
  scores?: CandidateScores | undefined;
}

export function meanConfidence(tokens: readonly RecognizedToken[]): number {
  const confidences = tokens
    .map((token) => token.confidence)
    .filter((confidence) => confidence !== UNAVAILABLE_CONFIDENCE && Number.isFinite(confidence));

  if (confidences.length === 0) {
    return UNAVAILABLE_CONFIDENCE;
  }
  return confidences.reduce((sum, c) => sum + c, 0) / confidences.length;
}

/**
 * Highest score wins; ties keep the earliest angle in CANDIDATE_ANGLES order.
 */
export function pickBestAngle(scores: CandidateScores): OrientationAngle {
  let best: OrientationAngle = 0;
  let bestScore = -Infinity;
  for (const angle of CANDIDATE_ANGLES) {
    const score = scores[angle];
    if (score > bestScore) {
      best = angle;
      bestScore = score;
    }
  }
  return best;
}

export class OrientationResolver {
  private readonly detector: OrientationDetector | undefined;
  private readonly recognizer: TextRecognizer | undefined;

  constructor(options: OrientationResolverOptions = {}) {
    this.detector = options.detector;
    this.recognizer = options.recognizer;
  }

  async resolve(image: PageImage): Promise<OrientationResult> {
    let upright: PageImage;
    try {
      assertPageImage(image);
      upright = normalizeExifOrientation(image);
    } catch {
      // nothing can be rotated, leave the page as it came
      return { image, angle: 0, method: 'confidence' };
    }

    const detected = await this.detectAngle(upright);
    if (detected !== null) {
      return { image: rotateImage(upright, detected), angle: detected, method: 'detector' };
    }

    const scores = await this.scoreCandidates(upright);
    const angle = pickBestAngle(scores);
    return { image: rotateImage(upright, angle), angle, method: 'confidence', scores };
  }

  /**
   * Primary pass. Anything other than a right angle counts as no answer.
   */
  private async detectAngle(image: PageImage): Promise<OrientationAngle | null> {
    if (this.detector === undefined) {
      return null;
    }
    try {
      const parsed = OrientationAngleSchema.safeParse(await this.detector.detect(image));
      return parsed.success ? parsed.data : null;
    } catch {
      return null;
    }
  }

  private async scoreCandidates(image: PageImage): Promise<CandidateScores> {
    const scores: CandidateScores = {
      0: UNAVAILABLE_CONFIDENCE,
      90: UNAVAILABLE_CONFIDENCE,
      180: UNAVAILABLE_CONFIDENCE,
      270: UNAVAILABLE_CONFIDENCE,
    };
    if (this.recognizer === undefined) {
      return scores;
    }

    for (const angle of CANDIDATE_ANGLES) {
      try {
        const tokens = await this.recognizer.recognize(rotateImage(image, angle));
        scores[angle] = meanConfidence(tokens);
      } catch {
        scores[angle] = UNAVAILABLE_CONFIDENCE;
      }
    }
    return scores;
  }
}

export {
  assertPageImage,
  transformImage,
  rotateImage,
  normalizeExifOrientation,
  type PageImage,
  type PixelTransform,
} from './page-image.js';

export {
  OrientationResolver,
  CANDIDATE_ANGLES,
  UNAVAILABLE_CONFIDENCE,
  meanConfidence,
  pickBestAngle,
  type OrientationDetector,
  type TextRecognizer,
  type RecognizedToken,
  type OrientationResolverOptions,
  type OrientationResult,
  type CandidateScores,
} from './orientation-resolver.js';

/**
 * Orientation detector and text recognizer backed by tesseract.js.
 *
 * OSD runs on the legacy engine with `osd` data; word confidences come from
 * the LSTM engine with `eng` data. Both traineddata files are read from the
 * @tesseract.js-data packages on disk, so nothing is fetched at run time.
 */

import { createRequire } from 'module';
import { dirname, join } from 'path';
import Tesseract from 'tesseract.js';
import { encodePngPage } from '@stmtlens/document-loader';
import type { OrientationDetector, PageImage, RecognizedToken, TextRecognizer } from '@stmtlens/orientation';

interface TesseractWord {
  text: string;
  confidence: number;
}

interface TesseractBlock {
  paragraphs: { lines: { words: TesseractWord[] }[] }[];
}

/** The part of a tesseract.js worker used for orientation and script detection. */
export interface OsdEngine {
  detect(image: Buffer): Promise<{ data: { orientation_degrees: number | null } }>;
  terminate(): Promise<unknown>;
}

/** The part of a tesseract.js worker used for word recognition. */
export interface WordEngine {
  recognize(
    image: Buffer,
    options: Record<string, never>,
    output: { blocks: boolean }
  ): Promise<{ data: { blocks: TesseractBlock[] | null } }>;
  terminate(): Promise<unknown>;
}

export interface TesseractOrientationOptions {
  /** Directory holding osd.traineddata.gz for the legacy engine */
  osdLangPath?: string | undefined;
  /** Directory holding eng.traineddata.gz for the LSTM engine */
  textLangPath?: string | undefined;
}

const require = createRequire(import.meta.url);

function packagedLangPath(pkg: string, version: string): string {
  return join(dirname(require.resolve(`${pkg}/package.json`)), version);
}

/**
 * Tesseract reports the page orientation; the correction is the opposite turn.
 */
export function orientationToRotation(orientationDegrees: number): number {
  return (360 - orientationDegrees) % 360;
}

export class TesseractOrientation implements OrientationDetector, TextRecognizer {
  private readonly osd: OsdEngine;
  private readonly words: WordEngine;

  constructor(osd: OsdEngine, words: WordEngine) {
    this.osd = osd;
    this.words = words;
  }

  static async create(options: TesseractOrientationOptions = {}): Promise<TesseractOrientation> {
    const osd = await Tesseract.createWorker('osd', Tesseract.OEM.TESSERACT_ONLY, {
      langPath: options.osdLangPath ?? packagedLangPath('@tesseract.js-data/osd', '4.0.0'),
      cacheMethod: 'none',
      legacyCore: true,
      legacyLang: true,
    });

    try {
      const words = await Tesseract.createWorker('eng', Tesseract.OEM.LSTM_ONLY, {
        langPath: options.textLangPath ?? packagedLangPath('@tesseract.js-data/eng', '4.0.0_best_int'),
        cacheMethod: 'none',
      });
      await words.setParameters({ tessedit_pageseg_mode: Tesseract.PSM.SINGLE_BLOCK });
      return new TesseractOrientation(osd, words);
    } catch (error) {
      await osd.terminate();
      throw error;
    }
  }

  async detect(image: PageImage): Promise<number | null> {
    const { data } = await this.osd.detect(encodePngPage(image));
    if (data.orientation_degrees === null) {
      return null;
    }
    return orientationToRotation(data.orientation_degrees);
  }

  async recognize(image: PageImage): Promise<RecognizedToken[]> {
    const { data } = await this.words.recognize(encodePngPage(image), {}, { blocks: true });

    const tokens: RecognizedToken[] = [];
    for (const block of data.blocks ?? []) {
      for (const paragraph of block.paragraphs) {
        for (const line of paragraph.lines) {
          for (const word of line.words) {
            tokens.push({ text: word.text, confidence: word.confidence });
          }
        }
      }
    }
    return tokens;
  }

  async terminate(): Promise<void> {
    await Promise.all([this.osd.terminate(), this.words.terminate()]);
  }
}

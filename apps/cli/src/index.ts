#!/usr/bin/env node
/* eslint-disable no-console */

// Load environment variables from .env file
import 'dotenv/config';

import { Command } from 'commander';
import { readFile, writeFile, mkdir } from 'fs/promises';
import { extname, resolve, dirname } from 'path';
import { loadDocument } from '@stmtlens/document-loader';
import {
  GeminiStatementModel,
  isProcessingError,
  loadPromptTemplates,
  processStatement,
  sampleStatementResult,
  TesseractOrientation,
  type ProcessingOutcome,
  type StatementInput,
  type StatementModel,
} from '@stmtlens/pipeline';
import { OrientationResolver } from '@stmtlens/orientation';
import { ANALYZER_VERSION } from '@stmtlens/types';
import { envBool, parseRetries, requireApiKey } from './config.js';

interface CliOptions {
  out?: string;
  verbose: boolean;
  test: boolean;
  pretty: boolean;
  retries: string;
  modelText?: string;
  modelVision?: string;
  promptsDir?: string;
  tesseract: boolean;
}

const program = new Command();

program
  .name('statement-lens')
  .description('Analyze a bank statement (PDF, PNG/JPEG page or extracted JSON) into fields, checks and insights')
  .version(ANALYZER_VERSION)
  .argument('[file]', 'Path to the statement: .pdf, .png, .jpg/.jpeg or an extracted .json')
  .option('-o, --out <file>', 'Output file path (default: stdout)', process.env['STATEMENT_OUTPUT_FILE'])
  .option('-v, --verbose', 'Enable verbose output', envBool('STATEMENT_VERBOSE', false))
  .option('--test', 'Return the built-in sample result without calling the model', envBool('STATEMENT_TEST', false))
  .option('--pretty', 'Pretty-print JSON output', envBool('STATEMENT_PRETTY', true))
  .option('--no-pretty', 'Disable pretty-printing')
  .option('--retries <number>', 'Retries for each model call', process.env['STATEMENT_RETRIES'] ?? '1')
  .option('--model-text <name>', 'Model used for extraction and insights', process.env['STATEMENT_MODEL_TEXT'])
  .option('--model-vision <name>', 'Model used to transcribe page images', process.env['STATEMENT_MODEL_VISION'])
  .option('--prompts-dir <directory>', 'Directory holding the prompt templates', process.env['STATEMENT_PROMPTS_DIR'])
  .option('--tesseract', 'Detect page orientation with Tesseract before OCR', envBool('STATEMENT_TESSERACT', true))
  .option('--no-tesseract', 'Only apply the EXIF orientation tag to page images')
  .action(async (file: string | undefined, options: CliOptions) => {
    try {
      const outcome = options.test ? sampleStatementResult() : await analyzeFile(file, options);
      await writeOutcome(outcome, options);

      if (isProcessingError(outcome)) {
        console.error(`[ERROR] ${outcome.error}`);
        process.exitCode = 1;
        return;
      }
      for (const warning of outcome.quality.warnings) {
        console.error(`[WARN] ${warning}`);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[ERROR] ${message}`);
      if (options.verbose && error instanceof Error && error.stack !== undefined) {
        console.error(error.stack);
      }
      process.exit(1);
    }
  });

async function createModel(options: CliOptions): Promise<StatementModel> {
  const prompts = await loadPromptTemplates(options.promptsDir);
  return new GeminiStatementModel({
    apiKey: requireApiKey(),
    prompts,
    textModel: options.modelText,
    visionModel: options.modelVision,
  });
}

async function readInput(filePath: string, verbose: boolean): Promise<StatementInput> {
  if (extname(filePath).toLowerCase() === '.json') {
    const statement: unknown = JSON.parse(await readFile(filePath, 'utf-8'));
    return { kind: 'extracted', statement };
  }

  const document = await loadDocument(filePath);
  if (document.kind === 'text') {
    if (verbose) {
      console.error(`[INFO] Selectable text found on ${document.totalPages} page(s), skipping OCR`);
    }
    return { kind: 'text', text: document.text };
  }

  if (document.textError !== undefined) {
    console.error(`[WARN] PDF text extraction failed, using OCR: ${document.textError}`);
  }
  if (verbose) {
    console.error(`[INFO] Running OCR on ${document.pages.length} page image(s)`);
  }
  return { kind: 'pages', pages: document.pages };
}

/**
 * Tesseract is optional: without it pages still get their EXIF orientation.
 */
async function createOrientationResolver(options: CliOptions): Promise<{
  resolver: OrientationResolver;
  close: () => Promise<void>;
}> {
  if (!options.tesseract) {
    return { resolver: new OrientationResolver(), close: async () => undefined };
  }
  try {
    const tesseract = await TesseractOrientation.create();
    return {
      resolver: new OrientationResolver({ detector: tesseract, recognizer: tesseract }),
      close: () => tesseract.terminate(),
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[WARN] Tesseract unavailable, using EXIF orientation only: ${message}`);
    return { resolver: new OrientationResolver(), close: async () => undefined };
  }
}

async function analyzeFile(file: string | undefined, options: CliOptions): Promise<ProcessingOutcome> {
  if (file === undefined) {
    throw new Error('A statement file must be specified (or use --test)');
  }

  const filePath = resolve(file);
  if (options.verbose) {
    console.error(`[INFO] Analyzer version: ${ANALYZER_VERSION}`);
    console.error(`[INFO] Input: ${filePath}`);
  }

  const input = await readInput(filePath, options.verbose);

  // Extracted JSON can be checked offline; insights need the model
  const model =
    input.kind === 'extracted' && (process.env['GEMINI_API_KEY'] ?? '') === ''
      ? undefined
      : await createModel(options);

  const orientation =
    input.kind === 'pages'
      ? await createOrientationResolver(options)
      : { resolver: new OrientationResolver(), close: async () => undefined };

  try {
    return await processStatement(input, {
      model,
      orientation: orientation.resolver,
      retry: {
        maxRetries: parseRetries(options.retries),
        onRetry: (attempt, error, delayMs) => {
          console.error(`[WARN] Retrying model call (attempt ${attempt}) in ${Math.round(delayMs)}ms: ${error.message}`);
        },
      },
    });
  } finally {
    await orientation.close();
  }
}

async function writeOutcome(outcome: ProcessingOutcome, options: CliOptions): Promise<void> {
  const json = options.pretty ? JSON.stringify(outcome, null, 2) : JSON.stringify(outcome);

  if (options.out !== undefined) {
    const outPath = resolve(options.out);
    await mkdir(dirname(outPath), { recursive: true });
    await writeFile(outPath, json + '\n', 'utf-8');
    if (options.verbose) {
      console.error(`[INFO] Output written to: ${outPath}`);
    }
  } else {
    console.log(json);
  }
}

await program.parseAsync(process.argv);

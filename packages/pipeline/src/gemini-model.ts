import { GoogleGenAI, createPartFromBase64, createPartFromText } from '@google/genai';
import { encodeJpegPage } from '@stmtlens/document-loader';
import type { PageImage } from '@stmtlens/orientation';
import type { StatementModel } from './model.js';
import { fillTemplate, type PromptTemplates } from './prompts.js';

export const DEFAULT_TEXT_MODEL = 'gemini-2.5-flash';
export const DEFAULT_VISION_MODEL = 'gemini-2.5-flash-lite';

export interface GeminiModelOptions {
  apiKey: string;
  prompts: PromptTemplates;
  textModel?: string | undefined;
  visionModel?: string | undefined;
  /** JPEG quality for page uploads */
  jpegQuality?: number | undefined;
}

export class GeminiStatementModel implements StatementModel {
  readonly name: string;
  private readonly client: GoogleGenAI;
  private readonly prompts: PromptTemplates;
  private readonly textModel: string;
  private readonly jpegQuality: number;

  constructor(options: GeminiModelOptions) {
    this.client = new GoogleGenAI({ apiKey: options.apiKey });
    this.prompts = options.prompts;
    this.textModel = options.textModel ?? DEFAULT_TEXT_MODEL;
    this.name = options.visionModel ?? DEFAULT_VISION_MODEL;
    this.jpegQuality = options.jpegQuality ?? 90;
  }

  async transcribePage(image: PageImage): Promise<string> {
    const jpeg = Buffer.from(encodeJpegPage(image, this.jpegQuality)).toString('base64');
    const response = await this.client.models.generateContent({
      model: this.name,
      contents: [createPartFromText(this.prompts.pageOcr), createPartFromBase64(jpeg, 'image/jpeg')],
    });
    return (response.text ?? '').trim();
  }

  async extractStatement(text: string): Promise<string> {
    return this.generateText(fillTemplate(this.prompts.extraction, { OCR_OR_PLAINTEXT: text }));
  }

  async generateInsights(statementJson: string): Promise<string> {
    return this.generateText(fillTemplate(this.prompts.insights, { EXTRACTED_JSON: statementJson }));
  }

  private async generateText(prompt: string): Promise<string> {
    const response = await this.client.models.generateContent({
      model: this.textModel,
      contents: prompt,
    });
    return response.text ?? '';
  }
}

import type { PageImage } from '@stmtlens/orientation';

/**
 * Generative model behind the pipeline. Methods return raw model text;
 * parsing and validation happen in the pipeline.
 */
export interface StatementModel {
  /** Label recorded in page metadata */
  readonly name: string;
  transcribePage(image: PageImage): Promise<string>;
  extractStatement(text: string): Promise<string>;
  generateInsights(statementJson: string): Promise<string>;
}

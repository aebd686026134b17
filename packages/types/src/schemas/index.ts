export {
  TransactionSchema,
  SummarySchema,
  StatementFieldsSchema,
  ExtractedStatementSchema,
  ModelExtractionSchema,
  OrientationAngleSchema,
  PageMetaSchema,
  QualityReportSchema,
  StatementResultSchema,
  InsightsSchema,
} from './statement.js';

export type {
  Transaction,
  Summary,
  StatementFields,
  ExtractedStatement,
  OrientationAngle,
  PageMeta,
  QualityReport,
  StatementResult,
} from './statement.js';

export { assertAligned, Metric, mean } from './base.js';
export {
  AccuracyMetric,
  AVERAGES,
  type Average,
  averageScore,
  collectLabelStats,
  ConfusionMatrixMetric,
  F1Metric,
  LabelDistributionMetric,
  type LabelScoreOptions,
  type LabelScores,
  type LabelStats,
  labelOf,
  PrecisionMetric,
  perLabelScores,
  RecallMetric,
  type ScoreKind,
} from './classification.js';
export {
  BleuMetric,
  type BleuOptions,
  ContextPrecisionMetric,
  RougeLMetric,
  rougeL,
  sentenceBleu,
  tokenize,
} from './generation.js';

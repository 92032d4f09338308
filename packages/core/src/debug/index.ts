export {
  explainScore,
  type FieldExplanation,
  type ScoreExplanation,
} from './ScoreExplainer';

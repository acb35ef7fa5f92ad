import type { PipelineContext, PipelineStage } from './types';
import { substitutionStage, whitespaceNormalizationStage } from './stages';

// Substitutions run before command detection so spoken variants of a trigger
// ("voice box") are normalized first.
export const DEFAULT_PIPELINE: PipelineStage[] = [whitespaceNormalizationStage, substitutionStage];

export const runPipeline = (
  input: string,
  context: PipelineContext,
  stages: PipelineStage[] = DEFAULT_PIPELINE
) => {
  return stages.reduce((acc, stage) => {
    if (!stage.enabled(context)) return acc;
    return stage.run(acc, context);
  }, input);
};

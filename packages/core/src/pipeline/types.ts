import type { SubstitutionEngine } from '../substitutions/engine';

export interface PipelineContext {
  substitutions?: SubstitutionEngine;
}

export interface PipelineStage {
  id: string;
  enabled: (context: PipelineContext) => boolean;
  run: (input: string, context: PipelineContext) => string;
}

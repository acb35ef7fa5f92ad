import type { PipelineStage } from './types';

export const whitespaceNormalizationStage: PipelineStage = {
  id: 'whitespace-normalization',
  enabled: () => true,
  run: (input) => {
    if (!input.includes('\n') && !input.includes('\r')) {
      return input.replace(/\s+/g, ' ').trim();
    }
    return input
      .split(/\r?\n/)
      .map((line) => line.replace(/\s+/g, ' ').trim())
      .join('\n')
      .trim();
  },
};

export const substitutionStage: PipelineStage = {
  id: 'substitutions',
  enabled: (context) => Boolean(context.substitutions),
  run: (input, context) => context.substitutions?.apply(input) ?? input,
};

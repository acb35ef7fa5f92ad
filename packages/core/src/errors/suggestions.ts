import { describeError, type ErrorCategory } from './errors';

type SuggestionRule = {
  category: ErrorCategory | 'any';
  test: (code: string, message: string) => boolean;
  suggestion: string;
};

const includesAny = (value: string, needles: string[]) => needles.some((needle) => value.includes(needle));

// First match wins, so specific rules sit above the per-category fallbacks.
const RULES: SuggestionRule[] = [
  {
    category: 'any',
    test: (_code, message) => includesAny(message, ['permission denied', 'eacces', 'eperm']),
    suggestion: 'Check file/directory permissions and ensure VoiceBox has access',
  },
  {
    category: 'config',
    test: (code) => code === 'missing_api_key',
    suggestion: 'Add an API key to the configuration or switch to the local transcription backend',
  },
  {
    category: 'config',
    test: (code) => code === 'invalid_hotkey',
    suggestion: 'Use a combination such as ctrl+shift+v, f12 or button9',
  },
  {
    category: 'config',
    test: (_code, message) => includesAny(message, ['json', 'unexpected token']),
    suggestion: 'Configuration file is corrupted - reset to defaults',
  },
  {
    category: 'transcription',
    test: (code, message) => code === 'quota' || message.includes('quota'),
    suggestion: 'API quota exceeded - check billing or use local model',
  },
  {
    category: 'transcription',
    test: (code, message) =>
      code === 'rate_limited' || includesAny(message, ['rate limit', 'too many requests']),
    suggestion: 'API rate limit - wait a moment and try again',
  },
  {
    category: 'transcription',
    test: (code) => code === 'unauthorized',
    suggestion: 'Check the transcription API key in the configuration',
  },
  {
    category: 'transcription',
    test: (code) => code === 'unreachable',
    suggestion: 'Make sure the transcription server is running and reachable',
  },
  {
    category: 'transcription',
    test: (_code, message) => message.includes('audio'),
    suggestion: 'Check microphone and try speaking more clearly',
  },
  {
    category: 'command',
    test: (code, message) => code === 'image_unsupported' || includesAny(message, ['vision', '404']),
    suggestion: "Selected model doesn't support images - try a vision-capable model",
  },
  {
    category: 'command',
    test: (code, message) => code === 'timeout' || message.includes('timeout'),
    suggestion: 'LLM request timed out - try again or use a faster model',
  },
  {
    category: 'command',
    test: (code) => code === 'no_backend',
    suggestion: 'Configure an OpenRouter API key or a local LLM endpoint',
  },
  {
    category: 'insertion',
    test: () => true,
    suggestion: "Ensure the target application has focus and try the 'typing' method",
  },
  {
    category: 'recording',
    test: (_code, message) => message.includes('device'),
    suggestion: 'Check microphone connection and system audio settings',
  },
  {
    category: 'recording',
    test: (code) => code === 'no_audio',
    suggestion: 'Hold the recording a little longer and check the microphone input level',
  },
  {
    category: 'recording',
    test: () => true,
    suggestion: 'Ensure microphone permissions are granted',
  },
];

const FALLBACK = 'Check configuration and try again, or enable debug mode for details';

export const getSuggestion = (error: unknown): string => {
  const { category, code, message } = describeError(error);
  const lowered = message.toLowerCase();
  const rule = RULES.find(
    (candidate) =>
      (candidate.category === 'any' || candidate.category === category) &&
      candidate.test(code, lowered)
  );
  return rule?.suggestion ?? FALLBACK;
};

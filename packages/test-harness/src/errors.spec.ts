import { describe, expect, it } from 'vitest';
import {
  CommandRoutingError,
  ConfigError,
  InsertionError,
  RecordingError,
  TranscriptionError,
  describeError,
  getSuggestion,
  isVoiceBoxError,
} from '@voicebox/core';

describe('error descriptions', () => {
  it('reads category and code from domain errors', () => {
    const error = new CommandRoutingError('http_error', 'OpenRouter error: bad gateway', { status: 502 });
    expect(describeError(error)).toEqual({
      category: 'command',
      code: 'http_error',
      message: 'OpenRouter error: bad gateway',
    });
    expect(error.status).toBe(502);
    expect(isVoiceBoxError(error)).toBe(true);
  });

  it('treats anything else as unexpected', () => {
    expect(describeError(new Error('boom'))).toEqual({ category: 'unexpected', code: 'unexpected', message: 'boom' });
    expect(describeError('plain')).toEqual({ category: 'unexpected', code: 'unexpected', message: 'plain' });
    expect(isVoiceBoxError(new Error('boom'))).toBe(false);
  });
});

describe('suggestions', () => {
  it.each([
    [new Error('EACCES: permission denied, open /tmp/x'), 'Check file/directory permissions and ensure VoiceBox has access'],
    [new ConfigError('missing_api_key', 'Invalid configuration'), 'Add an API key to the configuration or switch to the local transcription backend'],
    [new ConfigError('invalid_config', 'Configuration file is not valid JSON: Unexpected token'), 'Configuration file is corrupted - reset to defaults'],
    [new TranscriptionError('quota', 'Transcription quota exceeded'), 'API quota exceeded - check billing or use local model'],
    [new TranscriptionError('failed', 'Transcription failed: 429 Too Many Requests'), 'API rate limit - wait a moment and try again'],
    [new TranscriptionError('unauthorized', 'Transcription rejected the API key'), 'Check the transcription API key in the configuration'],
    [new CommandRoutingError('image_unsupported', 'Model x does not support image input'), "Selected model doesn't support images - try a vision-capable model"],
    [new CommandRoutingError('timeout', 'Request timeout after 30000ms'), 'LLM request timed out - try again or use a faster model'],
    [new InsertionError('typing_failed', 'Failed to type text'), "Ensure the target application has focus and try the 'typing' method"],
    [new RecordingError('no_audio', 'No audio data captured'), 'Hold the recording a little longer and check the microphone input level'],
    [new RecordingError('not_recording', 'Not currently recording'), 'Ensure microphone permissions are granted'],
  ])('suggests a fix for %s', (error, suggestion) => {
    expect(getSuggestion(error)).toBe(suggestion);
  });

  it('falls back to a generic hint', () => {
    expect(getSuggestion(new Error('boom'))).toBe(
      'Check configuration and try again, or enable debug mode for details'
    );
  });
});

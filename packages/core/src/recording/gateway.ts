import { rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { encodeWav } from '../audio/wav';
import type { AudioSettings } from '../domain/schemas';
import { RecordingError } from '../errors/errors';
import { noopLogger, type Logger } from '../logging';
import type { AudioCapture, CapturedAudio, RecordingGateway } from '../gateways/types';

export interface RecordingGatewayOptions {
  capture: AudioCapture;
  audio: AudioSettings;
  directory?: string;
  now?: () => number;
  logger?: Logger;
}

export const createRecordingGateway = (options: RecordingGatewayOptions): RecordingGateway => {
  const directory = options.directory ?? tmpdir();
  const now = options.now ?? Date.now;
  const logger = options.logger ?? noopLogger;
  let recording = false;
  let sequence = 0;

  const start = async () => {
    if (recording) {
      throw new RecordingError('already_recording', 'Already recording');
    }
    recording = true;
    try {
      await options.capture.start({
        sampleRate: options.audio.sampleRate,
        channels: options.audio.channels,
      });
    } catch (error) {
      recording = false;
      throw new RecordingError(
        'device_failed',
        `Failed to start audio device: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
  };

  const stop = async () => {
    if (!recording) {
      throw new RecordingError('not_recording', 'Not currently recording');
    }
    recording = false;
    let captured: CapturedAudio;
    try {
      captured = await options.capture.stop();
    } catch (error) {
      throw new RecordingError(
        'device_failed',
        `Failed to stop audio device: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
    if (!captured.data.length) {
      throw new RecordingError('no_audio', 'No audio data captured');
    }
    sequence += 1;
    const path = join(directory, `voicebox-${now()}-${sequence}.wav`);
    await writeFile(
      path,
      encodeWav(captured.data, options.audio.sampleRate, options.audio.channels)
    );
    logger.debug('Recording saved', path, `${captured.durationMs}ms`);
    return path;
  };

  const cancel = async () => {
    if (!recording) return;
    recording = false;
    await options.capture.cancel();
  };

  const cleanup = async (path: string) => {
    await rm(path, { force: true });
  };

  return {
    start,
    stop,
    cancel,
    isRecording: () => recording,
    cleanup,
  };
};

import { createRequire } from 'module';
import { pcmDurationMs, type CaptureOptions } from '@voicebox/core';
import type { AudioCaptureAdapter } from './index';

export type RecordOptions = {
  sampleRate?: number;
  channels?: number;
  threshold?: number;
  verbose?: boolean;
  audioType?: string;
  recorder?: string;
};

export type Recorder = { stop(): void; stream(): NodeJS.ReadableStream };

export type RecordModule = {
  record: (options?: RecordOptions) => Recorder;
};

const require = createRequire(import.meta.url);

export const loadRecorder = (): RecordModule => {
  const loaded: RecordModule = require('node-record-lpcm16');
  return loaded;
};

export const concatChunks = (chunks: Uint8Array[]) => {
  const total = chunks.reduce((sum, chunk) => sum + chunk.length, 0);
  const merged = new Uint8Array(total);
  let offset = 0;
  chunks.forEach((chunk) => {
    merged.set(chunk, offset);
    offset += chunk.length;
  });
  return merged;
};

export interface MicrophoneCaptureOptions {
  loadRecorder?: () => RecordModule;
  // sox on macOS, arecord on Linux.
  recorder?: string;
}

type ActiveRecording = {
  recorder: Recorder;
  options: CaptureOptions;
  chunks: Uint8Array[];
  stopped: Promise<void>;
  failure: Error | null;
};

export const createMicrophoneCapture = (options: MicrophoneCaptureOptions = {}): AudioCaptureAdapter => {
  const load = options.loadRecorder ?? loadRecorder;
  let current: ActiveRecording | null = null;

  const finish = async (recording: ActiveRecording) => {
    recording.recorder.stop();
    await recording.stopped;
  };

  return {
    async start(capture) {
      if (current) throw new Error('Audio capture already running');
      const recorder = load().record({
        sampleRate: capture.sampleRate,
        channels: capture.channels,
        threshold: 0,
        verbose: false,
        audioType: 'raw',
        recorder: options.recorder,
      });
      const stream = recorder.stream();
      const recording: ActiveRecording = {
        recorder,
        options: capture,
        chunks: [],
        stopped: Promise.resolve(),
        failure: null,
      };
      recording.stopped = new Promise<void>((resolve) => {
        stream.on('close', () => resolve());
        stream.on('end', () => resolve());
        stream.on('error', (error: Error) => {
          recording.failure = error;
          resolve();
        });
      });
      stream.on('data', (chunk: Buffer | string) => {
        const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
        recording.chunks.push(new Uint8Array(buffer));
      });
      current = recording;
    },
    async stop() {
      const recording = current;
      current = null;
      if (!recording) return { data: new Uint8Array(), durationMs: 0 };
      await finish(recording);
      if (recording.failure && !recording.chunks.length) throw recording.failure;
      const data = concatChunks(recording.chunks);
      return {
        data,
        durationMs: pcmDurationMs(data.length, recording.options.sampleRate, recording.options.channels),
      };
    },
    async cancel() {
      const recording = current;
      current = null;
      if (!recording) return;
      await finish(recording);
    },
  };
};

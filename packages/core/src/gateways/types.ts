import type { ClipboardPayload } from '../commands/types';
import type { InsertionMethod } from '../domain/schemas';

export interface CaptureOptions {
  sampleRate: number;
  channels: number;
}

export interface CapturedAudio {
  data: Uint8Array;
  durationMs: number;
}

/** Raw PCM source. Implemented by the platform package over the system recorder. */
export interface AudioCapture {
  start(options: CaptureOptions): Promise<void>;
  stop(): Promise<CapturedAudio>;
  cancel(): Promise<void>;
}

export interface RecordingGateway {
  start(): Promise<void>;
  stop(): Promise<string>;
  cancel(): Promise<void>;
  isRecording(): boolean;
  cleanup(path: string): Promise<void>;
}

export type TranscriptionOutcome = { kind: 'speech'; text: string } | { kind: 'noSpeech' };

export interface TranscriptionGateway {
  readonly backend: 'local' | 'remote';
  transcribe(path: string): Promise<TranscriptionOutcome>;
}

export interface InsertionGateway {
  insert(text: string, method: InsertionMethod): Promise<boolean>;
  readClipboard(): Promise<ClipboardPayload>;
}

export interface ClipboardImage {
  data: Uint8Array;
  format: string;
}

export interface ClipboardAccess {
  readText(): Promise<string | null>;
  writeText(text: string): Promise<void>;
  readImage(): Promise<ClipboardImage | null>;
}

export interface KeystrokeAccess {
  paste(): Promise<void>;
  type(text: string): Promise<void>;
}

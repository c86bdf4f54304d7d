// Contract between the job queue and whatever runs a conversion

import { ErrorCode } from '../../common/errors/conversion-error';
import { QualityPreset, VideoQuality } from '../quality-presets';

export interface TranscodeRequest {
  jobId: string;
  inputPath: string;
  outputPath: string;
  durationSeconds: number;
  sizeBytes: number;
  quality: VideoQuality;
  preserveMetadata: boolean;
}

export type TranscodeOutcome =
  | { status: 'completed'; outputPath: string; sizeBytes: number; preset: QualityPreset }
  | { status: 'failed'; errorCode: ErrorCode; message: string }
  | { status: 'cancelled' };

export type TranscodeMessage =
  | { type: 'progress'; jobId: string; percent: number }
  | { type: 'complete'; jobId: string; outcome: TranscodeOutcome };

export type TranscodeSink = (message: TranscodeMessage) => void;

export interface TranscodeHandle {
  /** Ask the conversion to stop; the sink still receives a final `complete`. */
  cancel(): void;
  /** Settles after the final `complete` has been delivered. Never rejects. */
  done: Promise<void>;
}

export interface TranscodingAdapter {
  execute(request: TranscodeRequest, sink: TranscodeSink): TranscodeHandle;
}

export interface TranscodingOptions {
  progressIntervalMs: number;
  killGraceMs: number;
  diskSpaceMarginBytes: number;
}

export const TRANSCODING_ADAPTER = Symbol('TRANSCODING_ADAPTER');
export const FFMPEG_RUNNER = Symbol('FFMPEG_RUNNER');
export const TRANSCODING_OPTIONS = Symbol('TRANSCODING_OPTIONS');

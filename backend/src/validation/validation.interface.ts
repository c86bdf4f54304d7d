// Types shared by the validator and its callers

import { ErrorCode } from '../common/errors/conversion-error';
import { AudioFile, MetadataValue } from '../conversion/models/audio-file';

export interface ValidationResult {
  path: string;
  filename: string;
  isValid: boolean;
  sizeBytes: number;
  durationSeconds: number;
  sampleRate: number;
  bitrate: number;
  metadata: Record<string, MetadataValue>;
  errorCode: ErrorCode | null;
  errorMessage: string | null;
  suggestedAction: string | null;
  // Technical reason, for logs
  detail: string | null;
  audioFile: AudioFile | null;
}

export interface FileValidatorOptions {
  maxFileSizeBytes: number;
}

export const MEDIA_PROBER = Symbol('MEDIA_PROBER');
export const FILE_VALIDATOR_OPTIONS = Symbol('FILE_VALIDATOR_OPTIONS');

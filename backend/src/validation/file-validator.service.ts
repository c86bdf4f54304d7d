// backend/src/validation/file-validator.service.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import * as fs from 'fs';
import * as path from 'path';
import type { MediaProber } from '../bridges/ffprobe-bridge';
import {
  ConversionError,
  ErrorCode,
  classifyError,
  describeError,
  errorMessage,
} from '../common/errors/conversion-error';
import { AudioFile, MetadataValue } from '../conversion/models/audio-file';
import { AUDIO_EXTENSIONS, SIGNATURE_BYTES, detectAudioSignature } from './audio-signature';
import {
  FILE_VALIDATOR_OPTIONS,
  FileValidatorOptions,
  MEDIA_PROBER,
  ValidationResult,
} from './validation.interface';

async function readHeader(filePath: string): Promise<Buffer> {
  const handle = await fs.promises.open(filePath, 'r');
  try {
    const buffer = Buffer.alloc(SIGNATURE_BYTES);
    const { bytesRead } = await handle.read(buffer, 0, SIGNATURE_BYTES, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

/**
 * Decides whether a dropped file can be converted.
 * Checks run cheapest first and stop at the first failure; validate() never throws.
 */
@Injectable()
export class FileValidatorService {
  private readonly logger = new Logger(FileValidatorService.name);

  constructor(
    @Inject(MEDIA_PROBER) private readonly prober: MediaProber,
    @Inject(FILE_VALIDATOR_OPTIONS) private readonly options: FileValidatorOptions,
  ) {}

  async validate(filePath: string): Promise<ValidationResult> {
    const resolved = path.resolve(filePath);
    const base = this.emptyResult(resolved);

    // 1. Exists, is a file, is readable
    let sizeBytes: number;
    try {
      const stats = await fs.promises.stat(resolved);
      if (!stats.isFile()) {
        return this.reject(base, ErrorCode.FILE_INVALID_FORMAT, 'Path is not a regular file');
      }
      await fs.promises.access(resolved, fs.constants.R_OK);
      sizeBytes = stats.size;
    } catch (error) {
      return this.reject(base, classifyError(error), errorMessage(error));
    }
    base.sizeBytes = sizeBytes;

    // 2. Extension
    const extension = path.extname(resolved).toLowerCase();
    if (!AUDIO_EXTENSIONS.has(extension)) {
      return this.reject(base, ErrorCode.FILE_INVALID_FORMAT, `Unsupported extension "${extension || '(none)'}"`);
    }

    // 3. Header and stream parse; an empty file has no header
    let header: Buffer;
    try {
      header = await readHeader(resolved);
    } catch (error) {
      return this.reject(base, classifyError(error), errorMessage(error));
    }

    if (!detectAudioSignature(header)) {
      return this.reject(base, ErrorCode.FILE_INVALID_FORMAT, 'No recognizable audio header');
    }

    try {
      const info = await this.prober.getMediaInfo(resolved);
      if (!info.hasAudio) {
        throw new ConversionError(ErrorCode.FILE_CORRUPTED, 'No audio stream found');
      }
      if (!(info.duration > 0)) {
        throw new ConversionError(ErrorCode.FILE_CORRUPTED, 'Audio duration could not be determined');
      }

      base.durationSeconds = info.duration;
      base.sampleRate = info.sampleRate ?? 0;
      base.bitrate = info.bitrate ?? 0;
      base.metadata = this.collectMetadata(info.tags, info.audioCodec, info.channels);
    } catch (error) {
      return this.reject(base, classifyError(error), errorMessage(error));
    }

    // 4. Size ceiling
    if (sizeBytes > this.options.maxFileSizeBytes) {
      return this.reject(
        base,
        ErrorCode.FILE_TOO_LARGE,
        `${sizeBytes} bytes exceeds the ${this.options.maxFileSizeBytes} byte limit`,
      );
    }

    const audioFile = new AudioFile({
      path: resolved,
      sizeBytes,
      durationSeconds: base.durationSeconds,
      sampleRate: base.sampleRate,
      bitrate: base.bitrate,
      metadata: base.metadata,
      isValid: true,
    });

    this.logger.log(`Validated ${audioFile.filename} (${audioFile.durationSeconds.toFixed(1)}s)`);
    return { ...base, isValid: true, audioFile };
  }

  /**
   * Validate each path in order; one bad file never affects the others
   */
  async validateMany(filePaths: string[]): Promise<ValidationResult[]> {
    const results: ValidationResult[] = [];
    for (const filePath of filePaths) {
      results.push(await this.validate(filePath));
    }
    return results;
  }

  private collectMetadata(
    tags: Record<string, string>,
    codec: string | undefined,
    channels: number | undefined,
  ): Record<string, MetadataValue> {
    const metadata: Record<string, MetadataValue> = {};
    for (const [key, value] of Object.entries(tags)) {
      metadata[key.toLowerCase()] = value;
    }
    if (codec) metadata.codec = codec;
    if (channels !== undefined) metadata.channels = channels;
    return metadata;
  }

  private emptyResult(resolved: string): ValidationResult {
    return {
      path: resolved,
      filename: path.basename(resolved),
      isValid: false,
      sizeBytes: 0,
      durationSeconds: 0,
      sampleRate: 0,
      bitrate: 0,
      metadata: {},
      errorCode: null,
      errorMessage: null,
      suggestedAction: null,
      detail: null,
      audioFile: null,
    };
  }

  private reject(base: ValidationResult, code: ErrorCode, detail: string): ValidationResult {
    const description = describeError(code);
    this.logger.warn(`Rejected ${base.filename}: ${code} (${detail})`);
    return {
      ...base,
      isValid: false,
      errorCode: code,
      errorMessage: description.message,
      suggestedAction: description.suggestedAction,
      detail,
      audioFile: null,
    };
  }
}

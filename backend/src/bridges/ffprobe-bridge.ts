/**
 * FFprobe Bridge - Process wrapper for the FFprobe binary
 * Probes media files for duration, stream and tag information
 */

import { spawn } from 'child_process';
import { Logger } from '@nestjs/common';
import { ConversionError, ErrorCode } from '../common/errors/conversion-error';

export interface StreamInfo {
  index: number;
  codec_name?: string;
  codec_type: 'video' | 'audio' | 'subtitle' | 'data' | 'attachment';
  sample_rate?: string;
  channels?: number;
  bit_rate?: string;
  duration?: string;
  tags?: Record<string, string>;
  [key: string]: unknown;
}

export interface FormatInfo {
  filename: string;
  nb_streams: number;
  format_name: string;
  duration?: string;
  size?: string;
  bit_rate?: string;
  tags?: Record<string, string>;
  [key: string]: unknown;
}

export interface ProbeResult {
  streams: StreamInfo[];
  format: FormatInfo;
}

export interface MediaInfo {
  duration: number;         // Duration in seconds
  hasAudio: boolean;
  hasVideo: boolean;
  audioCodec?: string;
  sampleRate?: number;
  channels?: number;
  bitrate?: number;         // Bits per second
  format: string;
  tags: Record<string, string>;
}

/**
 * Anything that can describe a media file - FfprobeBridge in production
 */
export interface MediaProber {
  getMediaInfo(filePath: string): Promise<MediaInfo>;
}

function isProbeResult(value: unknown): value is ProbeResult {
  if (typeof value !== 'object' || value === null) return false;
  if (!('streams' in value) || !('format' in value)) return false;
  return Array.isArray(value.streams) && typeof value.format === 'object' && value.format !== null;
}

function toNumber(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = parseFloat(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Reduce raw ffprobe JSON to what conversion needs
 */
export function summarizeProbe(result: ProbeResult): MediaInfo {
  const audioStream = result.streams.find(s => s.codec_type === 'audio');
  const videoStream = result.streams.find(s => s.codec_type === 'video');

  // Duration from format first, then from the audio stream
  const duration = toNumber(result.format.duration) ?? toNumber(audioStream?.duration) ?? 0;

  const bitrate = toNumber(result.format.bit_rate) ?? toNumber(audioStream?.bit_rate);
  const sampleRate = toNumber(audioStream?.sample_rate);

  // Container tags win over stream tags with the same key
  const tags: Record<string, string> = {
    ...(audioStream?.tags ?? {}),
    ...(result.format.tags ?? {}),
  };

  return {
    duration,
    hasAudio: !!audioStream,
    hasVideo: !!videoStream,
    audioCodec: audioStream?.codec_name,
    sampleRate: sampleRate !== undefined ? Math.round(sampleRate) : undefined,
    channels: audioStream?.channels,
    bitrate: bitrate !== undefined ? Math.round(bitrate) : undefined,
    format: result.format.format_name,
    tags,
  };
}

export class FfprobeBridge implements MediaProber {
  private binaryPath: string;
  private readonly logger = new Logger(FfprobeBridge.name);

  constructor(ffprobePath: string) {
    this.binaryPath = ffprobePath;
    this.logger.log(`Initialized with binary: ${ffprobePath}`);
  }

  get path(): string {
    return this.binaryPath;
  }

  /**
   * Probe a media file and return raw JSON result
   */
  probe(filePath: string): Promise<ProbeResult> {
    return new Promise((resolve, reject) => {
      const args = [
        '-v', 'error',
        '-print_format', 'json',
        '-show_format',
        '-show_streams',
        filePath,
      ];

      this.logger.debug(`Probing: ${filePath}`);

      const proc = spawn(this.binaryPath, args, { stdio: ['ignore', 'pipe', 'pipe'] });
      let stdout = '';
      let stderr = '';

      proc.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      proc.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      proc.on('close', (code) => {
        if (code !== 0) {
          this.logger.warn(`Failed with code ${code}: ${stderr.trim()}`);
          reject(new ConversionError(ErrorCode.FILE_CORRUPTED, `ffprobe exited with code ${code}: ${stderr.trim()}`));
          return;
        }

        let parsed: unknown;
        try {
          parsed = JSON.parse(stdout);
        } catch (e) {
          reject(new ConversionError(ErrorCode.FILE_CORRUPTED, `Failed to parse ffprobe output: ${e}`));
          return;
        }

        if (!isProbeResult(parsed)) {
          reject(new ConversionError(ErrorCode.FILE_CORRUPTED, 'ffprobe output has no streams or format section'));
          return;
        }

        this.logger.debug(`Probe complete: ${parsed.streams.length} streams`);
        resolve(parsed);
      });

      proc.on('error', (err: NodeJS.ErrnoException) => {
        this.logger.error(`Spawn error: ${err.message}`);

        if (err.message.includes('bad CPU type') || err.code === 'ENOEXEC') {
          reject(new ConversionError(
            ErrorCode.CONVERSION_PROCESS_FAILED,
            `FFprobe binary has wrong architecture for this system (${process.arch})`,
          ));
        } else if (err.code === 'ENOENT') {
          reject(new ConversionError(ErrorCode.CONVERSION_PROCESS_FAILED, `FFprobe binary not found at: ${this.binaryPath}`));
        } else {
          reject(new ConversionError(ErrorCode.CONVERSION_PROCESS_FAILED, err.message));
        }
      });
    });
  }

  async getMediaInfo(filePath: string): Promise<MediaInfo> {
    return summarizeProbe(await this.probe(filePath));
  }
}

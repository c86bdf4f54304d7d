// backend/src/conversion/transcoding/ffmpeg-transcoding.adapter.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import * as fs from 'fs';
import * as path from 'path';
import type { FfmpegProgress, FfmpegResult, FfmpegRunner } from '../../bridges/ffmpeg-bridge';
import {
  ConversionError,
  ErrorCode,
  classifyError,
  classifyStderr,
  errorMessage,
} from '../../common/errors/conversion-error';
import { QUALITY_PRESETS, QualityPreset } from '../quality-presets';
import { ProgressThrottle } from './progress-throttle';
import {
  FFMPEG_RUNNER,
  TRANSCODING_OPTIONS,
  TranscodeHandle,
  TranscodeOutcome,
  TranscodeRequest,
  TranscodeSink,
  TranscodingAdapter,
  TranscodingOptions,
} from './transcoding.interface';

/**
 * FFmpeg arguments for a black still video under the source audio
 */
export function buildConversionArgs(request: TranscodeRequest, preset: QualityPreset): string[] {
  return [
    '-y',
    '-nostdin',
    '-hide_banner',
    '-f', 'lavfi',
    '-i', `color=c=black:s=${preset.width}x${preset.height}:r=${preset.fps}`,
    '-i', request.inputPath,
    '-map', '0:v:0',
    '-map', '1:a:0',
    '-c:v', 'libx264',
    '-preset', 'veryfast',
    '-tune', 'stillimage',
    '-crf', String(preset.crf),
    '-pix_fmt', 'yuv420p',
    '-r', String(preset.fps),
    '-c:a', 'aac',
    '-b:a', preset.audioBitrate,
    '-shortest',
    '-movflags', '+faststart',
    '-map_metadata', request.preserveMetadata ? '1' : '-1',
    '-t', request.durationSeconds.toFixed(3),
    request.outputPath,
  ];
}

/**
 * Runs one conversion per execute() call through the shared FFmpeg runner
 */
@Injectable()
export class FfmpegTranscodingAdapter implements TranscodingAdapter {
  private readonly logger = new Logger(FfmpegTranscodingAdapter.name);

  constructor(
    @Inject(FFMPEG_RUNNER) private readonly runner: FfmpegRunner,
    @Inject(TRANSCODING_OPTIONS) private readonly options: TranscodingOptions,
  ) {}

  execute(request: TranscodeRequest, sink: TranscodeSink): TranscodeHandle {
    let cancelled = false;
    let started = false;

    const isCancelled = () => cancelled;
    const markStarted = () => {
      started = true;
    };

    const done = this.convert(request, sink, isCancelled, markStarted)
      .catch((error: unknown): TranscodeOutcome => {
        this.logger.error(`[${request.jobId}] Conversion error: ${errorMessage(error)}`);
        return { status: 'failed', errorCode: classifyError(error), message: errorMessage(error) };
      })
      .then((outcome) => {
        sink({ type: 'complete', jobId: request.jobId, outcome });
      });

    return {
      cancel: () => {
        if (cancelled) return;
        cancelled = true;
        this.logger.log(`[${request.jobId}] Cancel requested`);
        if (started) {
          this.runner.abort(request.jobId, this.options.killGraceMs);
        }
      },
      done,
    };
  }

  private async convert(
    request: TranscodeRequest,
    sink: TranscodeSink,
    isCancelled: () => boolean,
    markStarted: () => void,
  ): Promise<TranscodeOutcome> {
    const preset = QUALITY_PRESETS[request.quality];
    const outputDir = path.dirname(request.outputPath);

    await fs.promises.mkdir(outputDir, { recursive: true });
    await this.ensureDiskSpace(outputDir, request.sizeBytes);

    if (isCancelled()) {
      return { status: 'cancelled' };
    }

    const throttle = new ProgressThrottle(this.options.progressIntervalMs, (percent) =>
      sink({ type: 'progress', jobId: request.jobId, percent }),
    );
    const onProgress = (progress: FfmpegProgress) => {
      if (progress.processId === request.jobId) {
        throttle.update(progress.percent);
      }
    };

    this.runner.on('progress', onProgress);
    let result: FfmpegResult;
    try {
      const running = this.runner.run(buildConversionArgs(request, preset), {
        duration: request.durationSeconds,
        processId: request.jobId,
      });
      markStarted();
      throttle.start();
      result = await running;
    } catch (error) {
      await this.removePartial(request);
      throw error;
    } finally {
      throttle.stop();
      this.runner.off('progress', onProgress);
    }

    if (result.aborted || isCancelled()) {
      await this.removePartial(request);
      return { status: 'cancelled' };
    }

    if (!result.success) {
      await this.removePartial(request);
      return {
        status: 'failed',
        errorCode: classifyStderr(result.stderrTail),
        message: result.error ?? 'FFmpeg failed',
      };
    }

    const sizeBytes = await this.outputSize(request.outputPath);
    if (sizeBytes === 0) {
      await this.removePartial(request);
      return {
        status: 'failed',
        errorCode: ErrorCode.CONVERSION_PROCESS_FAILED,
        message: 'FFmpeg exited cleanly but produced no output',
      };
    }

    sink({ type: 'progress', jobId: request.jobId, percent: 100 });
    this.logger.log(`[${request.jobId}] Wrote ${request.outputPath} (${sizeBytes} bytes)`);
    return { status: 'completed', outputPath: request.outputPath, sizeBytes, preset };
  }

  private async ensureDiskSpace(dir: string, inputBytes: number): Promise<void> {
    let available: number;
    try {
      const stats = await fs.promises.statfs(dir);
      available = stats.bavail * stats.bsize;
    } catch (error) {
      this.logger.warn(`Could not read free space for ${dir}: ${errorMessage(error)}`);
      return;
    }

    const required = inputBytes + this.options.diskSpaceMarginBytes;
    if (available < required) {
      throw new ConversionError(
        ErrorCode.DISK_SPACE_LOW,
        `${available} bytes free in ${dir}, ${required} required`,
      );
    }
  }

  private async outputSize(outputPath: string): Promise<number> {
    try {
      return (await fs.promises.stat(outputPath)).size;
    } catch {
      return 0;
    }
  }

  private async removePartial(request: TranscodeRequest): Promise<void> {
    try {
      await fs.promises.rm(request.outputPath, { force: true });
    } catch (error) {
      this.logger.warn(`[${request.jobId}] Could not remove partial output: ${errorMessage(error)}`);
    }
  }
}

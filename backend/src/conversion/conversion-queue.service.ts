// Conversion Queue Service - runs conversion jobs in submission order with bounded concurrency

import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import {
  ConversionError,
  ErrorCode,
  classifyError,
  describeError,
  errorMessage,
} from '../common/errors/conversion-error';
import { ConversionResult, InternalEvent } from '../common/websocket.types';
import {
  ApplicationSettings,
  ApplicationState,
  ApplicationStateSnapshot,
} from '../state/application-state';
import { FileValidatorService } from '../validation/file-validator.service';
import { BatchCounts, ConversionEventsService } from './conversion-events.service';
import { AudioFile } from './models/audio-file';
import { ConversionJob, JobStatus } from './models/conversion-job';
import { VideoFile } from './models/video-file';
import { deriveOutputPath, disambiguateOutputPath } from './output-path';
import {
  TRANSCODING_ADAPTER,
  TranscodeHandle,
  TranscodeMessage,
  TranscodeOutcome,
  TranscodingAdapter,
} from './transcoding/transcoding.interface';

export interface ConversionQueueOptions {
  maxPendingJobs: number;
  maxConcurrentJobsCap: number;
}

export const CONVERSION_QUEUE_OPTIONS = Symbol('CONVERSION_QUEUE_OPTIONS');

export interface AcceptedFile {
  path: string;
  filename: string;
  jobId: string;
  outputPath: string;
}

export interface RejectedFile {
  path: string;
  filename: string;
  errorCode: ErrorCode;
  errorMessage: string;
  suggestedAction: string;
}

export interface SubmitResult {
  accepted: AcceptedFile[];
  rejected: RejectedFile[];
}

export interface CancelAllResult {
  cancelled: number;
  cancelling: number;
}

function emptyCounts(): BatchCounts {
  return { succeeded: 0, failed: 0, cancelled: 0 };
}

@Injectable()
export class ConversionQueueService implements OnModuleDestroy {
  private readonly logger = new Logger(ConversionQueueService.name);

  private readonly handles = new Map<string, TranscodeHandle>();
  private running = false;
  private pumpScheduled = false;
  private shuttingDown = false;
  private batchCounts = emptyCounts();

  constructor(
    private readonly state: ApplicationState,
    @Inject(TRANSCODING_ADAPTER) private readonly adapter: TranscodingAdapter,
    private readonly validator: FileValidatorService,
    private readonly events: ConversionEventsService,
    @Inject(CONVERSION_QUEUE_OPTIONS) private readonly options: ConversionQueueOptions,
  ) {
    this.logger.log(
      `Conversion queue initialized (max pending ${options.maxPendingJobs}, ` +
        `concurrency ${state.settings.maxConcurrentJobs})`,
    );
  }

  /**
   * Lifecycle hook - stop dispatching and wait for running FFmpeg processes to be cancelled
   */
  async onModuleDestroy(): Promise<void> {
    this.shuttingDown = true;
    this.running = false;

    const pending = Array.from(this.handles.values()).map(h => h.done);
    this.cancelAll();

    if (pending.length > 0) {
      this.logger.log(`Waiting for ${pending.length} conversion(s) to stop`);
      await Promise.all(pending);
    }
    this.logger.log('Conversion queue shut down');
  }

  /**
   * Add a validated file to the end of the queue. Never waits for the conversion.
   */
  enqueue(audioFile: AudioFile): string {
    return this.addToQueue(audioFile).id;
  }

  private addToQueue(audioFile: AudioFile): ConversionJob {
    if (!audioFile.isValid) {
      throw new ConversionError(ErrorCode.FILE_INVALID_FORMAT, `${audioFile.filename} has not passed validation`);
    }

    const pending = this.state.queuedJobs.length;
    if (pending >= this.options.maxPendingJobs) {
      throw new ConversionError(
        ErrorCode.QUEUE_CAPACITY_EXCEEDED,
        `Queue already holds ${pending} pending jobs`,
      );
    }

    const candidate = deriveOutputPath(audioFile.path, this.state.settings.outputDirectory);
    const outputPath = disambiguateOutputPath(
      candidate,
      this.state.activeJobs.map(j => j.outputPath),
    );

    const job = new ConversionJob(audioFile, outputPath);
    this.state.addJob(job);
    this.logger.log(`Queued job ${job.id}: ${audioFile.filename} -> ${outputPath}`);
    this.events.emitStatus(job);

    if (this.running) {
      this.schedulePump();
    }
    return job;
  }

  /**
   * Validate dropped paths and queue the ones that pass. One bad path never
   * stops the rest of the batch.
   */
  async submitPaths(paths: string[], autoStart = false): Promise<SubmitResult> {
    const result: SubmitResult = { accepted: [], rejected: [] };
    const validations = await this.validator.validateMany(paths);

    for (const validation of validations) {
      if (!validation.isValid || !validation.audioFile) {
        const code = validation.errorCode ?? ErrorCode.FILE_INVALID_FORMAT;
        result.rejected.push({ path: validation.path, filename: validation.filename, ...this.userError(code) });
        continue;
      }

      try {
        const job = this.addToQueue(validation.audioFile);
        result.accepted.push({
          path: validation.path,
          filename: validation.filename,
          jobId: job.id,
          outputPath: job.outputPath,
        });
      } catch (error) {
        const code = classifyError(error);
        this.logger.warn(`Could not queue ${validation.filename}: ${errorMessage(error)}`);
        result.rejected.push({ path: validation.path, filename: validation.filename, ...this.userError(code) });
      }
    }

    this.logger.log(`Submitted ${paths.length} path(s): ${result.accepted.length} accepted, ${result.rejected.length} rejected`);

    if (autoStart && result.accepted.length > 0) {
      this.startProcessing();
    }
    return result;
  }

  /**
   * Begin draining the queue. Returns the number of jobs waiting to run.
   */
  startProcessing(): number {
    if (this.shuttingDown) return 0;

    const queued = this.state.queuedJobs.length;
    if (!this.state.hasActiveJobs) {
      this.logger.log('Nothing to process');
      return 0;
    }

    this.running = true;
    this.schedulePump();
    return queued;
  }

  /**
   * Cancel one job. Queued jobs are cancelled immediately; a processing job is
   * marked cancelled once its FFmpeg process has actually ended.
   * Returns false when the job is unknown or already finished.
   */
  cancel(jobId: string): boolean {
    const job = this.state.activeJobs.find(j => j.id === jobId);
    if (!job) return false;

    if (job.status === JobStatus.QUEUED) {
      this.logger.log(`Cancelling queued job ${jobId}`);
      this.finish(job, { status: 'cancelled' });
      return true;
    }

    if (!job.cancelRequested) {
      this.logger.log(`Cancelling running job ${jobId}`);
      job.requestCancel();
      this.handles.get(jobId)?.cancel();
    }
    return true;
  }

  cancelAll(): CancelAllResult {
    const result: CancelAllResult = { cancelled: 0, cancelling: 0 };

    for (const job of this.state.queuedJobs) {
      if (this.cancel(job.id)) result.cancelled++;
    }
    for (const job of this.state.processingJobs) {
      // Already stopping from an earlier request
      if (job.cancelRequested) continue;
      if (this.cancel(job.id)) result.cancelling++;
    }

    if (result.cancelled + result.cancelling > 0) {
      this.logger.log(`Cancel all: ${result.cancelled} queued cancelled, ${result.cancelling} running stopping`);
    }
    return result;
  }

  getSnapshot(): ApplicationStateSnapshot {
    return this.state.snapshot();
  }

  getJob(jobId: string): ConversionJob | undefined {
    return this.state.findJob(jobId);
  }

  clearCompleted(): number {
    return this.state.clearCompleted();
  }

  /**
   * Follow settings changes. A raised concurrency limit starts waiting jobs right
   * away; a lowered one lets running jobs finish.
   */
  @OnEvent(InternalEvent.SETTINGS_UPDATED)
  applySettings(settings: ApplicationSettings): void {
    this.state.applySettings(settings);
    this.logger.log(`Settings applied (quality ${settings.videoQuality}, concurrency ${settings.maxConcurrentJobs})`);
    if (this.running) {
      this.schedulePump();
    }
  }

  private get concurrencyLimit(): number {
    return Math.max(1, Math.min(this.state.settings.maxConcurrentJobs, this.options.maxConcurrentJobsCap));
  }

  private schedulePump(): void {
    if (this.pumpScheduled) return;
    this.pumpScheduled = true;
    setImmediate(() => {
      this.pumpScheduled = false;
      this.pump();
    });
  }

  private pump(): void {
    if (!this.running || this.shuttingDown) return;

    try {
      while (this.state.processingJobs.length < this.concurrencyLimit) {
        const next = this.state.queuedJobs[0];
        if (!next) break;
        this.dispatch(next);
      }
    } catch (error) {
      this.logger.error(`Dispatch loop error: ${errorMessage(error)}`);
    }
  }

  private dispatch(job: ConversionJob): void {
    job.start();
    this.logger.log(`Starting job ${job.id}: ${job.audioFile.filename}`);
    // The adapter's first progress report covers 0%
    this.events.emitStatus(job);

    const settings = this.state.settings;
    let handle: TranscodeHandle;
    try {
      handle = this.adapter.execute(
        {
          jobId: job.id,
          inputPath: job.audioFile.path,
          outputPath: job.outputPath,
          durationSeconds: job.audioFile.durationSeconds,
          sizeBytes: job.audioFile.sizeBytes,
          quality: settings.videoQuality,
          preserveMetadata: settings.preserveMetadata,
        },
        (message) => this.onMessage(job, message),
      );
    } catch (error) {
      this.finish(job, { status: 'failed', errorCode: classifyError(error), message: errorMessage(error) });
      return;
    }

    // A sink that completes synchronously has already finished the job
    if (job.isTerminal) return;

    this.handles.set(job.id, handle);
    handle.done.catch((error: unknown) => {
      this.logger.error(`Job ${job.id} handle failed: ${errorMessage(error)}`);
      if (!job.isTerminal) {
        this.finish(job, { status: 'failed', errorCode: classifyError(error), message: errorMessage(error) });
      }
    });
  }

  private onMessage(job: ConversionJob, message: TranscodeMessage): void {
    if (job.isTerminal) {
      this.logger.debug(`Ignoring ${message.type} for finished job ${job.id}`);
      return;
    }

    try {
      if (message.type === 'progress') {
        job.updateProgress(message.percent);
        this.events.emitProgress(job);
        return;
      }
      this.finish(job, message.outcome);
    } catch (error) {
      this.logger.error(`Error handling ${message.type} for job ${job.id}: ${errorMessage(error)}`);
    }
  }

  private finish(job: ConversionJob, outcome: TranscodeOutcome): void {
    switch (outcome.status) {
      case 'completed': {
        const { preset } = outcome;
        job.complete(
          new VideoFile(outcome.outputPath, job.audioFile, preset.width, preset.height, preset.fps, outcome.sizeBytes),
        );
        this.batchCounts.succeeded++;
        this.logger.log(`Job ${job.id} completed in ${job.processingTimeSeconds?.toFixed(1)}s`);
        break;
      }
      case 'failed':
        job.fail(describeError(outcome.errorCode).message, outcome.errorCode);
        this.batchCounts.failed++;
        this.logger.warn(`Job ${job.id} failed: ${outcome.errorCode} (${outcome.message})`);
        break;
      case 'cancelled':
        job.cancel();
        this.batchCounts.cancelled++;
        this.logger.log(`Job ${job.id} cancelled`);
        break;
    }

    this.handles.delete(job.id);
    this.state.moveToCompleted(job);
    this.events.emitStatus(job);
    this.events.emitComplete(this.toResult(job));

    if (!this.state.hasActiveJobs) {
      const counts = this.batchCounts;
      this.batchCounts = emptyCounts();
      this.running = false;
      this.logger.log(
        `Batch complete: ${counts.succeeded} succeeded, ${counts.failed} failed, ${counts.cancelled} cancelled`,
      );
      this.events.emitBatchComplete(counts);
    } else if (this.running) {
      this.schedulePump();
    }
  }

  private toResult(job: ConversionJob): ConversionResult {
    const code =
      job.status === JobStatus.CANCELLED ? ErrorCode.OPERATION_CANCELLED : job.errorCode;
    const description = code ? describeError(code) : null;

    return {
      jobId: job.id,
      success: job.status === JobStatus.COMPLETED,
      status: job.status,
      outputPath: job.videoFile?.path ?? null,
      errorCode: code,
      errorMessage: description?.message ?? null,
      suggestedAction: description?.suggestedAction ?? null,
      processingTimeSeconds: job.processingTimeSeconds ?? 0,
    };
  }

  private userError(code: ErrorCode): Omit<RejectedFile, 'path' | 'filename'> {
    const description = describeError(code);
    return {
      errorCode: code,
      errorMessage: description.message,
      suggestedAction: description.suggestedAction,
    };
  }
}

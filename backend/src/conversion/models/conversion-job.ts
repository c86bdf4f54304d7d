// ConversionJob - lifecycle of one audio file's conversion

import { v4 as uuidv4 } from 'uuid';
import { ErrorCode, IllegalTransitionError } from '../../common/errors/conversion-error';
import { AudioFile } from './audio-file';
import { VideoFile } from './video-file';

export enum JobStatus {
  QUEUED = 'queued',
  PROCESSING = 'processing',
  COMPLETED = 'completed',
  FAILED = 'failed',
  CANCELLED = 'cancelled',
}

const TERMINAL_STATUSES: ReadonlySet<JobStatus> = new Set([
  JobStatus.COMPLETED,
  JobStatus.FAILED,
  JobStatus.CANCELLED,
]);

export function isTerminalStatus(status: JobStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export interface ConversionJobSnapshot {
  id: string;
  status: JobStatus;
  progress: number;
  audioFile: ReturnType<AudioFile['toJSON']>;
  outputPath: string;
  videoFile: ReturnType<VideoFile['toJSON']> | null;
  createdAt: string;
  startedAt: string | null;
  completedAt: string | null;
  errorCode: ErrorCode | null;
  errorMessage: string | null;
  cancelRequested: boolean;
  estimatedRemainingSeconds: number | null;
  processingTimeSeconds: number | null;
}

export class ConversionJob {
  readonly id: string;
  readonly createdAt = new Date();

  private _status = JobStatus.QUEUED;
  private _progress = 0;
  private _startedAt: Date | null = null;
  private _completedAt: Date | null = null;
  private _videoFile: VideoFile | null = null;
  private _errorCode: ErrorCode | null = null;
  private _errorMessage: string | null = null;
  private _cancelRequested = false;
  private _estimatedRemainingSeconds: number | null = null;

  constructor(
    readonly audioFile: AudioFile,
    readonly outputPath: string,
    id: string = uuidv4(),
  ) {
    this.id = id;
  }

  get status(): JobStatus {
    return this._status;
  }

  get progress(): number {
    return this._progress;
  }

  get startedAt(): Date | null {
    return this._startedAt;
  }

  get completedAt(): Date | null {
    return this._completedAt;
  }

  get videoFile(): VideoFile | null {
    return this._videoFile;
  }

  get errorCode(): ErrorCode | null {
    return this._errorCode;
  }

  get errorMessage(): string | null {
    return this._errorMessage;
  }

  get cancelRequested(): boolean {
    return this._cancelRequested;
  }

  get estimatedRemainingSeconds(): number | null {
    return this._estimatedRemainingSeconds;
  }

  get isTerminal(): boolean {
    return isTerminalStatus(this._status);
  }

  /**
   * Wall time spent processing, up to completion (or now while still running)
   */
  get processingTimeSeconds(): number | null {
    if (!this._startedAt) return null;
    const end = this._completedAt ?? new Date();
    return (end.getTime() - this._startedAt.getTime()) / 1000;
  }

  start(now: Date = new Date()): void {
    this.assertStatus('start', JobStatus.QUEUED);
    this._status = JobStatus.PROCESSING;
    this._startedAt = now;
    this._progress = 0;
  }

  /**
   * Record progress. Values are clamped to 0-100 and never move backwards.
   */
  updateProgress(percent: number, now: Date = new Date()): void {
    this.assertStatus('update progress', JobStatus.PROCESSING);

    const clamped = Math.max(0, Math.min(100, percent));
    if (clamped < this._progress) return;
    this._progress = clamped;

    if (this._startedAt && clamped > 0) {
      const elapsed = (now.getTime() - this._startedAt.getTime()) / 1000;
      this._estimatedRemainingSeconds = Math.max(0, Math.round((elapsed / clamped) * (100 - clamped)));
    }
  }

  complete(videoFile: VideoFile, now: Date = new Date()): void {
    this.assertStatus('complete', JobStatus.PROCESSING);
    this._status = JobStatus.COMPLETED;
    this._videoFile = videoFile;
    this._progress = 100;
    this._estimatedRemainingSeconds = 0;
    this._completedAt = now;
  }

  fail(message: string, code: ErrorCode = ErrorCode.CONVERSION_PROCESS_FAILED, now: Date = new Date()): void {
    this.assertStatus('fail', JobStatus.PROCESSING);
    this._status = JobStatus.FAILED;
    this._errorCode = code;
    this._errorMessage = message;
    this._estimatedRemainingSeconds = null;
    this._completedAt = now;
  }

  /**
   * Flag that the user asked for cancellation while the subprocess winds down
   */
  requestCancel(): void {
    this.assertStatus('request cancel', JobStatus.QUEUED, JobStatus.PROCESSING);
    this._cancelRequested = true;
  }

  cancel(now: Date = new Date()): void {
    this.assertStatus('cancel', JobStatus.QUEUED, JobStatus.PROCESSING);
    this._status = JobStatus.CANCELLED;
    this._cancelRequested = true;
    this._estimatedRemainingSeconds = null;
    this._completedAt = now;
  }

  toJSON(): ConversionJobSnapshot {
    return {
      id: this.id,
      status: this._status,
      progress: this._progress,
      audioFile: this.audioFile.toJSON(),
      outputPath: this.outputPath,
      videoFile: this._videoFile?.toJSON() ?? null,
      createdAt: this.createdAt.toISOString(),
      startedAt: this._startedAt?.toISOString() ?? null,
      completedAt: this._completedAt?.toISOString() ?? null,
      errorCode: this._errorCode,
      errorMessage: this._errorMessage,
      cancelRequested: this._cancelRequested,
      estimatedRemainingSeconds: this._estimatedRemainingSeconds,
      processingTimeSeconds: this.processingTimeSeconds,
    };
  }

  private assertStatus(action: string, ...allowed: JobStatus[]): void {
    if (!allowed.includes(this._status)) {
      throw new IllegalTransitionError(this.id, this._status, action);
    }
  }
}

// Application State - active jobs plus a bounded history of finished ones

import { ConversionJob, ConversionJobSnapshot, JobStatus } from '../conversion/models/conversion-job';
import { VideoQuality } from '../conversion/quality-presets';

export interface ApplicationSettings {
  outputDirectory: string | null;
  preserveMetadata: boolean;
  videoQuality: VideoQuality;
  maxConcurrentJobs: number;
}

export const DEFAULT_SETTINGS: ApplicationSettings = {
  outputDirectory: null,
  preserveMetadata: true,
  videoQuality: 'medium',
  maxConcurrentJobs: 1,
};

export const DEFAULT_COMPLETED_CAPACITY = 20;

export interface ApplicationStateSnapshot {
  activeJobs: ConversionJobSnapshot[];
  completedJobs: ConversionJobSnapshot[];
  settings: ApplicationSettings;
  counts: {
    queued: number;
    processing: number;
    completed: number;
  };
}

/**
 * Owned by the conversion queue, which is its only writer. Everyone else
 * reads through snapshot().
 */
export class ApplicationState {
  private readonly active: ConversionJob[] = [];
  private readonly completed: ConversionJob[] = [];
  private current: ApplicationSettings;

  constructor(
    settings: Partial<ApplicationSettings> = {},
    readonly completedCapacity: number = DEFAULT_COMPLETED_CAPACITY,
  ) {
    if (completedCapacity < 1) {
      throw new RangeError(`completedCapacity must be at least 1, got ${completedCapacity}`);
    }
    this.current = { ...DEFAULT_SETTINGS, ...settings };
  }

  get settings(): Readonly<ApplicationSettings> {
    return this.current;
  }

  get activeJobs(): readonly ConversionJob[] {
    return this.active;
  }

  get completedJobs(): readonly ConversionJob[] {
    return this.completed;
  }

  get queuedJobs(): ConversionJob[] {
    return this.active.filter(j => j.status === JobStatus.QUEUED);
  }

  get processingJobs(): ConversionJob[] {
    return this.active.filter(j => j.status === JobStatus.PROCESSING);
  }

  get hasActiveJobs(): boolean {
    return this.active.length > 0;
  }

  applySettings(settings: Partial<ApplicationSettings>): void {
    this.current = { ...this.current, ...settings };
  }

  addJob(job: ConversionJob): void {
    if (!this.active.includes(job)) {
      this.active.push(job);
    }
  }

  /**
   * Move a finished job into history, evicting the oldest entry at capacity
   */
  moveToCompleted(job: ConversionJob): void {
    const index = this.active.indexOf(job);
    if (index >= 0) {
      this.active.splice(index, 1);
    }

    this.completed.push(job);
    while (this.completed.length > this.completedCapacity) {
      this.completed.shift();
    }
  }

  clearCompleted(): number {
    const cleared = this.completed.length;
    this.completed.length = 0;
    return cleared;
  }

  findJob(jobId: string): ConversionJob | undefined {
    return this.active.find(j => j.id === jobId) ?? this.completed.find(j => j.id === jobId);
  }

  snapshot(): ApplicationStateSnapshot {
    const processing = this.processingJobs.length;
    return {
      activeJobs: this.active.map(j => j.toJSON()),
      completedJobs: this.completed.map(j => j.toJSON()),
      settings: { ...this.current },
      counts: {
        queued: this.active.length - processing,
        processing,
        completed: this.completed.length,
      },
    };
  }
}

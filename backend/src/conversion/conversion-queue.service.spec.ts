import { EventEmitter2 } from '@nestjs/event-emitter';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { MediaInfo, MediaProber } from '../bridges/ffprobe-bridge';
import { ConversionError, ErrorCode } from '../common/errors/conversion-error';
import {
  BatchCompletePayload,
  ConversionCompletePayload,
  ConversionProgressPayload,
  InternalEvent,
} from '../common/websocket.types';
import { ApplicationState } from '../state/application-state';
import { FileValidatorService } from '../validation/file-validator.service';
import { ConversionEventsService } from './conversion-events.service';
import { ConversionQueueService } from './conversion-queue.service';
import { AudioFile } from './models/audio-file';
import { JobStatus } from './models/conversion-job';
import { QUALITY_PRESETS } from './quality-presets';
import {
  TranscodeHandle,
  TranscodeOutcome,
  TranscodeRequest,
  TranscodeSink,
  TranscodingAdapter,
} from './transcoding/transcoding.interface';

interface FakeRun {
  request: TranscodeRequest;
  cancelRequests: number;
  progress(percent: number): void;
  finish(outcome: TranscodeOutcome): void;
}

class FakeAdapter implements TranscodingAdapter {
  runs: FakeRun[] = [];
  failNextExecute = false;

  execute(request: TranscodeRequest, sink: TranscodeSink): TranscodeHandle {
    if (this.failNextExecute) {
      this.failNextExecute = false;
      throw new Error('adapter exploded');
    }

    let settle: () => void = () => undefined;
    const done = new Promise<void>(resolve => {
      settle = resolve;
    });

    const run: FakeRun = {
      request,
      cancelRequests: 0,
      progress: percent => sink({ type: 'progress', jobId: request.jobId, percent }),
      finish: outcome => {
        sink({ type: 'complete', jobId: request.jobId, outcome });
        settle();
      },
    };
    this.runs.push(run);

    return {
      cancel: () => {
        run.cancelRequests++;
      },
      done,
    };
  }

  runFor(jobId: string): FakeRun {
    const run = this.runs.find(r => r.request.jobId === jobId);
    if (!run) throw new Error(`No run for ${jobId}`);
    return run;
  }
}

class StubProber implements MediaProber {
  async getMediaInfo(): Promise<MediaInfo> {
    return { duration: 30, hasAudio: true, hasVideo: false, format: 'mp3', tags: {} };
  }
}

const completed = (outputPath: string): TranscodeOutcome => ({
  status: 'completed',
  outputPath,
  sizeBytes: 4096,
  preset: QUALITY_PRESETS.medium,
});

function makeAudio(name: string): AudioFile {
  return new AudioFile({
    path: `/music/${name}.mp3`,
    sizeBytes: 1000,
    durationSeconds: 30,
    sampleRate: 44100,
    bitrate: 128000,
    metadata: {},
    isValid: true,
  });
}

// Lets pending setImmediate dispatches run
const flush = () => new Promise<void>(resolve => setImmediate(resolve));

describe('ConversionQueueService', () => {
  let emitter: EventEmitter2;
  let state: ApplicationState;
  let adapter: FakeAdapter;
  let queue: ConversionQueueService;
  let completes: ConversionCompletePayload[];
  let batches: BatchCompletePayload[];
  let progress: ConversionProgressPayload[];

  function createQueue(maxConcurrentJobs = 1, maxPendingJobs = 50): void {
    state = new ApplicationState({ maxConcurrentJobs });
    queue = new ConversionQueueService(
      state,
      adapter,
      new FileValidatorService(new StubProber(), { maxFileSizeBytes: 1024 * 1024 }),
      new ConversionEventsService(emitter),
      { maxPendingJobs, maxConcurrentJobsCap: 5 },
    );
  }

  function complete(jobId: string): void {
    const run = adapter.runFor(jobId);
    run.finish(completed(run.request.outputPath));
  }

  beforeEach(() => {
    emitter = new EventEmitter2();
    adapter = new FakeAdapter();
    completes = [];
    batches = [];
    progress = [];
    emitter.on(InternalEvent.CONVERSION_COMPLETE, (p: ConversionCompletePayload) => completes.push(p));
    emitter.on(InternalEvent.BATCH_COMPLETE, (p: BatchCompletePayload) => batches.push(p));
    emitter.on(InternalEvent.CONVERSION_PROGRESS, (p: ConversionProgressPayload) => progress.push(p));
    createQueue();
  });

  describe('enqueue', () => {
    it('queues a job without starting it', async () => {
      const jobId = queue.enqueue(makeAudio('a'));
      await flush();

      const job = queue.getJob(jobId);
      expect(job?.status).toBe(JobStatus.QUEUED);
      expect(job?.outputPath).toBe('/music/a_video.mp4');
      expect(adapter.runs).toHaveLength(0);
    });

    it('writes into the output directory override', () => {
      state.applySettings({ outputDirectory: '/videos' });
      const jobId = queue.enqueue(makeAudio('a'));
      expect(queue.getJob(jobId)?.outputPath).toBe('/videos/a_video.mp4');
    });

    it('gives colliding outputs a numeric suffix', () => {
      const first = queue.enqueue(makeAudio('a'));
      const second = queue.enqueue(makeAudio('a'));
      const third = queue.enqueue(makeAudio('a'));

      expect(queue.getJob(first)?.outputPath).toBe('/music/a_video.mp4');
      expect(queue.getJob(second)?.outputPath).toBe('/music/a_video_2.mp4');
      expect(queue.getJob(third)?.outputPath).toBe('/music/a_video_3.mp4');
    });

    it('rejects a file that failed validation', () => {
      const invalid = new AudioFile({
        path: '/music/bad.mp3',
        sizeBytes: 0,
        durationSeconds: 0,
        sampleRate: 0,
        bitrate: 0,
        metadata: {},
        isValid: false,
      });
      expect(() => queue.enqueue(invalid)).toThrow(ConversionError);
      expect(state.activeJobs).toHaveLength(0);
    });

    it('rejects the 51st pending job', () => {
      for (let i = 0; i < 50; i++) {
        queue.enqueue(makeAudio(`track${i}`));
      }

      let caught: unknown;
      try {
        queue.enqueue(makeAudio('one-too-many'));
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ConversionError);
      expect(caught instanceof ConversionError && caught.code).toBe(ErrorCode.QUEUE_CAPACITY_EXCEEDED);
      expect(state.activeJobs).toHaveLength(50);
    });
  });

  describe('processing', () => {
    it('runs jobs one at a time in submission order', async () => {
      const ids = ['a', 'b', 'c'].map(name => queue.enqueue(makeAudio(name)));
      expect(queue.startProcessing()).toBe(3);
      await flush();

      for (const [index, id] of ids.entries()) {
        expect(adapter.runs).toHaveLength(index + 1);
        expect(adapter.runs[index].request.jobId).toBe(id);
        expect(state.processingJobs.map(j => j.id)).toEqual([id]);
        complete(id);
        await flush();
      }

      expect(completes.map(c => [c.jobId, c.success, c.status])).toEqual([
        [ids[0], true, JobStatus.COMPLETED],
        [ids[1], true, JobStatus.COMPLETED],
        [ids[2], true, JobStatus.COMPLETED],
      ]);
      expect(completes[0].outputPath).toBe('/music/a_video.mp4');
      expect(completes[0].errorCode).toBeNull();
      expect(batches).toHaveLength(1);
      expect(batches[0]).toMatchObject({ succeeded: 3, failed: 0, cancelled: 0 });
      expect(state.completedJobs.map(j => j.id)).toEqual(ids);
      expect(state.hasActiveJobs).toBe(false);
    });

    it('passes the current settings to the adapter', async () => {
      state.applySettings({ videoQuality: 'high', preserveMetadata: false });
      const id = queue.enqueue(makeAudio('a'));
      queue.startProcessing();
      await flush();

      expect(adapter.runs[0].request).toEqual({
        jobId: id,
        inputPath: '/music/a.mp3',
        outputPath: '/music/a_video.mp4',
        durationSeconds: 30,
        sizeBytes: 1000,
        quality: 'high',
        preserveMetadata: false,
      });
    });

    it('builds the video file from the tier preset', async () => {
      const id = queue.enqueue(makeAudio('a'));
      queue.startProcessing();
      await flush();
      complete(id);

      const video = queue.getJob(id)?.videoFile;
      expect(video?.resolution).toBe('1280x720');
      expect(video?.fps).toBe(30);
      expect(video?.sizeBytes).toBe(4096);
      expect(video?.source.filename).toBe('a.mp3');
    });

    it('applies progress without ever going backwards', async () => {
      const id = queue.enqueue(makeAudio('a'));
      queue.startProcessing();
      await flush();

      const run = adapter.runFor(id);
      run.progress(30);
      run.progress(20);
      run.progress(55.5);
      run.progress(100);
      complete(id);

      const percents = progress.map(p => p.percent);
      expect(percents).toEqual([30, 30, 55.5, 100]);
      expect(queue.getJob(id)?.progress).toBe(100);
    });

    it('leaves the first progress report to the adapter', async () => {
      const id = queue.enqueue(makeAudio('a'));
      queue.startProcessing();
      await flush();

      expect(queue.getJob(id)?.status).toBe(JobStatus.PROCESSING);
      expect(progress).toEqual([]);

      adapter.runFor(id).progress(0);
      expect(progress.map(p => p.percent)).toEqual([0]);
    });

    it('keeps going after a failed job', async () => {
      const [a, b] = ['a', 'b'].map(name => queue.enqueue(makeAudio(name)));
      queue.startProcessing();
      await flush();

      adapter.runFor(a).finish({ status: 'failed', errorCode: ErrorCode.FILE_CORRUPTED, message: 'moov atom not found' });
      await flush();
      complete(b);

      const failed = queue.getJob(a);
      expect(failed?.status).toBe(JobStatus.FAILED);
      expect(failed?.errorCode).toBe(ErrorCode.FILE_CORRUPTED);
      expect(failed?.errorMessage).toBe('The file appears to be damaged');
      expect(queue.getJob(b)?.status).toBe(JobStatus.COMPLETED);

      expect(completes[0]).toMatchObject({
        jobId: a,
        success: false,
        status: JobStatus.FAILED,
        outputPath: null,
        errorCode: ErrorCode.FILE_CORRUPTED,
        errorMessage: 'The file appears to be damaged',
        suggestedAction: 'Try another copy of the file, or re-export it from the original source.',
      });
      expect(batches[0]).toMatchObject({ succeeded: 1, failed: 1, cancelled: 0 });
    });

    it('fails a job whose adapter throws and moves on', async () => {
      const [a, b] = ['a', 'b'].map(name => queue.enqueue(makeAudio(name)));
      adapter.failNextExecute = true;
      queue.startProcessing();
      await flush();
      await flush();

      expect(queue.getJob(a)?.status).toBe(JobStatus.FAILED);
      expect(queue.getJob(a)?.errorCode).toBe(ErrorCode.CONVERSION_PROCESS_FAILED);
      expect(adapter.runs.map(r => r.request.jobId)).toEqual([b]);
    });

    it('ignores messages for a job that already finished', async () => {
      const id = queue.enqueue(makeAudio('a'));
      queue.startProcessing();
      await flush();

      const run = adapter.runFor(id);
      run.finish(completed(run.request.outputPath));
      run.progress(10);
      run.finish({ status: 'failed', errorCode: ErrorCode.CONVERSION_PROCESS_FAILED, message: 'late' });

      expect(queue.getJob(id)?.status).toBe(JobStatus.COMPLETED);
      expect(completes).toHaveLength(1);
    });

    it('runs up to the concurrency limit at once', async () => {
      createQueue(2);
      const [a, b, c] = ['a', 'b', 'c'].map(name => queue.enqueue(makeAudio(name)));
      queue.startProcessing();
      await flush();

      expect(adapter.runs.map(r => r.request.jobId)).toEqual([a, b]);
      expect(state.processingJobs).toHaveLength(2);

      // Completion order may differ from submission order
      complete(b);
      await flush();
      expect(adapter.runs.map(r => r.request.jobId)).toEqual([a, b, c]);

      complete(c);
      complete(a);
      expect(completes.map(p => p.jobId)).toEqual([b, c, a]);
      expect(batches).toHaveLength(1);
    });

    it('picks up a raised concurrency limit right away', async () => {
      ['a', 'b', 'c'].forEach(name => queue.enqueue(makeAudio(name)));
      queue.startProcessing();
      await flush();
      expect(adapter.runs).toHaveLength(1);

      queue.applySettings({ ...state.settings, maxConcurrentJobs: 3 });
      await flush();
      expect(adapter.runs).toHaveLength(3);
    });

    it('lets running jobs finish when the limit is lowered', async () => {
      createQueue(2);
      const [a, b, c] = ['a', 'b', 'c'].map(name => queue.enqueue(makeAudio(name)));
      queue.startProcessing();
      await flush();

      queue.applySettings({ ...state.settings, maxConcurrentJobs: 1 });
      await flush();
      expect(state.processingJobs.map(j => j.id)).toEqual([a, b]);

      complete(a);
      await flush();
      expect(adapter.runs).toHaveLength(2);

      complete(b);
      await flush();
      expect(adapter.runs.map(r => r.request.jobId)).toEqual([a, b, c]);
    });

    it('reports nothing to do when the queue is empty', () => {
      expect(queue.startProcessing()).toBe(0);
    });
  });

  describe('cancel', () => {
    it('cancels a queued job immediately without running it', async () => {
      const [a, b] = ['a', 'b'].map(name => queue.enqueue(makeAudio(name)));
      expect(queue.cancel(b)).toBe(true);

      expect(queue.getJob(b)?.status).toBe(JobStatus.CANCELLED);
      expect(completes[0]).toMatchObject({
        jobId: b,
        success: false,
        status: JobStatus.CANCELLED,
        errorCode: ErrorCode.OPERATION_CANCELLED,
        processingTimeSeconds: 0,
      });

      queue.startProcessing();
      await flush();
      expect(adapter.runs.map(r => r.request.jobId)).toEqual([a]);
    });

    it('waits for the adapter before marking a running job cancelled', async () => {
      const [a, b] = ['a', 'b'].map(name => queue.enqueue(makeAudio(name)));
      queue.startProcessing();
      await flush();

      expect(queue.cancel(a)).toBe(true);
      expect(queue.cancel(a)).toBe(true);
      const job = queue.getJob(a);
      expect(job?.status).toBe(JobStatus.PROCESSING);
      expect(job?.cancelRequested).toBe(true);
      expect(adapter.runFor(a).cancelRequests).toBe(1);

      adapter.runFor(a).finish({ status: 'cancelled' });
      expect(job?.status).toBe(JobStatus.CANCELLED);

      await flush();
      expect(adapter.runs.map(r => r.request.jobId)).toEqual([a, b]);
    });

    it('returns false for unknown or finished jobs', async () => {
      expect(queue.cancel('no-such-job')).toBe(false);

      const id = queue.enqueue(makeAudio('a'));
      queue.startProcessing();
      await flush();
      complete(id);
      expect(queue.cancel(id)).toBe(false);
    });

    it('cancels everything with cancelAll', async () => {
      const [a, b, c] = ['a', 'b', 'c'].map(name => queue.enqueue(makeAudio(name)));
      queue.startProcessing();
      await flush();

      expect(queue.cancelAll()).toEqual({ cancelled: 2, cancelling: 1 });
      expect(queue.getJob(b)?.status).toBe(JobStatus.CANCELLED);
      expect(queue.getJob(c)?.status).toBe(JobStatus.CANCELLED);
      expect(queue.getJob(a)?.status).toBe(JobStatus.PROCESSING);
      expect(batches).toHaveLength(0);

      adapter.runFor(a).finish({ status: 'cancelled' });
      expect(batches).toHaveLength(1);
      expect(batches[0]).toMatchObject({ succeeded: 0, failed: 0, cancelled: 3 });
    });

    it('counts a running job only once across repeated cancelAll calls', async () => {
      const id = queue.enqueue(makeAudio('a'));
      queue.startProcessing();
      await flush();

      expect(queue.cancelAll()).toEqual({ cancelled: 0, cancelling: 1 });
      expect(queue.cancelAll()).toEqual({ cancelled: 0, cancelling: 0 });
      expect(adapter.runFor(id).cancelRequests).toBe(1);
    });

    it('cancels running conversions on shutdown', async () => {
      const id = queue.enqueue(makeAudio('a'));
      queue.startProcessing();
      await flush();

      const shutdown = queue.onModuleDestroy();
      expect(adapter.runFor(id).cancelRequests).toBe(1);

      adapter.runFor(id).finish({ status: 'cancelled' });
      await shutdown;

      expect(queue.getJob(id)?.status).toBe(JobStatus.CANCELLED);
      expect(queue.startProcessing()).toBe(0);
    });
  });

  describe('submitPaths', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'queue-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('queues valid paths and reports the rest', async () => {
      const good = path.join(dir, 'good.mp3');
      fs.writeFileSync(good, Buffer.from('ID3\u0004\u0000\u0000\u0000\u0000\u0000\u0000', 'latin1'));
      const missing = path.join(dir, 'missing.mp3');

      const result = await queue.submitPaths([good, missing], true);

      expect(result.accepted).toHaveLength(1);
      expect(result.accepted[0]).toMatchObject({
        path: good,
        filename: 'good.mp3',
        outputPath: path.join(dir, 'good_video.mp4'),
      });
      expect(result.rejected).toEqual([
        {
          path: missing,
          filename: 'missing.mp3',
          errorCode: ErrorCode.FILE_NOT_FOUND,
          errorMessage: 'The file could not be found',
          suggestedAction: 'Check that the file still exists and try again.',
        },
      ]);

      await flush();
      expect(adapter.runs.map(r => r.request.jobId)).toEqual([result.accepted[0].jobId]);
    });

    it('reports capacity rejections per path', async () => {
      createQueue(1, 1);
      const files = ['a.mp3', 'b.mp3'].map(name => {
        const filePath = path.join(dir, name);
        fs.writeFileSync(filePath, Buffer.from('fLaC\u0000\u0000\u0000"', 'latin1'));
        return filePath;
      });

      const result = await queue.submitPaths(files);

      expect(result.accepted.map(a => a.filename)).toEqual(['a.mp3']);
      expect(result.rejected.map(r => [r.filename, r.errorCode])).toEqual([
        ['b.mp3', ErrorCode.QUEUE_CAPACITY_EXCEEDED],
      ]);
      await flush();
      expect(adapter.runs).toHaveLength(0);
    });
  });

  it('clears finished jobs from history', async () => {
    const id = queue.enqueue(makeAudio('a'));
    queue.cancel(id);

    expect(queue.getSnapshot().counts).toEqual({ queued: 0, processing: 0, completed: 1 });
    expect(queue.clearCompleted()).toBe(1);
    expect(queue.getJob(id)).toBeUndefined();
  });
});

import { HttpException, HttpStatus } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { ErrorCode } from '../common/errors/conversion-error';
import { httpStatusFor } from '../common/errors/http-error';
import { ConversionController } from './conversion.controller';
import { ConversionQueueService, SubmitResult } from './conversion-queue.service';
import { AudioFile } from './models/audio-file';
import { ConversionJob } from './models/conversion-job';

function makeJob(): ConversionJob {
  const audio = new AudioFile({
    path: '/music/a.mp3',
    sizeBytes: 10,
    durationSeconds: 5,
    sampleRate: 44100,
    bitrate: 128000,
    metadata: {},
    isValid: true,
  });
  return new ConversionJob(audio, '/music/a_video.mp4', 'job-1');
}

async function statusOf(action: () => unknown): Promise<number | undefined> {
  try {
    await action();
  } catch (error) {
    return error instanceof HttpException ? error.getStatus() : undefined;
  }
  return undefined;
}

describe('ConversionController', () => {
  const queue = {
    submitPaths: jest.fn<Promise<SubmitResult>, [string[], boolean]>(),
    startProcessing: jest.fn<number, []>(),
    cancel: jest.fn<boolean, [string]>(),
    cancelAll: jest.fn(),
    getJob: jest.fn<ConversionJob | undefined, [string]>(),
    getSnapshot: jest.fn(),
    clearCompleted: jest.fn<number, []>(),
  };
  let controller: ConversionController;

  beforeEach(async () => {
    jest.resetAllMocks();
    const moduleRef = await Test.createTestingModule({
      controllers: [ConversionController],
      providers: [{ provide: ConversionQueueService, useValue: queue }],
    }).compile();
    controller = moduleRef.get(ConversionController);
  });

  it('maps error codes to HTTP statuses', () => {
    expect(httpStatusFor(ErrorCode.QUEUE_CAPACITY_EXCEEDED)).toBe(HttpStatus.TOO_MANY_REQUESTS);
    expect(httpStatusFor(ErrorCode.FILE_NOT_FOUND)).toBe(HttpStatus.NOT_FOUND);
    expect(httpStatusFor(ErrorCode.FILE_CORRUPTED)).toBe(HttpStatus.BAD_REQUEST);
  });

  it('submits dropped paths', async () => {
    const result: SubmitResult = {
      accepted: [{ path: '/music/a.mp3', filename: 'a.mp3', jobId: 'job-1', outputPath: '/music/a_video.mp4' }],
      rejected: [],
    };
    queue.submitPaths.mockResolvedValue(result);

    await expect(controller.submit({ paths: ['/music/a.mp3'], autoStart: true })).resolves.toEqual({
      success: true,
      ...result,
    });
    expect(queue.submitPaths).toHaveBeenCalledWith(['/music/a.mp3'], true);
  });

  it('reports partial rejection without failing the request', async () => {
    queue.submitPaths.mockResolvedValue({
      accepted: [],
      rejected: [
        {
          path: '/music/b.txt',
          filename: 'b.txt',
          errorCode: ErrorCode.FILE_INVALID_FORMAT,
          errorMessage: 'This file is not a supported audio format',
          suggestedAction: 'Drop an MP3, WAV, M4A, AAC, FLAC, OGG or Opus file.',
        },
      ],
    });

    const response = await controller.submit({ paths: ['/music/b.txt'] });
    expect(response.success).toBe(false);
    expect(queue.submitPaths).toHaveBeenCalledWith(['/music/b.txt'], false);
  });

  it('answers 429 when the whole drop hits the queue limit', async () => {
    queue.submitPaths.mockResolvedValue({
      accepted: [],
      rejected: [
        {
          path: '/music/a.mp3',
          filename: 'a.mp3',
          errorCode: ErrorCode.QUEUE_CAPACITY_EXCEEDED,
          errorMessage: 'Too many files are waiting to be converted',
          suggestedAction: 'Wait for some conversions to finish before adding more files.',
        },
      ],
    });

    expect(await statusOf(() => controller.submit({ paths: ['/music/a.mp3'] }))).toBe(429);
  });

  it('starts processing', () => {
    queue.startProcessing.mockReturnValue(3);
    expect(controller.start()).toEqual({ success: true, queued: 3 });
  });

  it('cancels an active job', () => {
    const job = makeJob();
    queue.getJob.mockReturnValue(job);
    queue.cancel.mockReturnValue(true);

    const response = controller.cancel('job-1');
    expect(response.success).toBe(true);
    expect(response.job.id).toBe('job-1');
    expect(queue.cancel).toHaveBeenCalledWith('job-1');
  });

  it('answers 404 for an unknown job and 409 for a finished one', async () => {
    queue.getJob.mockReturnValue(undefined);
    expect(await statusOf(() => controller.cancel('nope'))).toBe(404);
    expect(await statusOf(() => controller.getJob('nope'))).toBe(404);

    const job = makeJob();
    job.cancel();
    queue.getJob.mockReturnValue(job);
    expect(await statusOf(() => controller.cancel('job-1'))).toBe(409);
    expect(queue.cancel).not.toHaveBeenCalled();
  });

  it('clears completed jobs', () => {
    queue.clearCompleted.mockReturnValue(4);
    expect(controller.clearCompleted()).toEqual({ success: true, cleared: 4 });
  });
});

import { AudioFile } from '../conversion/models/audio-file';
import { ConversionJob, JobStatus } from '../conversion/models/conversion-job';
import { ApplicationState, DEFAULT_SETTINGS } from './application-state';

function makeJob(name: string): ConversionJob {
  const audio = new AudioFile({
    path: `/music/${name}.mp3`,
    sizeBytes: 100,
    durationSeconds: 10,
    sampleRate: 44100,
    bitrate: 128000,
    metadata: {},
    isValid: true,
  });
  return new ConversionJob(audio, `/music/${name}_video.mp4`);
}

function finished(name: string): ConversionJob {
  const job = makeJob(name);
  job.cancel();
  return job;
}

describe('ApplicationState', () => {
  it('starts from default settings', () => {
    const state = new ApplicationState();
    expect(state.settings).toEqual(DEFAULT_SETTINGS);
    expect(state.completedCapacity).toBe(20);
    expect(state.hasActiveJobs).toBe(false);
  });

  it('overlays partial settings', () => {
    const state = new ApplicationState({ videoQuality: 'high' });
    expect(state.settings.videoQuality).toBe('high');
    expect(state.settings.maxConcurrentJobs).toBe(1);

    state.applySettings({ maxConcurrentJobs: 3 });
    expect(state.settings.videoQuality).toBe('high');
    expect(state.settings.maxConcurrentJobs).toBe(3);
  });

  it('rejects a history capacity below one', () => {
    expect(() => new ApplicationState({}, 0)).toThrow(RangeError);
  });

  it('keeps active jobs in insertion order and splits them by status', () => {
    const state = new ApplicationState();
    const a = makeJob('a');
    const b = makeJob('b');
    state.addJob(a);
    state.addJob(b);
    state.addJob(a);

    a.start();
    expect(state.activeJobs.map(j => j.id)).toEqual([a.id, b.id]);
    expect(state.processingJobs).toEqual([a]);
    expect(state.queuedJobs).toEqual([b]);
  });

  it('moves finished jobs into history', () => {
    const state = new ApplicationState();
    const job = makeJob('a');
    state.addJob(job);
    job.cancel();
    state.moveToCompleted(job);

    expect(state.activeJobs).toHaveLength(0);
    expect(state.completedJobs).toEqual([job]);
    expect(state.findJob(job.id)).toBe(job);
  });

  it('evicts the oldest completed job once history is full', () => {
    const state = new ApplicationState();
    const jobs = Array.from({ length: 21 }, (_, i) => finished(`track${i}`));
    for (const job of jobs) {
      state.moveToCompleted(job);
    }

    expect(state.completedJobs).toHaveLength(20);
    expect(state.completedJobs[0]).toBe(jobs[1]);
    expect(state.completedJobs[19]).toBe(jobs[20]);
    expect(state.findJob(jobs[0].id)).toBeUndefined();
  });

  it('honors a custom history size', () => {
    const state = new ApplicationState({}, 2);
    state.moveToCompleted(finished('a'));
    state.moveToCompleted(finished('b'));
    state.moveToCompleted(finished('c'));
    expect(state.completedJobs.map(j => j.audioFile.filename)).toEqual(['b.mp3', 'c.mp3']);
  });

  it('clears history and reports how many were removed', () => {
    const state = new ApplicationState();
    state.moveToCompleted(finished('a'));
    state.moveToCompleted(finished('b'));
    expect(state.clearCompleted()).toBe(2);
    expect(state.completedJobs).toHaveLength(0);
  });

  it('produces a detached snapshot with counts', () => {
    const state = new ApplicationState();
    const running = makeJob('a');
    const waiting = makeJob('b');
    state.addJob(running);
    state.addJob(waiting);
    running.start();
    state.moveToCompleted(finished('c'));

    const snapshot = state.snapshot();
    expect(snapshot.counts).toEqual({ queued: 1, processing: 1, completed: 1 });
    expect(snapshot.activeJobs.map(j => j.status)).toEqual([JobStatus.PROCESSING, JobStatus.QUEUED]);

    snapshot.settings.maxConcurrentJobs = 5;
    expect(state.settings.maxConcurrentJobs).toBe(1);
  });
});

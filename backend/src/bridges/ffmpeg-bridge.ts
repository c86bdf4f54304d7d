/**
 * FFmpeg Bridge - Process wrapper for the FFmpeg binary
 * Supports multiple concurrent processes with individualized progress feedback
 */

import { spawn, execFile, ChildProcess } from 'child_process';
import { EventEmitter } from 'events';
import * as crypto from 'crypto';
import { Logger, OnApplicationShutdown } from '@nestjs/common';
import { ConversionError, ErrorCode } from '../common/errors/conversion-error';

export const DEFAULT_KILL_GRACE_MS = 5000;

// Enough stderr to classify a failure without holding a whole encode log
const STDERR_TAIL_CHARS = 4000;

export interface FfmpegProgress {
  processId: string;
  percent: number;
  timeSeconds: number;
  time: string;
  speed?: string;
  fps?: number;
  bitrate?: string;
  size?: string;
}

export interface FfmpegProcessInfo {
  id: string;
  process: ChildProcess;
  args: string[];
  startTime: number;
  duration?: number;
  aborted: boolean;
  killTimer?: NodeJS.Timeout;
}

export interface FfmpegResult {
  processId: string;
  success: boolean;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  aborted: boolean;
  duration: number;
  stderrTail: string;
  error?: string;
}

export interface FfmpegRunOptions {
  duration?: number;  // Total duration in seconds for progress calculation
  processId?: string; // Custom process ID, auto-generated if not provided
}

/**
 * The slice of FfmpegBridge that conversion code depends on
 */
export interface FfmpegRunner {
  run(args: string[], options?: FfmpegRunOptions): Promise<FfmpegResult>;
  abort(processId: string, graceMs?: number): boolean;
  on(event: 'progress', listener: (progress: FfmpegProgress) => void): unknown;
  off(event: 'progress', listener: (progress: FfmpegProgress) => void): unknown;
}

/**
 * Convert an FFmpeg timestamp (HH:MM:SS.cc) to seconds
 */
export function parseTimestamp(time: string): number | null {
  const match = time.match(/^(\d+):(\d{2}):(\d{2}(?:\.\d+)?)$/);
  if (!match) return null;

  const hours = parseInt(match[1], 10);
  const minutes = parseInt(match[2], 10);
  const seconds = parseFloat(match[3]);
  return hours * 3600 + minutes * 60 + seconds;
}

/**
 * Parse FFmpeg progress from a stderr chunk. A chunk can carry several
 * carriage-return separated status lines; the last one wins.
 */
export function parseProgress(text: string, processId: string, totalDuration: number): FfmpegProgress | null {
  // FFmpeg outputs progress like: frame=  123 fps= 25 q=28.0 size=    1234kB time=00:00:05.12 bitrate= 1976.5kbits/s speed=1.02x
  const lines = text.split(/[\r\n]+/).filter(line => line.includes('time='));
  const line = lines[lines.length - 1];
  if (!line || totalDuration <= 0) return null;

  const timeMatch = line.match(/time=\s*(\d+:\d{2}:\d{2}(?:\.\d+)?)/);
  if (!timeMatch) return null;

  const timeSeconds = parseTimestamp(timeMatch[1]);
  if (timeSeconds === null) return null;

  const percent = Math.min((timeSeconds / totalDuration) * 100, 100);

  const progress: FfmpegProgress = {
    processId,
    percent: Math.round(percent * 10) / 10,
    timeSeconds,
    time: timeMatch[1],
  };

  const speedMatch = line.match(/speed=\s*(\d+\.?\d*)x/);
  if (speedMatch) progress.speed = speedMatch[1];

  const fpsMatch = line.match(/fps=\s*(\d+)/);
  if (fpsMatch) progress.fps = parseInt(fpsMatch[1], 10);

  const bitrateMatch = line.match(/bitrate=\s*([^\s]+)/);
  if (bitrateMatch) progress.bitrate = bitrateMatch[1];

  const sizeMatch = line.match(/size=\s*([^\s]+)/);
  if (sizeMatch) progress.size = sizeMatch[1];

  return progress;
}

export class FfmpegBridge extends EventEmitter implements FfmpegRunner, OnApplicationShutdown {
  private binaryPath: string;
  private activeProcesses = new Map<string, FfmpegProcessInfo>();
  private readonly logger = new Logger(FfmpegBridge.name);

  constructor(ffmpegPath: string) {
    super();
    this.binaryPath = ffmpegPath;
    this.logger.log(`Initialized with binary: ${ffmpegPath}`);
  }

  get path(): string {
    return this.binaryPath;
  }

  /**
   * Run FFmpeg with given arguments.
   * Resolves for every exit (check success); rejects only when the process cannot be spawned.
   */
  run(args: string[], options?: FfmpegRunOptions): Promise<FfmpegResult> {
    const processId = options?.processId || crypto.randomBytes(8).toString('hex');

    return new Promise((resolve, reject) => {
      this.logger.log(`[${processId}] Starting: ffmpeg ${args.join(' ')}`);

      const proc = spawn(this.binaryPath, args, { stdio: ['ignore', 'ignore', 'pipe'] });
      const startTime = Date.now();

      const processInfo: FfmpegProcessInfo = {
        id: processId,
        process: proc,
        args,
        startTime,
        duration: options?.duration,
        aborted: false,
      };

      this.activeProcesses.set(processId, processInfo);

      let stderrBuffer = '';
      let settled = false;

      proc.stderr?.on('data', (data: Buffer) => {
        const text = data.toString();
        stderrBuffer = (stderrBuffer + text).slice(-STDERR_TAIL_CHARS);

        if (options?.duration) {
          const progress = parseProgress(text, processId, options.duration);
          if (progress) {
            this.emit('progress', progress);
          }
        }
      });

      proc.on('close', (code, signal) => {
        if (settled) return;
        settled = true;

        const duration = Date.now() - startTime;
        this.release(processInfo);

        const base = {
          processId,
          exitCode: code,
          signal,
          aborted: processInfo.aborted,
          duration,
          stderrTail: stderrBuffer,
        };

        if (processInfo.aborted) {
          this.logger.log(`[${processId}] Aborted after ${duration}ms`);
          resolve({ ...base, success: false, error: 'Process was aborted' });
          return;
        }

        if (code === 0) {
          this.logger.log(`[${processId}] Completed successfully in ${duration}ms`);
          resolve({ ...base, success: true });
        } else {
          this.logger.error(`[${processId}] Failed with code ${code}`);
          this.logger.error(`[${processId}] stderr: ${stderrBuffer.slice(-500)}`);
          resolve({
            ...base,
            success: false,
            error: code === null ? `FFmpeg terminated by ${signal}` : `FFmpeg exited with code ${code}`,
          });
        }
      });

      proc.on('error', (err: NodeJS.ErrnoException) => {
        if (settled) return;
        settled = true;

        this.release(processInfo);
        this.logger.error(`[${processId}] Spawn error: ${err.message}`);

        // Check for architecture mismatch
        if (err.message.includes('bad CPU type') || err.code === 'ENOEXEC') {
          reject(new ConversionError(
            ErrorCode.CONVERSION_PROCESS_FAILED,
            `FFmpeg binary has wrong architecture for this system (${process.arch})`,
          ));
        } else if (err.code === 'ENOENT') {
          reject(new ConversionError(ErrorCode.CONVERSION_PROCESS_FAILED, `FFmpeg binary not found at: ${this.binaryPath}`));
        } else {
          reject(new ConversionError(ErrorCode.CONVERSION_PROCESS_FAILED, err.message));
        }
      });
    });
  }

  /**
   * Abort a running process: SIGTERM first, SIGKILL once the grace period runs out
   */
  abort(processId: string, graceMs: number = DEFAULT_KILL_GRACE_MS): boolean {
    const processInfo = this.activeProcesses.get(processId);
    if (!processInfo) {
      this.logger.warn(`Cannot abort ${processId}: not found`);
      return false;
    }
    if (processInfo.aborted) {
      return true;
    }

    this.logger.log(`[${processId}] Aborting process`);
    processInfo.aborted = true;

    const pid = processInfo.process.pid;
    if (process.platform === 'win32' && pid !== undefined) {
      execFile('taskkill', ['/pid', String(pid), '/T', '/F'], (error) => {
        if (error) {
          processInfo.process.kill('SIGKILL');
        }
      });
      return true;
    }

    processInfo.process.kill('SIGTERM');
    processInfo.killTimer = setTimeout(() => {
      if (this.activeProcesses.has(processId)) {
        this.logger.warn(`[${processId}] Did not exit within ${graceMs}ms, sending SIGKILL`);
        processInfo.process.kill('SIGKILL');
      }
    }, graceMs);
    processInfo.killTimer.unref();

    return true;
  }

  /**
   * Nest lifecycle hook - no FFmpeg process outlives the backend
   */
  onApplicationShutdown(): void {
    if (this.activeProcesses.size > 0) {
      this.abortAll();
    }
  }

  abortAll(): void {
    this.logger.log(`Aborting all ${this.activeProcesses.size} processes`);
    for (const processId of this.activeProcesses.keys()) {
      this.abort(processId);
    }
  }

  getActiveProcesses(): string[] {
    return Array.from(this.activeProcesses.keys());
  }

  /**
   * First line of `ffmpeg -version`, or null when the binary cannot run
   */
  version(timeoutMs = 5000): Promise<string | null> {
    return new Promise((resolve) => {
      execFile(this.binaryPath, ['-version'], { timeout: timeoutMs }, (error, stdout) => {
        if (error) {
          this.logger.warn(`FFmpeg version check failed: ${error.message}`);
          resolve(null);
          return;
        }
        const firstLine = stdout.split('\n')[0]?.trim();
        resolve(firstLine || null);
      });
    });
  }

  private release(processInfo: FfmpegProcessInfo): void {
    if (processInfo.killTimer) {
      clearTimeout(processInfo.killTimer);
    }
    this.activeProcesses.delete(processInfo.id);
  }
}

// backend/src/conversion/conversion-events.service.ts
import { Injectable } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import {
  BatchCompletePayload,
  ConversionCompletePayload,
  ConversionProgressPayload,
  ConversionResult,
  ConversionStatusPayload,
  InternalEvent,
} from '../common/websocket.types';
import { ConversionJob } from './models/conversion-job';

export interface BatchCounts {
  succeeded: number;
  failed: number;
  cancelled: number;
}

/**
 * Publishes conversion lifecycle events on the internal bus.
 * AppGateway relays them to Socket.IO clients.
 */
@Injectable()
export class ConversionEventsService {
  constructor(private readonly eventEmitter: EventEmitter2) {}

  emitProgress(job: ConversionJob): void {
    const payload: ConversionProgressPayload = {
      jobId: job.id,
      percent: job.progress,
      estimatedRemainingSeconds: job.estimatedRemainingSeconds,
      timestamp: this.getTimestamp(),
    };
    this.eventEmitter.emit(InternalEvent.CONVERSION_PROGRESS, payload);
  }

  emitStatus(job: ConversionJob): void {
    const payload: ConversionStatusPayload = {
      jobId: job.id,
      status: job.status,
      filename: job.audioFile.filename,
      timestamp: this.getTimestamp(),
    };
    this.eventEmitter.emit(InternalEvent.CONVERSION_STATUS, payload);
  }

  emitComplete(result: ConversionResult): void {
    const payload: ConversionCompletePayload = { ...result, timestamp: this.getTimestamp() };
    this.eventEmitter.emit(InternalEvent.CONVERSION_COMPLETE, payload);
  }

  emitBatchComplete(counts: BatchCounts): void {
    const payload: BatchCompletePayload = { ...counts, timestamp: this.getTimestamp() };
    this.eventEmitter.emit(InternalEvent.BATCH_COMPLETE, payload);
  }

  private getTimestamp(): string {
    return new Date().toISOString();
  }
}

// WebSocket Event Type Definitions
// Centralized registry of all WebSocket events and their payloads

import { ErrorCode } from './errors/conversion-error';
import { JobStatus } from '../conversion/models/conversion-job';
import { ApplicationSettings } from '../state/application-state';

/**
 * Conversion events
 */
export interface ConversionProgressPayload {
  jobId: string;
  percent: number;
  estimatedRemainingSeconds: number | null;
  timestamp: string;
}

export interface ConversionStatusPayload {
  jobId: string;
  status: JobStatus;
  filename: string;
  timestamp: string;
}

export interface ConversionResult {
  jobId: string;
  success: boolean;
  status: JobStatus;
  outputPath: string | null;
  errorCode: ErrorCode | null;
  errorMessage: string | null;
  suggestedAction: string | null;
  processingTimeSeconds: number;
}

export interface ConversionCompletePayload extends ConversionResult {
  timestamp: string;
}

export interface BatchCompletePayload {
  succeeded: number;
  failed: number;
  cancelled: number;
  timestamp: string;
}

/**
 * Settings events
 */
export interface SettingsUpdatedPayload {
  settings: ApplicationSettings;
}

/**
 * WebSocket Event Names
 */
export enum WebSocketEvent {
  CONVERSION_PROGRESS = 'conversion.progress',
  CONVERSION_STATUS = 'conversion.status',
  CONVERSION_COMPLETE = 'conversion.complete',
  BATCH_COMPLETE = 'conversion.batch-complete',
  SETTINGS_UPDATED = 'settings.updated',

  // Connection Management
  CONNECTION = 'connection',
  DISCONNECT = 'disconnect',
}

/**
 * Event Emitter Internal Event Names
 * These are used with @OnEvent decorators
 */
export enum InternalEvent {
  CONVERSION_PROGRESS = 'conversion.progress',
  CONVERSION_STATUS = 'conversion.status',
  CONVERSION_COMPLETE = 'conversion.complete',
  BATCH_COMPLETE = 'conversion.batch-complete',
  SETTINGS_UPDATED = 'settings.updated',
}

/**
 * Type-safe event payload mapping
 * Maps WebSocket events to their expected payload types
 */
export interface WebSocketEventMap {
  [WebSocketEvent.CONVERSION_PROGRESS]: ConversionProgressPayload;
  [WebSocketEvent.CONVERSION_STATUS]: ConversionStatusPayload;
  [WebSocketEvent.CONVERSION_COMPLETE]: ConversionCompletePayload;
  [WebSocketEvent.BATCH_COMPLETE]: BatchCompletePayload;
  [WebSocketEvent.SETTINGS_UPDATED]: SettingsUpdatedPayload;
}

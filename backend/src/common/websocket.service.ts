// WebSocket Service - Clean API for emitting WebSocket events
import { Injectable, Logger } from '@nestjs/common';
import { Server } from 'socket.io';
import { WebSocketEvent, WebSocketEventMap } from './websocket.types';

/**
 * WebSocketService is the only place that talks to the Socket.IO server.
 * Event names and payloads are checked against WebSocketEventMap.
 */
@Injectable()
export class WebSocketService {
  private server: Server | null = null;
  private readonly logger = new Logger(WebSocketService.name);

  /**
   * Set the Socket.IO server instance
   * Called by AppGateway during initialization
   */
  setServer(server: Server): void {
    this.server = server;
    this.logger.log('WebSocket server instance registered');
  }

  getServer(): Server | null {
    return this.server;
  }

  getConnectionCount(): number {
    return this.server?.sockets.sockets.size ?? 0;
  }

  /**
   * Generic emit method with type safety
   */
  emit<K extends keyof WebSocketEventMap>(
    event: K,
    payload: WebSocketEventMap[K],
  ): void {
    if (!this.server) {
      this.logger.warn(`Cannot emit ${event}: WebSocket server not initialized`);
      return;
    }

    try {
      this.server.emit(event, payload);
      this.logger.debug(`Emitted ${event} to ${this.getConnectionCount()} clients`);
    } catch (error) {
      this.logger.error(`Error emitting ${event}:`, error);
    }
  }

  /**
   * Conversion Events
   */
  emitConversionProgress(payload: WebSocketEventMap[WebSocketEvent.CONVERSION_PROGRESS]): void {
    this.emit(WebSocketEvent.CONVERSION_PROGRESS, payload);
  }

  emitConversionStatus(payload: WebSocketEventMap[WebSocketEvent.CONVERSION_STATUS]): void {
    this.logger.log(`Job ${payload.jobId} (${payload.filename}) is now ${payload.status}`);
    this.emit(WebSocketEvent.CONVERSION_STATUS, payload);
  }

  emitConversionComplete(payload: WebSocketEventMap[WebSocketEvent.CONVERSION_COMPLETE]): void {
    if (payload.success) {
      this.logger.log(`Conversion completed: jobId=${payload.jobId}, output=${payload.outputPath}`);
    } else {
      this.logger.warn(`Conversion ${payload.status}: jobId=${payload.jobId}, error=${payload.errorCode}`);
    }
    this.emit(WebSocketEvent.CONVERSION_COMPLETE, payload);
  }

  emitBatchComplete(payload: WebSocketEventMap[WebSocketEvent.BATCH_COMPLETE]): void {
    this.logger.log(
      `Batch complete: succeeded=${payload.succeeded}, failed=${payload.failed}, cancelled=${payload.cancelled}`,
    );
    this.emit(WebSocketEvent.BATCH_COMPLETE, payload);
  }

  emitSettingsUpdated(payload: WebSocketEventMap[WebSocketEvent.SETTINGS_UPDATED]): void {
    this.emit(WebSocketEvent.SETTINGS_UPDATED, payload);
  }
}

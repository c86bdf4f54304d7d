// App Gateway - Core WebSocket Infrastructure
import {
  WebSocketGateway,
  WebSocketServer,
  OnGatewayInit,
  OnGatewayConnection,
  OnGatewayDisconnect,
} from '@nestjs/websockets';
import { Server, Socket } from 'socket.io';
import { Logger, Injectable } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { WebSocketService } from './websocket.service';
import {
  BatchCompletePayload,
  ConversionCompletePayload,
  ConversionProgressPayload,
  ConversionStatusPayload,
  InternalEvent,
} from './websocket.types';
import { ApplicationSettings } from '../state/application-state';

/**
 * AppGateway owns the Socket.IO server and relays internal events to the
 * desktop shell. Services emit through EventEmitter2 and never touch the
 * gateway directly.
 */
@Injectable()
@WebSocketGateway({
  cors: true,
  transports: ['websocket', 'polling'],
  pingTimeout: 60000,
  pingInterval: 25000,
})
export class AppGateway
  implements OnGatewayInit, OnGatewayConnection, OnGatewayDisconnect
{
  @WebSocketServer()
  server!: Server;

  private readonly logger = new Logger(AppGateway.name);
  private connectionCount = 0;

  constructor(private readonly websocketService: WebSocketService) {}

  afterInit(server: Server): void {
    this.websocketService.setServer(server);
    this.logger.log('AppGateway initialized');
  }

  handleConnection(client: Socket): void {
    this.connectionCount++;
    this.logger.log(
      `Client connected: ${client.id} | Total connections: ${this.connectionCount}`,
    );

    client.emit('connected', {
      socketId: client.id,
      timestamp: new Date().toISOString(),
    });
  }

  handleDisconnect(client: Socket): void {
    this.connectionCount--;
    this.logger.log(
      `Client disconnected: ${client.id} | Total connections: ${this.connectionCount}`,
    );
  }

  @OnEvent(InternalEvent.CONVERSION_PROGRESS)
  handleConversionProgress(payload: ConversionProgressPayload): void {
    this.websocketService.emitConversionProgress(payload);
  }

  @OnEvent(InternalEvent.CONVERSION_STATUS)
  handleConversionStatus(payload: ConversionStatusPayload): void {
    this.websocketService.emitConversionStatus(payload);
  }

  @OnEvent(InternalEvent.CONVERSION_COMPLETE)
  handleConversionComplete(payload: ConversionCompletePayload): void {
    this.websocketService.emitConversionComplete(payload);
  }

  @OnEvent(InternalEvent.BATCH_COMPLETE)
  handleBatchComplete(payload: BatchCompletePayload): void {
    this.websocketService.emitBatchComplete(payload);
  }

  @OnEvent(InternalEvent.SETTINGS_UPDATED)
  handleSettingsUpdated(settings: ApplicationSettings): void {
    this.websocketService.emitSettingsUpdated({ settings });
  }

  getConnectionCount(): number {
    return this.server?.sockets.sockets.size ?? 0;
  }

  isHealthy(): boolean {
    return this.server !== null && this.server !== undefined;
  }

  getStatus(): {
    healthy: boolean;
    connections: number;
    uptime: number;
  } {
    return {
      healthy: this.isHealthy(),
      connections: this.getConnectionCount(),
      uptime: process.uptime(),
    };
  }
}

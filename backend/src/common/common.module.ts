// Common Module - Shared infrastructure and utilities
import { Global, Module } from '@nestjs/common';
import { AppGateway } from './app.gateway';
import { WebSocketService } from './websocket.service';

/**
 * CommonModule provides the WebSocket infrastructure.
 * Global so any module can inject WebSocketService or query AppGateway health.
 */
@Global()
@Module({
  providers: [AppGateway, WebSocketService],
  exports: [WebSocketService, AppGateway],
})
export class CommonModule {}

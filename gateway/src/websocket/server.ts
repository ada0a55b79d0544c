/**
 * WebSocket 서버
 *
 * 수신기 → 게이트웨이: 원시 Remote ID 텔레메트리 (telemetry), 센서 키트 상태 (system_status)
 * 게이트웨이 → C2 UI: 드론 상태 스트림 (subscribe 후)
 *
 * 메시지 Rate Limiting은 UI 명령에만 적용 (수신기 입력은 제한 없음)
 */

import WebSocket, { WebSocketServer } from 'ws';
import { IncomingMessage } from 'http';
import { z } from 'zod';
import {
  ClientToGatewayCommand,
  DroneStateSnapshot,
  GatewayStatusEvent,
  GatewayToClientEvent,
} from '../../../shared/schemas';
import { createLogger, Logger } from '../core/logging/console';
import { ErrorCode, ErrorLogger } from '../core/errors/errorLogger';
import { isRecord } from '../core/telemetry/coerce';
import {
  createSecurityContext,
  disposeSecurityContext,
  getClientId,
  MAX_MESSAGE_BYTES,
  SecurityConfig,
  SecurityContext,
  validateAuth,
  validateCORS,
  validateMessage,
} from './security';
import { handleWebSocketError, sendError, setupHeartbeat } from './errorHandler';

/** 명령 스키마 */
const commandSchema: z.ZodType<ClientToGatewayCommand> = z.discriminatedUnion('type', [
  z.object({ type: z.literal('telemetry'), payload: z.unknown() }),
  z.object({ type: z.literal('system_status'), payload: z.unknown() }),
  z.object({ type: z.literal('subscribe') }),
  z.object({ type: z.literal('unsubscribe') }),
  z.object({ type: z.literal('get_status') }),
]);

/** 수신기 입력 명령 */
const INGEST_COMMANDS: ReadonlySet<string> = new Set(['telemetry', 'system_status']);

function isIngestFrame(message: unknown): boolean {
  return isRecord(message) && typeof message.type === 'string' && INGEST_COMMANDS.has(message.type);
}

export type GatewayStatus = Omit<GatewayStatusEvent, 'type' | 'timestamp'>;

/**
 * 서버가 게이트웨이에 위임하는 동작
 */
export interface GatewayServerHandlers {
  /** 원시 텔레메트리 1건 처리 */
  onTelemetry(payload: unknown, clientId: string): void;
  /** 센서 키트 상태 1건 처리 */
  onSystemStatus(payload: unknown, clientId: string): void;
  /** 구독 직후 보낼 현재 드론 상태 */
  getSnapshot(): DroneStateSnapshot[];
  getStatus(): GatewayStatus;
}

/** 이벤트 송신 인터페이스 (WebSocket 싱크가 사용) */
export interface EventBroadcaster {
  broadcast(event: GatewayToClientEvent): void;
}

export interface GatewayServerOptions {
  port: number;
  security: SecurityConfig;
  handlers: GatewayServerHandlers;
  maxClients?: number;
  heartbeatIntervalMs?: number;
  logger?: Logger;
  errorLogger?: ErrorLogger;
}

interface ClientState {
  id: string;
  subscribed: boolean;
  stopHeartbeat: () => void;
}

export class GatewayWebSocketServer implements EventBroadcaster {
  private wss: WebSocketServer | null = null;
  private clients: Map<WebSocket, ClientState> = new Map();
  private readonly options: GatewayServerOptions;
  private readonly security: SecurityContext;
  private readonly logger: Logger;
  private readonly errorLogger: ErrorLogger;

  constructor(options: GatewayServerOptions) {
    this.options = options;
    this.security = createSecurityContext(options.security);
    this.logger = options.logger ?? createLogger('Gateway');
    this.errorLogger = options.errorLogger ?? ErrorLogger.getInstance();
  }

  get clientCount(): number {
    return this.clients.size;
  }

  /**
   * 실제 바인딩된 포트 (port 0으로 시작한 경우 포함)
   */
  get port(): number {
    const address = this.wss?.address();
    return address !== undefined && address !== null && typeof address === 'object' ? address.port : this.options.port;
  }

  get subscriberCount(): number {
    let count = 0;
    for (const client of this.clients.values()) {
      if (client.subscribed) count++;
    }
    return count;
  }

  /**
   * 서버 시작 (listen 완료까지 대기)
   */
  start(): Promise<void> {
    if (this.wss) return Promise.resolve();

    const { port, security } = this.options;
    const wss = new WebSocketServer({
      port,
      maxPayload: MAX_MESSAGE_BYTES,
      verifyClient: (info, callback) => {
        this.verifyClient(info, callback);
      },
    });
    this.wss = wss;

    wss.on('connection', (ws, request) => {
      this.handleConnection(ws, request);
    });

    return new Promise((resolve, reject) => {
      wss.once('listening', () => {
        wss.on('error', (error) => {
          this.logger.error('WebSocket 서버 에러:', error.message);
        });
        this.logger.info(`WebSocket 서버 시작: ws://localhost:${this.port}`);
        if (security.authEnabled) {
          this.logger.info('인증 활성화됨');
        }
        if (security.corsEnabled) {
          this.logger.info(`CORS 활성화: ${security.corsOrigin}`);
        }
        if (security.rateLimitEnabled) {
          this.logger.info(`Rate Limiting: ${security.rateLimitMaxRequests}/${security.rateLimitWindowMs}ms`);
        }
        resolve();
      });
      wss.once('error', reject);
    });
  }

  /**
   * 구독 중인 클라이언트에 이벤트 전송
   */
  broadcast(event: GatewayToClientEvent): void {
    const message = JSON.stringify(event);
    for (const [ws, client] of this.clients.entries()) {
      if (client.subscribed && ws.readyState === WebSocket.OPEN) {
        ws.send(message);
      }
    }
  }

  /**
   * 서버 종료
   */
  stop(): Promise<void> {
    const wss = this.wss;
    this.wss = null;
    disposeSecurityContext(this.security);

    for (const [ws, client] of this.clients.entries()) {
      client.stopHeartbeat();
      ws.close(1001, '게이트웨이 종료');
    }
    this.clients.clear();

    if (!wss) return Promise.resolve();
    return new Promise((resolve) => {
      wss.close(() => {
        this.logger.info('WebSocket 서버 종료');
        resolve();
      });
    });
  }

  /**
   * 클라이언트 연결 검증
   */
  private verifyClient(
    info: { origin: string; secure: boolean; req: IncomingMessage },
    callback: (result: boolean, code?: number, message?: string) => void
  ): void {
    const { security } = this.options;
    const clientId = getClientId(info.req);

    if (security.rateLimitEnabled && !this.security.connectionLimiter.check(clientId)) {
      this.errorLogger.log(ErrorCode.RATE_LIMIT_EXCEEDED, clientId);
      callback(false, 429, 'Too Many Requests');
      return;
    }

    const cors = validateCORS(info.req, security);
    if (!cors.valid) {
      this.errorLogger.log(ErrorCode.CORS_VIOLATION, clientId, cors.reason);
      callback(false, 403, cors.reason);
      return;
    }

    const auth = validateAuth(info.req, security);
    if (!auth.valid) {
      const code = auth.reason?.includes('필요') ? ErrorCode.AUTH_REQUIRED : ErrorCode.AUTH_INVALID;
      this.errorLogger.log(code, clientId, auth.reason);
      callback(false, 401, auth.reason);
      return;
    }

    if (this.clients.size >= (this.options.maxClients ?? 100)) {
      this.errorLogger.log(ErrorCode.TOO_MANY_CONNECTIONS, clientId);
      callback(false, 429, 'Too Many Connections');
      return;
    }

    callback(true);
  }

  /**
   * 새 연결 처리
   */
  private handleConnection(ws: WebSocket, request: IncomingMessage): void {
    const clientId = getClientId(request);
    this.logger.info(`클라이언트 연결: ${clientId}`);

    this.clients.set(ws, {
      id: clientId,
      subscribed: false,
      stopHeartbeat: setupHeartbeat(ws, clientId, this.options.heartbeatIntervalMs),
    });

    ws.on('message', (data) => {
      this.handleMessage(ws, clientId, data.toString());
    });

    ws.on('close', (code) => {
      this.logger.info(`클라이언트 연결 해제: ${clientId} (${code})`);
      this.cleanupClient(ws);
    });

    ws.on('error', (error) => {
      this.logger.error(`WebSocket 오류 (${clientId}):`, error.message);
      this.cleanupClient(ws);
    });
  }

  private handleMessage(ws: WebSocket, clientId: string, data: string): void {
    try {
      const message: unknown = JSON.parse(data);
      if (!isIngestFrame(message) && !this.allowMessage(ws, clientId)) return;

      const validation = validateMessage(message);
      if (!validation.valid) {
        sendError(ws, ErrorCode.INVALID_MESSAGE, { reason: validation.reason });
        this.errorLogger.log(ErrorCode.INVALID_MESSAGE, clientId, validation.reason);
        return;
      }

      const parsed = commandSchema.safeParse(message);
      if (!parsed.success) {
        sendError(ws, ErrorCode.INVALID_COMMAND);
        this.errorLogger.log(ErrorCode.INVALID_COMMAND, clientId, parsed.error.issues[0]?.message);
        return;
      }

      this.handleCommand(parsed.data, ws, clientId);
    } catch (error) {
      if (error instanceof SyntaxError && !this.allowMessage(ws, clientId)) return;
      handleWebSocketError(error, ws, clientId, this.errorLogger);
    }
  }

  /**
   * 메시지 Rate Limit 확인 (초과 시 에러 응답)
   */
  private allowMessage(ws: WebSocket, clientId: string): boolean {
    if (!this.options.security.rateLimitEnabled || this.security.messageLimiter.check(clientId)) {
      return true;
    }
    sendError(ws, ErrorCode.RATE_LIMIT_EXCEEDED);
    this.errorLogger.log(ErrorCode.RATE_LIMIT_EXCEEDED, clientId);
    return false;
  }

  /**
   * 명령 처리
   */
  private handleCommand(command: ClientToGatewayCommand, ws: WebSocket, clientId: string): void {
    const client = this.clients.get(ws);
    if (!client) return;

    switch (command.type) {
      case 'telemetry':
        this.options.handlers.onTelemetry(command.payload, clientId);
        break;

      case 'system_status':
        this.options.handlers.onSystemStatus(command.payload, clientId);
        break;

      case 'subscribe':
        client.subscribed = true;
        this.logger.info(`구독 시작: ${clientId}`);
        this.send(ws, {
          type: 'initial_state',
          timestamp: Date.now(),
          drones: this.options.handlers.getSnapshot(),
        });
        break;

      case 'unsubscribe':
        client.subscribed = false;
        this.logger.info(`구독 해제: ${clientId}`);
        break;

      case 'get_status':
        this.send(ws, {
          type: 'gateway_status',
          timestamp: Date.now(),
          ...this.options.handlers.getStatus(),
        });
        break;
    }
  }

  private send(ws: WebSocket, event: GatewayToClientEvent): void {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(event));
    }
  }

  /**
   * 클라이언트 정리
   */
  private cleanupClient(ws: WebSocket): void {
    const client = this.clients.get(ws);
    if (!client) return;
    client.stopHeartbeat();
    this.clients.delete(ws);
    this.security.messageLimiter.reset(client.id);
  }
}

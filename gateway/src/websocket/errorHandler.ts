/**
 * WebSocket 에러 응답 및 연결 유지 헬퍼
 */

import WebSocket from 'ws';
import { createLogger } from '../core/logging/console';
import { describeError, ERROR_MESSAGES, ErrorCode, ErrorLogger } from '../core/errors/errorLogger';

const log = createLogger('WS');

/**
 * 에러 응답 인터페이스
 */
export interface ErrorResponse {
  type: 'error';
  code: ErrorCode;
  message: string;
  timestamp: number;
  details?: Record<string, unknown>;
}

/**
 * 에러 응답 생성
 */
export function createErrorResponse(code: ErrorCode, details?: Record<string, unknown>): ErrorResponse {
  return {
    type: 'error',
    code,
    message: ERROR_MESSAGES[code],
    timestamp: Date.now(),
    details,
  };
}

/**
 * WebSocket으로 에러 전송
 */
export function sendError(ws: WebSocket, code: ErrorCode, details?: Record<string, unknown>): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(createErrorResponse(code, details)));
  }
}

/**
 * 처리 중 예외를 클라이언트 에러 응답으로 변환
 */
export function handleWebSocketError(
  error: unknown,
  ws: WebSocket,
  clientId: string,
  errorLogger: ErrorLogger = ErrorLogger.getInstance()
): void {
  const message = describeError(error);

  if (error instanceof SyntaxError) {
    sendError(ws, ErrorCode.INVALID_MESSAGE, { reason: 'JSON 파싱 실패' });
    errorLogger.log(ErrorCode.INVALID_MESSAGE, clientId, message);
  } else {
    sendError(ws, ErrorCode.INTERNAL_ERROR);
    errorLogger.log(ErrorCode.INTERNAL_ERROR, clientId, message);
  }

  // 스택 트레이스 출력 (개발 모드)
  if (process.env.NODE_ENV === 'development' && error instanceof Error) {
    log.error('스택:', error.stack);
  }
}

/**
 * Ping/Pong 하트비트 설정
 *
 * @returns 정리 함수
 */
export function setupHeartbeat(ws: WebSocket, clientId: string, intervalMs: number = 30000): () => void {
  let isAlive = true;

  ws.on('pong', () => {
    isAlive = true;
  });

  const interval = setInterval(() => {
    if (!isAlive) {
      log.warn(`하트비트 실패, 연결 종료: ${clientId}`);
      ws.terminate();
      return;
    }

    isAlive = false;
    ws.ping();
  }, intervalMs);
  interval.unref();

  return () => clearInterval(interval);
}

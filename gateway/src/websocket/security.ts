/**
 * WebSocket 보안 미들웨어
 * - 인증 (토큰 기반)
 * - Rate Limiting
 * - CORS 검증
 */

import { IncomingMessage } from 'http';
import { GatewayConfig } from '../config';
import { isRecord } from '../core/telemetry/coerce';

export type SecurityConfig = Pick<
  GatewayConfig,
  | 'authEnabled'
  | 'authToken'
  | 'corsEnabled'
  | 'corsOrigin'
  | 'rateLimitEnabled'
  | 'rateLimitMaxRequests'
  | 'rateLimitWindowMs'
>;

/** 검증에 필요한 요청 정보 */
export type RequestInfo = Pick<IncomingMessage, 'headers' | 'url'>;

export interface ValidationResult {
  valid: boolean;
  reason?: string;
}

/** 최대 메시지 크기 (1MB) */
export const MAX_MESSAGE_BYTES = 1024 * 1024;

/**
 * Rate Limiter 클래스
 * 키(클라이언트 IP 등)별 슬라이딩 윈도우 요청 제한
 */
export class RateLimiter {
  private requests: Map<string, number[]> = new Map();
  private readonly maxRequests: number;
  private readonly windowMs: number;
  private readonly now: () => number;
  private cleanupTimer: NodeJS.Timeout | null;

  constructor(maxRequests: number, windowMs: number, now: () => number = Date.now) {
    this.maxRequests = maxRequests;
    this.windowMs = windowMs;
    this.now = now;

    // 주기적으로 오래된 기록 정리
    this.cleanupTimer = setInterval(() => this.cleanup(), this.windowMs);
    this.cleanupTimer.unref();
  }

  /**
   * Rate limit 체크 (허용되면 요청으로 기록)
   */
  check(clientId: string): boolean {
    const now = this.now();
    const timestamps = (this.requests.get(clientId) ?? []).filter((ts) => now - ts < this.windowMs);

    if (timestamps.length >= this.maxRequests) {
      this.requests.set(clientId, timestamps);
      return false;
    }

    timestamps.push(now);
    this.requests.set(clientId, timestamps);
    return true;
  }

  /**
   * 특정 클라이언트의 기록 삭제
   */
  reset(clientId: string): void {
    this.requests.delete(clientId);
  }

  dispose(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
    this.requests.clear();
  }

  /**
   * 오래된 기록 정리
   */
  private cleanup(): void {
    const now = this.now();
    for (const [clientId, timestamps] of this.requests.entries()) {
      const valid = timestamps.filter((ts) => now - ts < this.windowMs);
      if (valid.length === 0) {
        this.requests.delete(clientId);
      } else {
        this.requests.set(clientId, valid);
      }
    }
  }
}

function extractToken(request: RequestInfo): string | null {
  // URL 파라미터
  const url = new URL(request.url ?? '', `http://${request.headers.host ?? 'localhost'}`);
  const queryToken = url.searchParams.get('token');
  if (queryToken) return queryToken;

  // Authorization 헤더
  const authHeader = request.headers.authorization;
  return authHeader?.startsWith('Bearer ') ? authHeader.substring(7) : null;
}

/**
 * 인증 검증
 */
export function validateAuth(request: RequestInfo, config: SecurityConfig): ValidationResult {
  if (!config.authEnabled) {
    return { valid: true };
  }

  if (!config.authToken) {
    console.error('[Security] AUTH_ENABLED=true이지만 AUTH_TOKEN이 설정되지 않음');
    return { valid: false, reason: '서버 설정 오류' };
  }

  const providedToken = extractToken(request);
  if (!providedToken) {
    return { valid: false, reason: '인증 토큰이 필요합니다' };
  }

  if (providedToken !== config.authToken) {
    return { valid: false, reason: '잘못된 인증 토큰입니다' };
  }

  return { valid: true };
}

/**
 * CORS 검증
 */
export function validateCORS(request: RequestInfo, config: SecurityConfig): ValidationResult {
  if (!config.corsEnabled) {
    return { valid: true };
  }

  const origin = request.headers.origin;

  // Origin 없는 연결(수신기 프로세스 등)은 항상 허용
  if (!origin) {
    return { valid: true };
  }

  if (config.corsOrigin === '*') {
    return { valid: true };
  }

  const allowedOrigins = config.corsOrigin.split(',').map((o) => o.trim());
  if (allowedOrigins.includes(origin)) {
    return { valid: true };
  }

  return { valid: false, reason: 'CORS: 허용되지 않은 Origin입니다' };
}

/**
 * 클라이언트 IP 추출
 */
export function getClientId(request: IncomingMessage): string {
  // X-Forwarded-For 헤더 확인 (프록시 뒤에 있는 경우)
  const forwarded = request.headers['x-forwarded-for'];
  if (forwarded) {
    const ips = Array.isArray(forwarded) ? forwarded[0] : forwarded;
    return ips.split(',')[0].trim();
  }

  return request.socket.remoteAddress ?? 'unknown';
}

/**
 * 명령 메시지 기본 검증
 */
export function validateMessage(message: unknown): ValidationResult {
  if (!isRecord(message)) {
    return { valid: false, reason: '메시지는 JSON 객체여야 합니다' };
  }

  if (typeof message.type !== 'string' || message.type.length === 0) {
    return { valid: false, reason: 'type 필드가 필요합니다' };
  }

  if (message.type.length > 100) {
    return { valid: false, reason: 'type 필드가 너무 깁니다' };
  }

  return { valid: true };
}

/**
 * 보안 컨텍스트
 */
export interface SecurityContext {
  /** 연결 시도 제한 */
  connectionLimiter: RateLimiter;
  /** 메시지 제한 (수신기는 초당 여러 개를 보냄) */
  messageLimiter: RateLimiter;
}

/**
 * 보안 컨텍스트 생성
 */
export function createSecurityContext(config: SecurityConfig): SecurityContext {
  return {
    connectionLimiter: new RateLimiter(
      Math.max(1, Math.floor(config.rateLimitMaxRequests / 10)),
      config.rateLimitWindowMs
    ),
    messageLimiter: new RateLimiter(config.rateLimitMaxRequests, config.rateLimitWindowMs),
  };
}

export function disposeSecurityContext(context: SecurityContext): void {
  context.connectionLimiter.dispose();
  context.messageLimiter.dispose();
}

/**
 * 게이트웨이 설정 관리
 * 환경 변수 기반 설정 로더 (Zod 검증 포함)
 */

import { loadAndValidateEnv, printEnvConfig, type Env } from './config/env';
import { LogLevel } from './core/logging/console';

export type CotTransportKind = 'none' | 'udp' | 'tcp';

export interface GatewayConfig {
  port: number;
  nodeEnv: string;

  // 드론 추적
  maxDrones: number;
  rateLimitSeconds: number;
  inactivityTimeoutSeconds: number;
  tickIntervalMs: number;
  deliveryTimeoutMs: number;
  droneIdPrefix: string;

  // CoT 전송
  cotTransport: CotTransportKind;
  cotHost: string;
  cotPort: number;
  cotMulticastTtl: number;

  affiliationFile: string;
  wsSinkEnabled: boolean;

  // 로깅
  logLevel: LogLevel;
  eventLogEnabled: boolean;
  logsDir: string;

  // 보안 설정
  authEnabled: boolean;
  authToken?: string;
  corsEnabled: boolean;
  corsOrigin: string;
  rateLimitEnabled: boolean;
  rateLimitMaxRequests: number;
  rateLimitWindowMs: number;
}

/**
 * 환경 변수에서 설정 로드 (검증 포함)
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const env: Env = loadAndValidateEnv(source);

  // 개발 모드에서 설정 출력
  if (env.NODE_ENV === 'development') {
    printEnvConfig(env);
  }

  return {
    port: env.GATEWAY_PORT,
    nodeEnv: env.NODE_ENV,
    maxDrones: env.MAX_DRONES,
    rateLimitSeconds: env.RATE_LIMIT_SECONDS,
    inactivityTimeoutSeconds: env.INACTIVITY_TIMEOUT_SECONDS,
    tickIntervalMs: env.TICK_INTERVAL_MS,
    deliveryTimeoutMs: env.DELIVERY_TIMEOUT_MS,
    droneIdPrefix: env.DRONE_ID_PREFIX,
    cotTransport: env.COT_TRANSPORT,
    cotHost: env.COT_HOST,
    cotPort: env.COT_PORT,
    cotMulticastTtl: env.COT_MULTICAST_TTL,
    affiliationFile: env.AFFILIATION_FILE,
    wsSinkEnabled: env.WS_SINK_ENABLED,
    logLevel: env.LOG_LEVEL,
    eventLogEnabled: env.EVENT_LOG_ENABLED,
    logsDir: env.LOGS_DIR,
    authEnabled: env.AUTH_ENABLED,
    authToken: env.AUTH_TOKEN,
    corsEnabled: env.CORS_ENABLED,
    corsOrigin: env.CORS_ORIGIN,
    rateLimitEnabled: env.RATE_LIMIT_ENABLED,
    rateLimitMaxRequests: env.RATE_LIMIT_MAX_REQUESTS,
    rateLimitWindowMs: env.RATE_LIMIT_WINDOW_MS,
  };
}

/**
 * 기본 설정 인스턴스 (싱글톤)
 */
let configInstance: GatewayConfig | null = null;

/**
 * 설정 싱글톤 가져오기
 */
export function getConfig(): GatewayConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * 환경 변수 검증 및 로드
 * Zod 스키마 기반 타입 안전 환경 설정
 */

import { z } from 'zod';
import * as dotenv from 'dotenv';
import * as path from 'path';
import * as fs from 'fs';

// .env 파일 로드
const envPath = path.resolve(process.cwd(), '.env');
if (fs.existsSync(envPath)) {
  dotenv.config({ path: envPath });
  console.log('[Config] .env 파일 로드됨:', envPath);
}

// ============================================
// 공통 변환기
// ============================================

function flag(defaultValue: 'true' | 'false') {
  return z
    .string()
    .default(defaultValue)
    .transform((val) => val.toLowerCase() === 'true');
}

function integer(name: string, defaultValue: string, min: number, max: number = Number.MAX_SAFE_INTEGER) {
  return z
    .string()
    .default(defaultValue)
    .transform((val) => Number(val))
    .refine((val) => Number.isInteger(val) && val >= min && val <= max, {
      message: `${name}는 ${min} 이상 ${max} 이하의 정수여야 합니다`,
    });
}

function positiveFloat(name: string, defaultValue: string) {
  return z
    .string()
    .default(defaultValue)
    .transform((val) => parseFloat(val))
    .refine((val) => Number.isFinite(val) && val > 0, {
      message: `${name}는 양수여야 합니다`,
    });
}

/**
 * 환경 변수 스키마 정의
 */
const envSchema = z.object({
  // 서버 설정
  GATEWAY_PORT: integer('GATEWAY_PORT', '8088', 1, 65535),

  // 드론 추적
  MAX_DRONES: integer('MAX_DRONES', '30', 1),
  RATE_LIMIT_SECONDS: positiveFloat('RATE_LIMIT_SECONDS', '1.0'),
  INACTIVITY_TIMEOUT_SECONDS: positiveFloat('INACTIVITY_TIMEOUT_SECONDS', '60.0'),
  TICK_INTERVAL_MS: integer('TICK_INTERVAL_MS', '1000', 10),
  DELIVERY_TIMEOUT_MS: integer('DELIVERY_TIMEOUT_MS', '5000', 1),
  DRONE_ID_PREFIX: z.string().default('drone-'),

  // CoT 전송
  COT_TRANSPORT: z.enum(['none', 'udp', 'tcp']).default('none'),
  COT_HOST: z.string().min(1).default('127.0.0.1'),
  COT_PORT: integer('COT_PORT', '8087', 1, 65535),
  COT_MULTICAST_TTL: integer('COT_MULTICAST_TTL', '1', 0, 255),

  // 소속 분류
  AFFILIATION_FILE: z.string().default('./config/affiliations.json'),

  // WebSocket 싱크
  WS_SINK_ENABLED: flag('true'),

  // 로깅 설정
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  EVENT_LOG_ENABLED: flag('false'),
  LOGS_DIR: z.string().default('./logs'),

  // 환경 설정
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),

  // 보안 설정
  AUTH_ENABLED: flag('false'),
  AUTH_TOKEN: z.string().optional(),
  CORS_ENABLED: flag('true'),
  CORS_ORIGIN: z.string().default('*'),

  // Rate Limiting
  RATE_LIMIT_ENABLED: flag('true'),
  RATE_LIMIT_MAX_REQUESTS: integer('RATE_LIMIT_MAX_REQUESTS', '600', 1),
  RATE_LIMIT_WINDOW_MS: integer('RATE_LIMIT_WINDOW_MS', '60000', 1),
});

/**
 * 환경 변수 타입
 */
export type Env = z.infer<typeof envSchema>;

/**
 * 환경 변수 검증 및 로드
 */
export function loadAndValidateEnv(source: NodeJS.ProcessEnv = process.env): Env {
  try {
    const env = envSchema.parse(source);

    // 보안 설정 검증
    if (env.AUTH_ENABLED && !env.AUTH_TOKEN) {
      throw new Error('AUTH_ENABLED가 true일 때 AUTH_TOKEN은 필수입니다');
    }

    // 프로덕션 환경 검증
    if (env.NODE_ENV === 'production') {
      if (!env.AUTH_ENABLED) {
        console.warn('[Config] 경고: 프로덕션 환경에서 인증이 비활성화되어 있습니다');
      }
      if (env.CORS_ORIGIN === '*') {
        console.warn('[Config] 경고: 프로덕션 환경에서 CORS_ORIGIN이 *로 설정되어 있습니다');
      }
    }

    if (env.EVENT_LOG_ENABLED) {
      ensureDirectoryExists(env.LOGS_DIR);
    }

    return env;
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('[Config] 환경 변수 검증 실패:');
      error.issues.forEach((issue: z.ZodIssue) => {
        console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
      });
      throw new Error('환경 변수 설정이 올바르지 않습니다');
    }
    throw error;
  }
}

/**
 * 디렉토리 존재 확인 및 생성
 */
function ensureDirectoryExists(dirPath: string): void {
  const fullPath = path.resolve(process.cwd(), dirPath);
  if (!fs.existsSync(fullPath)) {
    fs.mkdirSync(fullPath, { recursive: true });
    console.log(`[Config] 디렉토리 생성: ${fullPath}`);
  }
}

/**
 * 환경 변수 출력 (민감한 정보 마스킹)
 */
export function printEnvConfig(env: Env): void {
  console.log('========================================');
  console.log('  게이트웨이 설정');
  console.log('========================================');
  console.log(`환경: ${env.NODE_ENV}`);
  console.log(`포트: ${env.GATEWAY_PORT}`);
  console.log(`최대 드론 수: ${env.MAX_DRONES}`);
  console.log(`송출 간격: ${env.RATE_LIMIT_SECONDS}초`);
  console.log(`비활성 타임아웃: ${env.INACTIVITY_TIMEOUT_SECONDS}초`);
  console.log(`틱 간격: ${env.TICK_INTERVAL_MS}ms`);
  console.log(`송출 시간 제한: ${env.DELIVERY_TIMEOUT_MS}ms`);
  console.log(`드론 ID 접두어: "${env.DRONE_ID_PREFIX}"`);
  console.log(`CoT 전송: ${env.COT_TRANSPORT}`);
  if (env.COT_TRANSPORT !== 'none') {
    console.log(`  - 대상: ${env.COT_HOST}:${env.COT_PORT}`);
  }
  console.log(`소속 파일: ${env.AFFILIATION_FILE}`);
  console.log(`WebSocket 싱크: ${env.WS_SINK_ENABLED}`);
  console.log(`로그 레벨: ${env.LOG_LEVEL}`);
  console.log(`이벤트 로그: ${env.EVENT_LOG_ENABLED} (${env.LOGS_DIR})`);
  console.log('----------------------------------------');
  console.log(`인증 활성화: ${env.AUTH_ENABLED}`);
  if (env.AUTH_ENABLED) {
    console.log(`인증 토큰: ${maskToken(env.AUTH_TOKEN)}`);
  }
  console.log(`CORS 활성화: ${env.CORS_ENABLED}`);
  console.log(`CORS Origin: ${env.CORS_ORIGIN}`);
  console.log(`Rate Limiting: ${env.RATE_LIMIT_ENABLED}`);
  if (env.RATE_LIMIT_ENABLED) {
    console.log(`  - 최대 요청: ${env.RATE_LIMIT_MAX_REQUESTS}/${env.RATE_LIMIT_WINDOW_MS}ms`);
  }
  console.log('========================================');
}

/**
 * 토큰 마스킹
 */
export function maskToken(token?: string): string {
  if (!token) return '(설정되지 않음)';
  if (token.length <= 8) return '****';
  return token.substring(0, 4) + '****' + token.substring(token.length - 4);
}

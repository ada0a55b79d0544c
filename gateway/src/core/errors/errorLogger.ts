/**
 * 게이트웨이 에러 분류 및 집계
 *
 * 파이프라인 실패(정규화/상관/인코딩/송출/싱크)와
 * WebSocket 프로토콜 에러를 하나의 코드 체계로 기록
 */

import { createLogger, Logger, LogLevel } from '../logging/console';

/**
 * 에러 코드 정의
 */
export enum ErrorCode {
  // 인증 관련
  AUTH_REQUIRED = 4001,
  AUTH_INVALID = 4002,

  // Rate Limiting
  RATE_LIMIT_EXCEEDED = 4029,

  // CORS
  CORS_VIOLATION = 4030,

  // 메시지 관련
  INVALID_MESSAGE = 4400,
  INVALID_COMMAND = 4404,

  // 서버 에러
  INTERNAL_ERROR = 4500,

  // 연결 관련
  TOO_MANY_CONNECTIONS = 4429,

  // 텔레메트리 파이프라인
  NORMALIZATION_FAILED = 4600,
  CORRELATION_MISS = 4601,
  ENCODING_FAILED = 4602,
  TRANSPORT_FAILED = 4603,
  SINK_FAILED = 4604,
  DELIVERY_TIMEOUT = 4605,
}

/**
 * 에러 메시지 정의
 */
export const ERROR_MESSAGES: Record<ErrorCode, string> = {
  [ErrorCode.AUTH_REQUIRED]: '인증이 필요합니다',
  [ErrorCode.AUTH_INVALID]: '잘못된 인증 정보입니다',
  [ErrorCode.RATE_LIMIT_EXCEEDED]: '요청 제한을 초과했습니다. 잠시 후 다시 시도하세요',
  [ErrorCode.CORS_VIOLATION]: 'CORS 정책 위반',
  [ErrorCode.INVALID_MESSAGE]: '잘못된 메시지 형식입니다',
  [ErrorCode.INVALID_COMMAND]: '알 수 없는 명령입니다',
  [ErrorCode.INTERNAL_ERROR]: '내부 서버 오류',
  [ErrorCode.TOO_MANY_CONNECTIONS]: '동시 연결 수 제한 초과',
  [ErrorCode.NORMALIZATION_FAILED]: '텔레메트리 정규화 실패',
  [ErrorCode.CORRELATION_MISS]: '상관 대상 드론 없음',
  [ErrorCode.ENCODING_FAILED]: 'CoT 인코딩 실패',
  [ErrorCode.TRANSPORT_FAILED]: 'CoT 송출 실패',
  [ErrorCode.SINK_FAILED]: '싱크 호출 실패',
  [ErrorCode.DELIVERY_TIMEOUT]: '송출 시간 초과',
};

/** 상관 실패는 흔하므로 debug로만 남김 */
const LOG_LEVELS: Partial<Record<ErrorCode, LogLevel>> = {
  [ErrorCode.CORRELATION_MISS]: 'debug',
  [ErrorCode.NORMALIZATION_FAILED]: 'warn',
  [ErrorCode.ENCODING_FAILED]: 'warn',
  [ErrorCode.TRANSPORT_FAILED]: 'warn',
  [ErrorCode.SINK_FAILED]: 'warn',
  [ErrorCode.DELIVERY_TIMEOUT]: 'warn',
};

export interface ErrorRecord {
  code: ErrorCode;
  timestamp: number;
  source: string;
  details?: string;
}

/**
 * 에러 객체/값을 로그용 문자열로
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * 에러 로거
 */
export class ErrorLogger {
  private static instance: ErrorLogger | null = null;
  private errorCounts: Map<ErrorCode, number> = new Map();
  private windowCounts: Map<ErrorCode, number> = new Map();
  private lastErrors: ErrorRecord[] = [];
  private logger: Logger;

  constructor(logger: Logger = createLogger('Error')) {
    this.logger = logger;
  }

  static getInstance(): ErrorLogger {
    if (!ErrorLogger.instance) {
      ErrorLogger.instance = new ErrorLogger();
    }
    return ErrorLogger.instance;
  }

  /**
   * 에러 기록
   */
  log(code: ErrorCode, source: string, details?: string): void {
    this.errorCounts.set(code, (this.errorCounts.get(code) ?? 0) + 1);
    this.windowCounts.set(code, (this.windowCounts.get(code) ?? 0) + 1);

    // 최근 에러 기록 (최대 100개)
    this.lastErrors.push({ code, timestamp: Date.now(), source, details });
    if (this.lastErrors.length > 100) {
      this.lastErrors.shift();
    }

    const level = LOG_LEVELS[code] ?? 'error';
    this.logger[level](
      `${ERROR_MESSAGES[code]} (Code: ${code}, Source: ${source})`,
      details ?? ''
    );
  }

  /**
   * 코드별 누적 카운트
   */
  getCount(code: ErrorCode): number {
    return this.errorCounts.get(code) ?? 0;
  }

  getCounts(): Partial<Record<ErrorCode, number>> {
    const counts: Partial<Record<ErrorCode, number>> = {};
    for (const [code, count] of this.errorCounts.entries()) {
      counts[code] = count;
    }
    return counts;
  }

  /**
   * 최근 에러 조회
   */
  getRecentErrors(limit: number = 10): ErrorRecord[] {
    return this.lastErrors.slice(-limit);
  }

  /**
   * 주기적 에러 통계 출력 시작
   *
   * @returns 중지 함수
   */
  startStatsReporter(intervalMs: number = 60000): () => void {
    const interval = setInterval(() => this.printStats(), intervalMs);
    interval.unref();
    return () => clearInterval(interval);
  }

  /**
   * 에러 통계 출력
   */
  private printStats(): void {
    if (this.windowCounts.size === 0) return;

    this.logger.info('========================================');
    this.logger.info('  에러 통계 (지난 주기)');
    this.logger.info('========================================');

    for (const [code, count] of this.windowCounts.entries()) {
      this.logger.info(`  ${ERROR_MESSAGES[code]}: ${count}회`);
    }

    this.logger.info('========================================');

    this.windowCounts.clear();
  }
}

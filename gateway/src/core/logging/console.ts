/**
 * 레벨 기반 콘솔 로거
 * 출력 형식: [Tag] 메시지
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

let currentLevel: LogLevel = 'info';

/**
 * 전역 로그 레벨 설정
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

/**
 * 태그가 붙은 로거 생성
 */
export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    debug: (message, ...args) => {
      if (enabled('debug')) console.debug(prefix, message, ...args);
    },
    info: (message, ...args) => {
      if (enabled('info')) console.info(prefix, message, ...args);
    },
    warn: (message, ...args) => {
      if (enabled('warn')) console.warn(prefix, message, ...args);
    },
    error: (message, ...args) => {
      if (enabled('error')) console.error(prefix, message, ...args);
    },
  };
}


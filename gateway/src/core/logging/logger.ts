/**
 * JSONL 이벤트 로거
 *
 * 게이트웨이 이벤트를 JSONL 형식으로 파일에 저장합니다.
 * 파일명: {logsDir}/gateway_{timestamp}.jsonl
 */

import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { GatewayLogEvent, GatewayLogEventType } from './eventSchemas';
import { createLogger } from './console';

const log = createLogger('EventLog');

export interface EventLoggerConfig {
  logsDir: string;
  enabled: boolean;
  consoleOutput: boolean;  // 콘솔에도 출력할지 여부
  customFilename?: string;  // 커스텀 파일명 (선택사항)
}

const DEFAULT_CONFIG: EventLoggerConfig = {
  logsDir: './logs',
  enabled: false,
  consoleOutput: false,
  customFilename: undefined,
};

/** 기록된 한 줄 */
export type LoggedEvent = GatewayLogEvent & { seq: number; session_id: string };

export class GatewayEventLogger {
  private config: EventLoggerConfig;
  private currentFile: string | null = null;
  private writeStream: fs.WriteStream | null = null;
  private readonly sessionId: string = uuidv4();
  private seq: number = 0;

  // 이벤트 타입별 카운트 (비활성 상태에서도 집계)
  private counts: Map<GatewayLogEventType, number> = new Map();

  constructor(config: Partial<EventLoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    if (this.config.enabled) {
      this.open();
    }
  }

  /**
   * 로그 파일 열기
   */
  private open(): void {
    if (!fs.existsSync(this.config.logsDir)) {
      fs.mkdirSync(this.config.logsDir, { recursive: true });
    }

    const filename =
      this.config.customFilename ??
      `gateway_${new Date().toISOString().replace(/[:.]/g, '-')}.jsonl`;
    this.currentFile = path.join(this.config.logsDir, filename);
    this.writeStream = fs.createWriteStream(this.currentFile, { flags: 'a' });
    this.writeStream.on('error', (error) => {
      log.error(`로그 파일 쓰기 실패: ${this.currentFile}`, error.message);
      this.writeStream = null;
    });
    log.info(`로그 파일 생성: ${this.currentFile}`);
  }

  /**
   * 이벤트 로깅
   */
  log(event: GatewayLogEvent): void {
    this.counts.set(event.event, (this.counts.get(event.event) ?? 0) + 1);
    this.seq++;

    if (!this.config.enabled) return;

    const entry: LoggedEvent = { ...event, seq: this.seq, session_id: this.sessionId };
    const line = JSON.stringify(entry);

    if (this.writeStream) {
      this.writeStream.write(line + '\n');
    }

    if (this.config.consoleOutput) {
      log.debug(`${event.event}: ${line.substring(0, 120)}`);
    }
  }

  /**
   * 이벤트 타입별 카운트
   */
  getCount(type: GatewayLogEventType): number {
    return this.counts.get(type) ?? 0;
  }

  /**
   * 지금까지 로깅된 이벤트 수 (파일 기록 여부와 무관)
   */
  getSequence(): number {
    return this.seq;
  }

  getCurrentLogFile(): string | null {
    return this.currentFile;
  }

  /**
   * 스트림 닫기
   */
  close(): Promise<void> {
    const stream = this.writeStream;
    this.writeStream = null;
    if (!stream) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      stream.end(() => {
        log.info(`로그 저장 완료: ${this.seq}개 이벤트, ${this.currentFile}`);
        resolve();
      });
    });
  }
}

// 싱글톤 인스턴스
let loggerInstance: GatewayEventLogger | null = null;

export function getEventLogger(config?: Partial<EventLoggerConfig>): GatewayEventLogger {
  if (!loggerInstance) {
    loggerInstance = new GatewayEventLogger(config);
  }
  return loggerInstance;
}

export async function resetEventLogger(): Promise<void> {
  const instance = loggerInstance;
  loggerInstance = null;
  if (instance) {
    await instance.close();
  }
}

/**
 * 드론 게이트웨이
 *
 * 원시 텔레메트리 → 정규화 → 레지스트리 → (틱마다) CoT 송출 + 싱크 분배
 * 센서 키트 상태 → 즉시 CoT 송출 + 싱크 분배
 * 레지스트리 변경은 모두 이 객체를 통해 한 흐름에서만 일어남
 */

import { createLogger, Logger } from './core/logging/console';
import { GatewayEventLogger } from './core/logging/logger';
import { describeError, ErrorCode, ErrorLogger } from './core/errors/errorLogger';
import { DeliveryTracker } from './core/delivery/delivery';
import { CotEncoder } from './core/cot/cotEncoder';
import { DroneRegistry, UpsertResult } from './core/drone/droneRegistry';
import { DroneSnapshot } from './core/drone/types';
import { normalizeTelemetry } from './core/telemetry/normalizer';
import { normalizeSystemStatus, SystemStatus } from './core/system/systemStatus';
import { SinkRouter } from './core/sinks/sinkRouter';
import { ISink } from './core/sinks/ISink';
import { CotTransport } from './core/dispatch/CotTransport';
import { DispatchScheduler, TickReport } from './core/dispatch/dispatchScheduler';
import { AffiliationLookup } from './adapters/affiliation/affiliationStore';

export interface DroneGatewayConfig {
  maxDrones: number;
  rateLimitSeconds: number;
  inactivityTimeoutSeconds: number;
  tickIntervalMs: number;
  deliveryTimeoutMs: number;
  /** 시리얼 ID에 붙일 접두어 (빈 문자열이면 붙이지 않음) */
  droneIdPrefix: string;
}

export interface DroneGatewayDeps {
  transport?: CotTransport | null;
  sinks?: ISink[];
  affiliations?: AffiliationLookup;
  /** 현재 시각 (epoch 초) */
  clock?: () => number;
  logger?: Logger;
  errorLogger?: ErrorLogger;
  eventLogger?: GatewayEventLogger;
}

export type IngestResult = UpsertResult | { outcome: 'dropped'; reason: 'unparseable' };

export type SystemIngestResult = { outcome: 'sent'; status: SystemStatus } | { outcome: 'dropped' };

export interface GatewayStats {
  activeDrones: number;
  ingested: number;
  dropped: number;
  correlated: number;
  sent: number;
  failed: number;
  evicted: number;
  systemStatus: number;
}

export class DroneGateway {
  readonly registry: DroneRegistry;
  readonly router: SinkRouter;
  readonly scheduler: DispatchScheduler;

  private readonly config: DroneGatewayConfig;
  private readonly transport: CotTransport | null;
  private readonly affiliations?: AffiliationLookup;
  private readonly tracker: DeliveryTracker;
  private readonly clock: () => number;
  private readonly logger: Logger;
  private readonly errorLogger: ErrorLogger;

  private tickTimer: ReturnType<typeof setInterval> | null = null;
  private stopping: Promise<void> | null = null;
  private counters = { ingested: 0, dropped: 0, correlated: 0, capacityEvicted: 0, systemStatus: 0 };

  constructor(config: DroneGatewayConfig, deps: DroneGatewayDeps = {}) {
    this.config = { ...config };
    this.transport = deps.transport ?? null;
    this.affiliations = deps.affiliations;
    this.clock = deps.clock ?? (() => Date.now() / 1000);
    this.logger = deps.logger ?? createLogger('Gateway');
    this.errorLogger = deps.errorLogger ?? ErrorLogger.getInstance();

    this.tracker = new DeliveryTracker(config.deliveryTimeoutMs, this.logger);
    this.router = new SinkRouter({
      tracker: this.tracker,
      logger: this.logger,
      errorLogger: this.errorLogger,
      eventLogger: deps.eventLogger,
      clock: this.clock,
    });
    for (const sink of deps.sinks ?? []) {
      this.router.register(sink);
    }

    this.registry = new DroneRegistry(
      { capacity: config.maxDrones, inactivityTimeout: config.inactivityTimeoutSeconds },
      {
        clock: this.clock,
        // 용량 초과 제거도 싱크에 비활성으로 통보
        onEvict: (id) => {
          this.counters.capacityEvicted++;
          this.router.onEvict(id);
        },
        logger: this.logger,
        eventLogger: deps.eventLogger,
      }
    );

    const clock = this.clock;
    this.scheduler = new DispatchScheduler(
      { rateLimit: config.rateLimitSeconds },
      {
        registry: this.registry,
        encoder: new CotEncoder({ clock: () => new Date(clock() * 1000) }),
        router: this.router,
        transport: this.transport,
        tracker: this.tracker,
        logger: this.logger,
        errorLogger: this.errorLogger,
        eventLogger: deps.eventLogger,
      }
    );
  }

  get isRunning(): boolean {
    return this.tickTimer !== null;
  }

  /**
   * 원시 메시지 1건 처리
   */
  ingest(raw: unknown): IngestResult {
    this.counters.ingested++;

    const obs = normalizeTelemetry(raw, this.logger);
    if (!obs) {
      this.counters.dropped++;
      this.errorLogger.log(ErrorCode.NORMALIZATION_FAILED, 'normalizer');
      return { outcome: 'dropped', reason: 'unparseable' };
    }

    const prefix = this.config.droneIdPrefix;
    if (obs.id !== undefined && prefix && !obs.id.startsWith(prefix)) {
      obs.id = `${prefix}${obs.id}`;
    }
    if (obs.id !== undefined && this.affiliations) {
      obs.affiliation = this.affiliations.lookup(obs.id);
    }

    const result = this.registry.upsert(obs);
    switch (result.outcome) {
      case 'dropped':
        this.counters.dropped++;
        this.errorLogger.log(
          ErrorCode.CORRELATION_MISS,
          'registry',
          result.reason === 'no_mac_match' ? `MAC ${obs.mac ?? ''}` : 'id/MAC 없음'
        );
        break;
      case 'updated':
        if (result.correlated) this.counters.correlated++;
        break;
      case 'created':
        this.logger.info(`신규 드론: ${result.id}${result.evicted ? ` (제거: ${result.evicted})` : ''}`);
        break;
    }
    return result;
  }

  /**
   * 센서 키트 상태 1건 처리
   */
  ingestSystemStatus(raw: unknown): SystemIngestResult {
    const status = normalizeSystemStatus(raw);
    if (!status) {
      this.errorLogger.log(ErrorCode.NORMALIZATION_FAILED, 'system_status', '상태 메시지는 맵이어야 함');
      return { outcome: 'dropped' };
    }
    if (status.lat === 0 && status.lon === 0) {
      this.logger.warn(`키트 ${status.serialNumber} 위치 없음, (0, 0)으로 송출`);
    }

    this.counters.systemStatus++;
    this.scheduler.dispatchSystem(status, this.clock());
    return { outcome: 'sent', status };
  }

  /**
   * 틱 1회 실행 (테스트 또는 수동 구동용)
   */
  tick(now: number = this.clock()): TickReport {
    return this.scheduler.tick(now);
  }

  /**
   * 활성 드론 복사본
   */
  drones(): DroneSnapshot[] {
    return this.registry.activeRecords();
  }

  /**
   * 주기적 틱 시작 (수신 메시지가 없어도 실행)
   */
  start(): void {
    if (this.tickTimer || this.stopping) return;
    this.tickTimer = setInterval(() => {
      this.tick();
    }, this.config.tickIntervalMs);
    this.logger.info(
      `게이트웨이 시작 (틱 ${this.config.tickIntervalMs}ms, 최대 ${this.config.maxDrones}대, ` +
        `송출 간격 ${this.config.rateLimitSeconds}초, 비활성 ${this.config.inactivityTimeoutSeconds}초)`
    );
  }

  /**
   * 틱 중지 → 싱크 종료 → 남은 전송 대기 → 전송 종료
   */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  getStats(): GatewayStats {
    const dispatch = this.scheduler.getStats();
    const sinks = this.router.getStats();
    return {
      activeDrones: this.registry.size,
      ingested: this.counters.ingested,
      dropped: this.counters.dropped,
      correlated: this.counters.correlated,
      sent: dispatch.sent,
      failed: dispatch.failed + dispatch.encodeFailures + sinks.failures,
      evicted: dispatch.evicted + this.counters.capacityEvicted,
      systemStatus: this.counters.systemStatus,
    };
  }

  private async shutdown(): Promise<void> {
    if (this.tickTimer) {
      clearInterval(this.tickTimer);
      this.tickTimer = null;
    }

    await this.router.closeAll();
    await this.scheduler.flush();

    if (this.transport?.close) {
      try {
        await this.transport.close();
      } catch (error) {
        this.errorLogger.log(ErrorCode.TRANSPORT_FAILED, 'transport.close', describeError(error));
      }
    }
    this.logger.info('게이트웨이 종료');
  }
}

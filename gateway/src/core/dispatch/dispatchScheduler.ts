/**
 * 송출 스케줄러
 *
 * 틱마다 활성 드론을 순회하며
 * 1. 송출 주기(rateLimit)가 지난 드론의 CoT 이벤트(본체/조종자/이륙 지점) 전송
 * 2. 싱크 라우터로 상태 분배
 * 3. 순회가 끝난 뒤 비활성 드론 제거 (싱크 통보 후 삭제)
 *
 * 센서 키트 상태는 틱과 무관하게 수신 즉시 송출
 */

import { createLogger, Logger } from '../logging/console';
import { GatewayEventLogger } from '../logging/logger';
import { CotEntityKind } from '../logging/eventSchemas';
import { describeError, ErrorCode, ErrorLogger } from '../errors/errorLogger';
import { DeliveryOutcome, DeliveryTracker } from '../delivery/delivery';
import { CotEncoder, DEFAULT_STALE_SECONDS } from '../cot/cotEncoder';
import { DroneRegistry } from '../drone/droneRegistry';
import { DroneSnapshot, isUnknownLocation } from '../drone/types';
import { SinkRouter } from '../sinks/sinkRouter';
import { SystemStatus, systemUid } from '../system/systemStatus';
import { CotTransport } from './CotTransport';

export interface DispatchSchedulerConfig {
  /** 드론별 최소 송출 간격 (초) */
  rateLimit: number;
}

export interface DispatchSchedulerDeps {
  registry: DroneRegistry;
  encoder: CotEncoder;
  router: SinkRouter;
  /** 없으면 인코딩만 하고 전송하지 않음 */
  transport?: CotTransport | null;
  tracker: DeliveryTracker;
  logger?: Logger;
  errorLogger?: ErrorLogger;
  eventLogger?: GatewayEventLogger;
}

/** 한 번의 틱 결과 */
export interface TickReport {
  active: number;
  due: string[];
  evicted: string[];
}

export interface DispatchStats {
  ticks: number;
  due: number;
  encoded: number;
  encodeFailures: number;
  sent: number;
  failed: number;
  timeouts: number;
  evicted: number;
}

type EncodeResult = { ok: true; bytes: Buffer } | { ok: false; error: string };

export class DispatchScheduler {
  private readonly config: DispatchSchedulerConfig;
  private readonly registry: DroneRegistry;
  private readonly encoder: CotEncoder;
  private readonly router: SinkRouter;
  private readonly transport: CotTransport | null;
  private readonly tracker: DeliveryTracker;
  private readonly logger: Logger;
  private readonly errorLogger: ErrorLogger;
  private readonly eventLogger?: GatewayEventLogger;

  private stats: DispatchStats = {
    ticks: 0,
    due: 0,
    encoded: 0,
    encodeFailures: 0,
    sent: 0,
    failed: 0,
    timeouts: 0,
    evicted: 0,
  };

  constructor(config: DispatchSchedulerConfig, deps: DispatchSchedulerDeps) {
    if (!(config.rateLimit > 0)) {
      throw new Error(`rateLimit은 양수여야 합니다: ${config.rateLimit}`);
    }
    this.config = { ...config };
    this.registry = deps.registry;
    this.encoder = deps.encoder;
    this.router = deps.router;
    this.transport = deps.transport ?? null;
    this.tracker = deps.tracker;
    this.logger = deps.logger ?? createLogger('Dispatch');
    this.errorLogger = deps.errorLogger ?? ErrorLogger.getInstance();
    this.eventLogger = deps.eventLogger;
  }

  get rateLimit(): number {
    return this.config.rateLimit;
  }

  getStats(): DispatchStats {
    return { ...this.stats };
  }

  /**
   * 틱 1회 실행
   *
   * @param now 현재 시각 (epoch 초)
   */
  tick(now: number): TickReport {
    this.stats.ticks++;
    const timeout = this.registry.inactivityTimeout;
    const records = this.registry.activeRecords();
    const due: string[] = [];

    for (const drone of records) {
      const age = now - drone.lastUpdateTime;
      // 이미 만료된 드론은 아래 sweep에서 제거
      if (age > timeout) continue;
      if (now - drone.lastSentTime < this.config.rateLimit) continue;

      due.push(drone.id);
      this.dispatchDrone(drone, timeout - age, now);
      // 실패해도 송출한 것으로 기록
      this.registry.markSent(drone.id, now);
    }
    this.stats.due += due.length;

    const evicted: string[] = [];
    for (const expired of this.registry.sweep(now)) {
      this.router.onEvict(expired.id);
      this.registry.remove(expired.id);
      evicted.push(expired.id);
      this.logger.debug(`비활성 드론 제거: ${expired.id} (${expired.age.toFixed(1)}초 경과)`);
      this.eventLogger?.log({
        timestamp: now,
        event: 'drone_evicted',
        drone_id: expired.id,
        reason: 'inactive',
        age: expired.age,
      });
    }
    this.stats.evicted += evicted.length;

    this.eventLogger?.log({
      timestamp: now,
      event: 'tick_summary',
      active: this.registry.size,
      due: due.length,
      evicted: evicted.length,
    });

    return { active: records.length, due, evicted };
  }

  /**
   * 센서 키트 상태 송출 (CoT 전송 후 싱크 분배)
   * 인코딩에 실패하면 싱크에도 분배하지 않음
   */
  dispatchSystem(status: SystemStatus, now: number): void {
    const uid = systemUid(status);
    let bytes: Buffer;
    try {
      bytes = this.encoder.encodeSystem(status, DEFAULT_STALE_SECONDS);
    } catch (error) {
      this.stats.encodeFailures++;
      this.errorLogger.log(ErrorCode.ENCODING_FAILED, 'cot.system', `${uid}: ${describeError(error)}`);
      return;
    }
    this.stats.encoded++;
    this.send(uid, 'system', bytes, DEFAULT_STALE_SECONDS, now);
    this.router.publishSystem(status);
  }

  /**
   * 진행 중인 전송 대기
   */
  flush(): Promise<void> {
    return this.tracker.flush();
  }

  private dispatchDrone(drone: DroneSnapshot, staleOffset: number, now: number): void {
    this.deliverEntity(drone, 'main', staleOffset, now);
    if (!isUnknownLocation(drone.pilotLat, drone.pilotLon)) {
      this.deliverEntity(drone, 'pilot', staleOffset, now);
    }
    if (!isUnknownLocation(drone.homeLat, drone.homeLon)) {
      this.deliverEntity(drone, 'home', staleOffset, now);
    }
    this.router.publish(drone);
  }

  private encode(drone: DroneSnapshot, kind: CotEntityKind, staleOffset: number): EncodeResult {
    try {
      const bytes =
        kind === 'main'
          ? this.encoder.encodeMain(drone, staleOffset)
          : kind === 'pilot'
            ? this.encoder.encodePilot(drone, staleOffset)
            : this.encoder.encodeHome(drone, staleOffset);
      return { ok: true, bytes };
    } catch (error) {
      return { ok: false, error: describeError(error) };
    }
  }

  private deliverEntity(drone: DroneSnapshot, kind: CotEntityKind, staleOffset: number, now: number): void {
    const encoded = this.encode(drone, kind, staleOffset);
    if (!encoded.ok) {
      this.stats.encodeFailures++;
      this.errorLogger.log(ErrorCode.ENCODING_FAILED, `cot.${kind}`, `${drone.id}: ${encoded.error}`);
      return;
    }
    this.stats.encoded++;
    this.send(drone.id, kind, encoded.bytes, staleOffset, now);
  }

  private send(uid: string, kind: CotEntityKind, bytes: Buffer, staleOffset: number, now: number): void {
    const transport = this.transport;
    if (!transport) return;

    this.tracker.run(
      () => transport.sendEvent(bytes),
      (outcome) => this.settleSend(uid, kind, staleOffset, now, outcome)
    );
  }

  private settleSend(
    droneId: string,
    kind: CotEntityKind,
    staleOffset: number,
    now: number,
    outcome: DeliveryOutcome
  ): void {
    if (outcome.ok) {
      this.stats.sent++;
      this.eventLogger?.log({
        timestamp: now,
        event: 'cot_sent',
        drone_id: droneId,
        kind,
        stale_offset: staleOffset,
      });
      return;
    }

    this.stats.failed++;
    if (outcome.timedOut) this.stats.timeouts++;
    this.errorLogger.log(
      outcome.timedOut ? ErrorCode.DELIVERY_TIMEOUT : ErrorCode.TRANSPORT_FAILED,
      `transport.${kind}`,
      `${droneId}: ${outcome.error}`
    );
    this.eventLogger?.log({
      timestamp: now,
      event: 'delivery_failed',
      drone_id: droneId,
      target: 'transport',
      operation: kind,
      error: outcome.error,
    });
  }
}

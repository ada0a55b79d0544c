/**
 * 싱크 라우터
 *
 * 등록된 싱크들에 드론 상태를 분배
 * - 싱크별 지원 기능은 등록 시 한 번만 확인
 * - 각 호출은 독립적으로 실행되어 한 싱크의 실패가 다른 싱크에 영향을 주지 않음
 */

import { createLogger, Logger } from '../logging/console';
import { GatewayEventLogger } from '../logging/logger';
import { ErrorCode, ErrorLogger } from '../errors/errorLogger';
import { DeliveryOutcome, DeliveryTask, DeliveryTracker, MaybePromise } from '../delivery/delivery';
import { DroneSnapshot, isUnknownLocation } from '../drone/types';
import { SystemStatus, systemUid } from '../system/systemStatus';
import { ISink, SinkCapability } from './ISink';

type PositionHandler = (id: string, lat: number, lon: number, alt: number) => MaybePromise<void>;

/**
 * 등록된 싱크 (기능별 바인딩된 핸들러)
 */
interface RegisteredSink {
  name: string;
  publishDrone?: (drone: DroneSnapshot) => MaybePromise<void>;
  publishPilot?: PositionHandler;
  publishHome?: PositionHandler;
  publishSystem?: (status: SystemStatus) => MaybePromise<void>;
  markInactive?: (id: string) => MaybePromise<void>;
  close?: () => MaybePromise<void>;
}

export interface SinkRouterOptions {
  /** 호출별 시간 제한 (ms) */
  timeoutMs?: number;
  /** 외부에서 공유하는 추적기 (지정 시 timeoutMs 무시) */
  tracker?: DeliveryTracker;
  logger?: Logger;
  errorLogger?: ErrorLogger;
  eventLogger?: GatewayEventLogger;
  clock?: () => number;
}

export interface SinkRouterStats {
  sinks: number;
  calls: number;
  failures: number;
  timeouts: number;
}

export class SinkRouter {
  private sinks: RegisteredSink[] = [];
  private readonly tracker: DeliveryTracker;
  private readonly logger: Logger;
  private readonly errorLogger: ErrorLogger;
  private readonly eventLogger?: GatewayEventLogger;
  private readonly clock: () => number;
  private closed: boolean = false;

  private stats = { calls: 0, failures: 0, timeouts: 0 };

  constructor(options: SinkRouterOptions = {}) {
    this.logger = options.logger ?? createLogger('SinkRouter');
    this.tracker = options.tracker ?? new DeliveryTracker(options.timeoutMs ?? 5000, this.logger);
    this.errorLogger = options.errorLogger ?? ErrorLogger.getInstance();
    this.eventLogger = options.eventLogger;
    this.clock = options.clock ?? (() => Date.now() / 1000);
  }

  /**
   * 싱크 등록
   */
  register(sink: ISink, name: string = sink.name ?? `sink-${this.sinks.length + 1}`): void {
    const registered: RegisteredSink = {
      name,
      publishDrone: sink.publishDrone?.bind(sink),
      publishPilot: sink.publishPilot?.bind(sink),
      publishHome: sink.publishHome?.bind(sink),
      publishSystem: sink.publishSystem?.bind(sink),
      markInactive: sink.markInactive?.bind(sink),
      close: sink.close?.bind(sink),
    };
    this.sinks.push(registered);
    this.logger.info(`싱크 등록: ${name} [${this.capabilitiesOf(registered).join(', ')}]`);
  }

  get size(): number {
    return this.sinks.length;
  }

  /**
   * 등록된 싱크의 지원 기능
   */
  capabilities(name: string): SinkCapability[] {
    const sink = this.sinks.find((s) => s.name === name);
    return sink ? this.capabilitiesOf(sink) : [];
  }

  getStats(): SinkRouterStats {
    return { sinks: this.sinks.length, ...this.stats };
  }

  /**
   * 드론 상태 분배
   * 조종자/이륙 지점 좌표가 (0, 0)이면 해당 호출은 생략
   */
  publish(drone: DroneSnapshot): void {
    const hasPilot = !isUnknownLocation(drone.pilotLat, drone.pilotLon);
    const hasHome = !isUnknownLocation(drone.homeLat, drone.homeLon);

    for (const sink of this.sinks) {
      const { publishDrone, publishPilot, publishHome } = sink;
      if (publishDrone) {
        this.call(sink, 'publishDrone', drone.id, () => publishDrone(drone));
      }
      if (publishPilot && hasPilot) {
        this.call(sink, 'publishPilot', drone.id, () =>
          publishPilot(drone.id, drone.pilotLat, drone.pilotLon, 0)
        );
      }
      if (publishHome && hasHome) {
        this.call(sink, 'publishHome', drone.id, () =>
          publishHome(drone.id, drone.homeLat, drone.homeLon, 0)
        );
      }
    }
  }

  /**
   * 센서 키트 상태 분배
   */
  publishSystem(status: SystemStatus): void {
    const uid = systemUid(status);
    for (const sink of this.sinks) {
      const { publishSystem } = sink;
      if (publishSystem) {
        this.call(sink, 'publishSystem', uid, () => publishSystem(status));
      }
    }
  }

  /**
   * 비활성 드론 통보
   */
  onEvict(id: string): void {
    for (const sink of this.sinks) {
      const { markInactive } = sink;
      if (markInactive) {
        this.call(sink, 'markInactive', id, () => markInactive(id));
      }
    }
  }

  /**
   * 모든 싱크 종료 (한 번만 수행)
   * 실패는 로그만 남기고 전파하지 않음
   */
  async closeAll(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    for (const sink of this.sinks) {
      const { close } = sink;
      if (close) {
        this.call(sink, 'close', '-', () => close());
      }
    }
    await this.tracker.flush();
    this.logger.info('모든 싱크 종료');
  }

  /**
   * 진행 중인 싱크 호출 대기
   */
  flush(): Promise<void> {
    return this.tracker.flush();
  }

  private call(sink: RegisteredSink, operation: string, droneId: string, task: DeliveryTask): void {
    this.stats.calls++;
    this.tracker.run(task, (outcome) => this.settle(sink, operation, droneId, outcome));
  }

  private settle(sink: RegisteredSink, operation: string, droneId: string, outcome: DeliveryOutcome): void {
    if (outcome.ok) return;

    this.stats.failures++;
    if (outcome.timedOut) this.stats.timeouts++;

    this.errorLogger.log(
      outcome.timedOut ? ErrorCode.DELIVERY_TIMEOUT : ErrorCode.SINK_FAILED,
      `${sink.name}.${operation}`,
      `${droneId}: ${outcome.error}`
    );
    this.eventLogger?.log({
      timestamp: this.clock(),
      event: 'delivery_failed',
      drone_id: droneId,
      target: 'sink',
      operation: `${sink.name}.${operation}`,
      error: outcome.error,
    });
  }

  private capabilitiesOf(sink: RegisteredSink): SinkCapability[] {
    const capabilities: SinkCapability[] = [];
    if (sink.publishDrone) capabilities.push('drone');
    if (sink.publishPilot) capabilities.push('pilot');
    if (sink.publishHome) capabilities.push('home');
    if (sink.publishSystem) capabilities.push('system');
    if (sink.markInactive) capabilities.push('inactive');
    if (sink.close) capabilities.push('close');
    return capabilities;
  }
}

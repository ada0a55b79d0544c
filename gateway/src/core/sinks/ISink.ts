/**
 * 싱크 인터페이스
 *
 * 드론 상태를 외부(WebSocket 클라이언트, 메시지 브로커 등)로 내보내는 구현체
 * 모든 메서드는 선택 사항이며, 구현한 메서드만 호출됨
 */

import { DroneSnapshot } from '../drone/types';
import { MaybePromise } from '../delivery/delivery';
import { SystemStatus } from '../system/systemStatus';

export interface ISink {
  /** 로그용 이름 */
  readonly name?: string;

  /**
   * 드론 전체 상태
   */
  publishDrone?(drone: DroneSnapshot): MaybePromise<void>;

  /**
   * 조종자 위치 ((0, 0)이면 호출되지 않음)
   *
   * @param id 드론 ID
   */
  publishPilot?(id: string, lat: number, lon: number, alt: number): MaybePromise<void>;

  /**
   * 이륙 지점 위치 ((0, 0)이면 호출되지 않음)
   *
   * @param id 드론 ID
   */
  publishHome?(id: string, lat: number, lon: number, alt: number): MaybePromise<void>;

  /**
   * 센서 키트 상태
   */
  publishSystem?(status: SystemStatus): MaybePromise<void>;

  /**
   * 비활성 드론 통보 (레지스트리에서 제거되기 직전)
   */
  markInactive?(id: string): MaybePromise<void>;

  /**
   * 종료 시 한 번 호출
   */
  close?(): MaybePromise<void>;
}

export type SinkCapability = 'drone' | 'pilot' | 'home' | 'system' | 'inactive' | 'close';

/**
 * 게이트웨이 이벤트 로그 스키마
 *
 * JSONL 형식으로 1줄 1이벤트 저장됩니다.
 */

import { Affiliation } from '../../../../shared/schemas';
import { EvictionReason } from '../drone/types';

// ============================================
// 기본 이벤트 인터페이스
// ============================================

export interface BaseEvent {
  timestamp: number;  // epoch 초
  event: string;      // 이벤트 타입
}

/** CoT 엔티티 종류 */
export type CotEntityKind = 'main' | 'pilot' | 'home' | 'system';

/** 송출 대상 */
export type DeliveryTarget = 'transport' | 'sink';

// ============================================
// 레지스트리 이벤트
// ============================================

export interface DroneCreatedEvent extends BaseEvent {
  event: 'drone_created';
  drone_id: string;
  mac: string;
  affiliation: Affiliation;
}

export interface DroneUpdatedEvent extends BaseEvent {
  event: 'drone_updated';
  drone_id: string;
  /** MAC 상관으로 병합된 CAA 전용 방송 여부 */
  correlated: boolean;
}

export interface DroneEvictedEvent extends BaseEvent {
  event: 'drone_evicted';
  drone_id: string;
  reason: EvictionReason;
  age?: number;
}

// ============================================
// 송출 이벤트
// ============================================

export interface CotSentEvent extends BaseEvent {
  event: 'cot_sent';
  drone_id: string;
  kind: CotEntityKind;
  stale_offset: number;
}

export interface DeliveryFailedEvent extends BaseEvent {
  event: 'delivery_failed';
  drone_id: string;
  target: DeliveryTarget;
  operation: string;
  error: string;
}

export interface TickSummaryEvent extends BaseEvent {
  event: 'tick_summary';
  active: number;
  due: number;
  evicted: number;
}

export type GatewayLogEvent =
  | DroneCreatedEvent
  | DroneUpdatedEvent
  | DroneEvictedEvent
  | CotSentEvent
  | DeliveryFailedEvent
  | TickSummaryEvent;

export type GatewayLogEventType = GatewayLogEvent['event'];

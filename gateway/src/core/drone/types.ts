/**
 * 드론 추적 타입 정의
 *
 * Remote ID 관측치(Observation) → 드론 레코드(DroneRecord)
 */

import { Affiliation } from '../../../../shared/schemas';

export type { Affiliation };

// ============================================
// 관측치 (Observation)
// ============================================

/**
 * 메시지 하나에서 정규화된 부분 관측치
 * 메시지에 없던 필드는 undefined
 */
export interface Observation {
  /** 시리얼 번호 기반 고유 ID (CAA 전용 방송이면 없음) */
  id?: string;
  idType?: string;
  /** CAA 등록 번호 */
  caa?: string;

  /** UA 타입 코드 (표에 없으면 null) */
  uaType?: number | null;
  uaTypeName?: string;

  // 무선 정보
  mac?: string;
  rssi?: number;
  /** 주파수 (Hz) */
  freq?: number | null;

  // 위치/운동
  lat?: number;
  lon?: number;
  /** 측지 고도 (m) */
  alt?: number;
  /** 지면 기준 고도 AGL (m) */
  height?: number;
  speed?: number;
  vspeed?: number;
  /** 방위 (도), 수신기가 제공하지 않으면 null */
  direction?: number | null;

  // 조종자/이륙 지점
  pilotLat?: number;
  pilotLon?: number;
  homeLat?: number;
  homeLon?: number;

  description?: string;
  operatorIdType?: string;
  operatorId?: string;

  // Location/Vector 부가 필드
  opStatus?: string;
  heightType?: string;
  ewDir?: string;
  speedMultiplier?: number;
  pressureAltitude?: number;
  verticalAccuracy?: string;
  horizontalAccuracy?: string;
  baroAccuracy?: string;
  speedAccuracy?: string;
  timestamp?: string;
  timestampAccuracy?: string;

  index?: number;
  runtime?: number;

  affiliation?: Affiliation;
}

// ============================================
// 드론 레코드 (DroneRecord)
// ============================================

/**
 * 레지스트리가 소유하는 드론 상태
 * 시간 값은 모두 초 단위 (epoch seconds)
 */
export interface DroneRecord {
  id: string;
  idType: string;
  caa: string;
  uaType: number | null;
  uaTypeName: string;
  affiliation: Affiliation;

  mac: string;
  rssi: number;
  freq: number | null;

  lat: number;
  lon: number;
  alt: number;
  height: number;
  speed: number;
  vspeed: number;
  direction: number | null;

  /** 직전 위치 (방위 계산용, 첫 관측이면 null) */
  prevLat: number | null;
  prevLon: number | null;

  pilotLat: number;
  pilotLon: number;
  homeLat: number;
  homeLon: number;

  description: string;
  operatorIdType: string;
  operatorId: string;
  opStatus: string;
  heightType: string;
  ewDir: string;
  speedMultiplier: number | null;
  pressureAltitude: number | null;
  verticalAccuracy: string;
  horizontalAccuracy: string;
  baroAccuracy: string;
  speedAccuracy: string;
  timestamp: string;
  timestampAccuracy: string;

  index: number;
  runtime: number;

  lastUpdateTime: number;
  /** 마지막 송출 시각 (한 번도 송출하지 않았으면 0) */
  lastSentTime: number;
  lastSentLat: number;
  lastSentLon: number;
}

/** 송출/싱크 작업에 넘기는 읽기 전용 복사본 */
export type DroneSnapshot = Readonly<DroneRecord>;

/** 레코드 제거 사유 */
export type EvictionReason = 'capacity' | 'inactive';

/**
 * (0, 0)은 "위치 미상"을 뜻함 (실제 좌표로 취급하지 않음)
 */
export function isUnknownLocation(lat: number, lon: number): boolean {
  return lat === 0 && lon === 0;
}

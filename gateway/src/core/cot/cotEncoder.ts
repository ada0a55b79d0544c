/**
 * CoT(Cursor on Target) 인코더
 *
 * 드론 레코드 → CoT XML 이벤트 (드론 본체 / 조종자 / 이륙 지점)
 * 센서 키트 상태 → 키트 위치 이벤트
 */

import { Affiliation } from '../../../../shared/schemas';
import { DroneSnapshot } from '../drone/types';
import { SystemStatus, systemUid } from '../system/systemStatus';
import { renderDocument, XmlElement } from './xml';

// ============================================
// 상수
// ============================================

/** UA 타입 코드 → CoT 타입 */
export const UA_COT_TYPE_MAP: Readonly<Record<number, string>> = {
  1: 'a-f-A-f',       // 고정익
  2: 'a-u-A-M-H-R',   // 헬리콥터/멀티로터
  3: 'a-u-A-M-H-R',   // 자이로플레인
  4: 'a-u-A-M-H-R',   // VTOL
  5: 'a-f-A-f',       // 오니솝터
  6: 'a-f-A-f',       // 글라이더
  7: 'b-m-p-s-m',     // 연
  8: 'b-m-p-s-m',     // 자유 기구
  9: 'b-m-p-s-m',     // 계류 기구
  10: 'b-m-p-s-m',    // 비행선
  11: 'b-m-p-s-m',    // 낙하산
  12: 'b-m-p-s-m',    // 로켓
  13: 'b-m-p-s-m',    // 유선 동력 비행체
  14: 'b-m-p-s-m',    // 지상 장애물
  15: 'b-m-p-s-m',    // 기타
};

/** 매핑되지 않은 UA 타입 (일반 공중 트랙) */
export const DEFAULT_COT_TYPE = 'a-u-A-M-H-R';

/** 센서 키트 CoT 타입 (아군 지상 센서 장비) */
export const SYSTEM_COT_TYPE = 'a-f-G-E-S';

/** 조종자/이륙 지점 CoT 타입 */
export const MARKER_COT_TYPE = 'b-m-p-s-m';

/** 소속별 ARGB 색상 */
export const AFFILIATION_COLOR: Readonly<Record<Affiliation, string>> = {
  authorized: '-16776961',    // 파랑
  unauthorized: '-65536',     // 빨강
  unknown: '-256',            // 노랑
};

/** 알 수 없는 소속 문자열 (회색) */
export const FALLBACK_COLOR = '-8355712';

export const PILOT_ICON = 'com.atakmap.android.maps.public/Civilian/Person.png';
export const HOME_ICON = 'com.atakmap.android.maps.public/Civilian/House.png';

/** staleOffset이 없을 때 기본 유효 시간 (초) */
export const DEFAULT_STALE_SECONDS = 600;

const CIRCULAR_ERROR = '35.0';
const LINEAR_ERROR = '999999';

// ============================================
// 유틸리티
// ============================================

/**
 * CoT 시각 형식: YYYY-MM-DDTHH:MM:SS.ffffffZ (마이크로초 6자리)
 */
export function formatCotTime(date: Date): string {
  return date.toISOString().replace(/\.(\d{3})Z$/, '.$1000Z');
}

export function cotTypeFor(uaType: number | null): string {
  if (uaType === null) return DEFAULT_COT_TYPE;
  return UA_COT_TYPE_MAP[uaType] ?? DEFAULT_COT_TYPE;
}

export function colorFor(affiliation: string): string {
  switch (affiliation) {
    case 'authorized':
    case 'unauthorized':
    case 'unknown':
      return AFFILIATION_COLOR[affiliation];
    default:
      return FALLBACK_COLOR;
  }
}

/**
 * 조종자/이륙 지점 UID 기준 ID ("drone-" 접두어 제거)
 */
export function baseId(id: string): string {
  return id.startsWith('drone-') ? id.slice('drone-'.length) : id;
}

function display(value: number | null): string {
  return value === null ? 'N/A' : String(value);
}

/**
 * 드론 요약 문자열
 */
export function buildRemarks(drone: DroneSnapshot): string {
  return (
    `MAC: ${drone.mac}, RSSI: ${drone.rssi}dBm; ` +
    `ID Type: ${drone.idType}; UA Type: ${drone.uaTypeName} (${display(drone.uaType)}); ` +
    `Operator ID: [${drone.operatorIdType}: ${drone.operatorId}]; ` +
    `Speed: ${drone.speed} m/s; Vert Speed: ${drone.vspeed} m/s; ` +
    `Altitude: ${drone.alt} m; AGL: ${drone.height} m; ` +
    `Course: ${display(drone.direction)}°; ` +
    `Index: ${drone.index}; Runtime: ${drone.runtime}s`
  );
}

/**
 * 센서 키트 요약 문자열
 */
export function buildSystemRemarks(status: SystemStatus): string {
  return (
    `CPU Usage: ${status.cpuUsage}%, ` +
    `Memory Total: ${status.memoryTotal.toFixed(2)} MB, Memory Available: ${status.memoryAvailable.toFixed(2)} MB, ` +
    `Disk Total: ${status.diskTotal.toFixed(2)} MB, Disk Used: ${status.diskUsed.toFixed(2)} MB, ` +
    `Temperature: ${status.temperature}°C, Uptime: ${status.uptime} seconds, ` +
    `Pluto Temp: ${status.plutoTemp}, Zynq Temp: ${status.zynqTemp}`
  );
}

// ============================================
// 인코더
// ============================================

export interface CotEncoderOptions {
  /** 현재 UTC 시각 */
  clock?: () => Date;
}

interface EventEnvelope {
  uid: string;
  type: string;
  lat: number;
  lon: number;
  hae: number;
  staleOffset?: number;
  detail: XmlElement[];
}

export class CotEncoder {
  private readonly clock: () => Date;

  constructor(options: CotEncoderOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * 드론 본체 이벤트
   *
   * @param staleOffset 현재 시각 이후 유효 시간 (초)
   */
  encodeMain(drone: DroneSnapshot, staleOffset?: number): Buffer {
    return this.encode({
      uid: drone.id,
      type: cotTypeFor(drone.uaType),
      lat: drone.lat,
      lon: drone.lon,
      hae: drone.alt,
      staleOffset,
      detail: [
        { name: 'contact', attrs: { callsign: drone.id } },
        { name: 'precisionlocation', attrs: { geopointsrc: 'gps', altsrc: 'gps' } },
        {
          name: 'track',
          attrs: { course: String(drone.direction ?? 0), speed: String(drone.speed || 0) },
        },
        { name: 'remarks', text: buildRemarks(drone) },
        { name: 'color', attrs: { argb: colorFor(drone.affiliation) } },
      ],
    });
  }

  /**
   * 조종자 위치 이벤트
   */
  encodePilot(drone: DroneSnapshot, staleOffset?: number): Buffer {
    return this.encodeMarker(drone, 'pilot', drone.pilotLat, drone.pilotLon, PILOT_ICON, staleOffset);
  }

  /**
   * 이륙 지점 이벤트
   */
  encodeHome(drone: DroneSnapshot, staleOffset?: number): Buffer {
    return this.encodeMarker(drone, 'home', drone.homeLat, drone.homeLon, HOME_ICON, staleOffset);
  }

  /**
   * 센서 키트 위치/상태 이벤트
   */
  encodeSystem(status: SystemStatus, staleOffset?: number): Buffer {
    const uid = systemUid(status);
    return this.encode({
      uid,
      type: SYSTEM_COT_TYPE,
      lat: status.lat,
      lon: status.lon,
      hae: status.alt,
      staleOffset,
      detail: [
        { name: 'contact', attrs: { callsign: uid } },
        { name: 'precisionlocation', attrs: { geopointsrc: 'gps', altsrc: 'gps' } },
        { name: 'track', attrs: { course: String(status.track), speed: String(status.speed) } },
        { name: 'remarks', text: buildSystemRemarks(status) },
      ],
    });
  }

  private encodeMarker(
    drone: DroneSnapshot,
    kind: 'pilot' | 'home',
    lat: number,
    lon: number,
    icon: string,
    staleOffset?: number
  ): Buffer {
    const uid = `${kind}-${baseId(drone.id)}`;
    const label = kind === 'pilot' ? 'Pilot' : 'Home';
    return this.encode({
      uid,
      type: MARKER_COT_TYPE,
      lat,
      lon,
      hae: drone.alt,
      staleOffset,
      detail: [
        { name: 'contact', attrs: { callsign: uid } },
        { name: 'precisionlocation', attrs: { geopointsrc: 'gps', altsrc: 'gps' } },
        { name: 'usericon', attrs: { iconsetpath: icon } },
        { name: 'remarks', text: `${label} location for drone ${drone.id}` },
        { name: 'color', attrs: { argb: colorFor(drone.affiliation) } },
      ],
    });
  }

  private encode(envelope: EventEnvelope): Buffer {
    const now = this.clock();
    const staleSeconds = envelope.staleOffset ?? DEFAULT_STALE_SECONDS;
    const stale = new Date(now.getTime() + staleSeconds * 1000);
    const time = formatCotTime(now);

    const event: XmlElement = {
      name: 'event',
      attrs: {
        version: '2.0',
        uid: envelope.uid,
        type: envelope.type,
        time,
        start: time,
        stale: formatCotTime(stale),
        how: 'm-g',
      },
      children: [
        {
          name: 'point',
          attrs: {
            lat: String(envelope.lat),
            lon: String(envelope.lon),
            hae: String(envelope.hae),
            ce: CIRCULAR_ERROR,
            le: LINEAR_ERROR,
          },
        },
        { name: 'detail', children: envelope.detail },
      ],
    };

    return Buffer.from(renderDocument(event), 'utf-8');
  }
}

/**
 * 텔레메트리 정규화 모듈
 *
 * 두 가지 원시 Remote ID 형식을 하나의 관측치(Observation)로 변환
 * - 리스트 형식 (DJI/AntSDR): 파트 배열, 뒤에 오는 파트가 우선
 * - 딕셔너리 형식 (ESP32): 하나의 맵에 모든 파트
 *
 * 순수 함수: I/O 없음, 예외를 던지지 않음
 */

import { ID_TYPE_CAA, ID_TYPE_SERIAL } from '../../../../shared/schemas';
import { createLogger, Logger } from '../logging/console';
import { Observation } from '../drone/types';
import { getRecord, isRecord, toInt, toNumber, toText } from './coerce';
import { resolveUaType } from './uaTypes';

const defaultLogger = createLogger('Normalizer');

// ============================================
// 파트별 변환
// ============================================

function applyBasicId(obs: Observation, basic: Record<string, unknown>): void {
  const ua = resolveUaType(basic.ua_type);
  obs.uaType = ua.code;
  obs.uaTypeName = ua.name;

  const idType = toText(basic.id_type);
  obs.idType = idType;
  obs.mac = basic.MAC !== undefined ? toText(basic.MAC) : (obs.mac ?? '');
  obs.rssi = basic.RSSI !== undefined ? toNumber(basic.RSSI, 0) : (obs.rssi ?? 0);

  // id_type에 따라 시리얼(정식 ID) 또는 CAA 등록번호로 해석
  const rawId = basic.id !== undefined ? toText(basic.id) : 'unknown';
  if (idType === ID_TYPE_SERIAL) {
    obs.id = rawId;
  } else if (idType === ID_TYPE_CAA) {
    obs.caa = rawId;
  }
}

function applyLocation(obs: Observation, loc: Record<string, unknown>): void {
  obs.lat = toNumber(loc.latitude, 0);
  obs.lon = toNumber(loc.longitude, 0);
  obs.speed = toNumber(loc.speed, 0);
  obs.vspeed = toNumber(loc.vert_speed, 0);
  obs.alt = toNumber(loc.geodetic_altitude, 0);
  obs.height = toNumber(loc.height_agl, 0);

  obs.opStatus = toText(loc.op_status);
  obs.heightType = toText(loc.height_type);
  obs.ewDir = toText(loc.ew_dir_segment);
  obs.direction = toInt(loc.direction, null);
  obs.speedMultiplier = toNumber(loc.speed_multiplier, 0);
  obs.pressureAltitude = toNumber(loc.pressure_altitude, 0);
  obs.verticalAccuracy = toText(loc.vertical_accuracy);
  obs.horizontalAccuracy = toText(loc.horizontal_accuracy);
  obs.baroAccuracy = toText(loc.baro_accuracy);
  obs.speedAccuracy = toText(loc.speed_accuracy);
  obs.timestamp = toText(loc.timestamp);
  obs.timestampAccuracy = toText(loc.timestamp_accuracy);
}

function applyCommonParts(obs: Observation, part: Record<string, unknown>): void {
  const frequency = getRecord(part, 'Frequency Message');
  if (frequency) {
    obs.freq = toNumber(frequency.frequency, null);
  }

  const basic = getRecord(part, 'Basic ID');
  if (basic) applyBasicId(obs, basic);

  const operator = getRecord(part, 'Operator ID Message');
  if (operator) {
    obs.operatorIdType = toText(operator.operator_id_type);
    obs.operatorId = toText(operator.operator_id);
  }

  const loc = getRecord(part, 'Location/Vector Message');
  if (loc) applyLocation(obs, loc);

  const selfId = getRecord(part, 'Self-ID Message');
  if (selfId) {
    obs.description = toText(selfId.text);
  }
}

function hasFields(obs: Observation): boolean {
  return Object.keys(obs).length > 0;
}

// ============================================
// 형식별 정규화
// ============================================

/**
 * 리스트 형식 (DJI/AntSDR)
 */
function normalizePartList(parts: unknown[], logger: Logger): Observation | null {
  const obs: Observation = {};

  for (const part of parts) {
    if (!isRecord(part)) {
      logger.error('메시지 리스트에 맵이 아닌 항목이 있어 건너뜀');
      continue;
    }

    // 최상위 링크 계층 필드
    if ('MAC' in part) obs.mac = toText(part.MAC);
    if ('RSSI' in part) obs.rssi = toNumber(part.RSSI, 0);

    applyCommonParts(obs, part);

    const system = getRecord(part, 'System Message');
    if (system) {
      obs.pilotLat = toNumber(system.latitude, 0);
      obs.pilotLon = toNumber(system.longitude, 0);
      obs.homeLat = toNumber(system.home_lat, 0);
      obs.homeLon = toNumber(system.home_lon, 0);
    }
  }

  return hasFields(obs) ? obs : null;
}

/**
 * 딕셔너리 형식 (ESP32)
 */
function normalizeFrame(frame: Record<string, unknown>): Observation | null {
  const obs: Observation = {
    index: toInt(frame.index, 0),
    runtime: toInt(frame.runtime, 0),
  };

  const adv = getRecord(frame, 'AUX_ADV_IND');
  if (adv) {
    if ('rssi' in adv) obs.rssi = toNumber(adv.rssi, 0);
    const aext = getRecord(frame, 'aext');
    if (aext && typeof aext.AdvA === 'string') {
      obs.mac = aext.AdvA.trim().split(/\s+/)[0];
    }
  }

  applyCommonParts(obs, frame);

  // ESP32 System Message에는 보통 home 좌표가 없음
  const system = getRecord(frame, 'System Message');
  if (system) {
    obs.pilotLat = toNumber(system.operator_lat, 0);
    obs.pilotLon = toNumber(system.operator_lon, 0);
  }

  return hasFields(obs) ? obs : null;
}

/**
 * 원시 메시지 정규화
 *
 * @param message 수신기에서 받은 JSON (리스트 또는 맵)
 * @returns 부분 관측치, 사용할 수 없는 메시지면 null
 */
export function normalizeTelemetry(message: unknown, logger: Logger = defaultLogger): Observation | null {
  try {
    if (Array.isArray(message)) {
      return normalizePartList(message, logger);
    }
    if (isRecord(message)) {
      return normalizeFrame(message);
    }
    logger.error(`예상치 못한 메시지 형식 (${message === null ? 'null' : typeof message}); 리스트 또는 맵이어야 함`);
    return null;
  } catch (error) {
    logger.error('텔레메트리 정규화 중 오류, 메시지 폐기:', error);
    return null;
  }
}

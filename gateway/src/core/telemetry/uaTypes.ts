/**
 * Remote ID UA(무인기) 타입 코드표
 */

export const UA_TYPE_NAMES: Readonly<Record<number, string>> = {
  0: 'No UA type defined',
  1: 'Aeroplane/Airplane (Fixed wing)',
  2: 'Helicopter or Multirotor',
  3: 'Gyroplane',
  4: 'VTOL (Vertical Take-Off and Landing)',
  5: 'Ornithopter',
  6: 'Glider',
  7: 'Kite',
  8: 'Free Balloon',
  9: 'Captive Balloon',
  10: 'Airship (Blimp)',
  11: 'Free Fall/Parachute',
  12: 'Rocket',
  13: 'Tethered powered aircraft',
  14: 'Ground Obstacle',
  15: 'Other type',
};

/** 코드표에 없는 값의 이름 */
export const UNKNOWN_UA_TYPE_NAME = 'Unknown';

export interface UaType {
  /** 코드표에 없으면 null */
  code: number | null;
  name: string;
}

function isKnownCode(code: number): boolean {
  return Object.prototype.hasOwnProperty.call(UA_TYPE_NAMES, code);
}

/**
 * 원시 ua_type 값을 (코드, 이름)으로 변환
 * 정수 코드 또는 대소문자 무시 이름 검색, 표 밖의 값은 Unknown
 */
export function resolveUaType(raw: unknown): UaType {
  let code: number | null = null;

  if (typeof raw === 'number' && Number.isFinite(raw)) {
    code = Math.trunc(raw);
  } else if (typeof raw === 'string') {
    if (/^\s*[+-]?\d+\s*$/.test(raw)) {
      code = parseInt(raw, 10);
    } else {
      const wanted = raw.toLowerCase();
      const match = Object.entries(UA_TYPE_NAMES).find(([, name]) => name.toLowerCase() === wanted);
      code = match ? Number(match[0]) : null;
    }
  }

  if (code === null || !isKnownCode(code)) {
    return { code: null, name: UNKNOWN_UA_TYPE_NAME };
  }
  return { code, name: UA_TYPE_NAMES[code] };
}

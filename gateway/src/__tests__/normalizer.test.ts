/**
 * 텔레메트리 정규화 테스트
 */

import { ID_TYPE_CAA, ID_TYPE_SERIAL, RemoteIdFrame } from '../../../shared/schemas';
import { normalizeTelemetry } from '../core/telemetry/normalizer';
import { resolveUaType } from '../core/telemetry/uaTypes';
import { toInt, toNumber } from '../core/telemetry/coerce';
import { createMockLogger } from './helpers';

describe('normalizeTelemetry', () => {
  describe('리스트 형식', () => {
    it('모든 파트를 하나의 관측치로 합쳐야 함', () => {
      const logger = createMockLogger();
      const obs = normalizeTelemetry(
        [
          { MAC: 'aa:bb', RSSI: -60, 'Basic ID': { id_type: ID_TYPE_SERIAL, id: 'SN123', ua_type: 2 } },
          {
            'Location/Vector Message': {
              latitude: 40.0,
              longitude: -70.0,
              geodetic_altitude: 100,
              speed: '5.5 m/s',
              vert_speed: 1,
              height_agl: 30,
              direction: 270,
            },
          },
          { 'System Message': { latitude: 40.1, longitude: -70.1, home_lat: 40.2, home_lon: -70.2 } },
          { 'Self-ID Message': { text: 'survey' } },
          { 'Operator ID Message': { operator_id_type: 'Operator ID', operator_id: 'OP1' } },
          { 'Frequency Message': { frequency: 2437000000 } },
        ],
        logger
      );

      expect(obs).not.toBeNull();
      expect(obs?.id).toBe('SN123');
      expect(obs?.idType).toBe(ID_TYPE_SERIAL);
      expect(obs?.mac).toBe('aa:bb');
      expect(obs?.rssi).toBe(-60);
      expect(obs?.uaType).toBe(2);
      expect(obs?.uaTypeName).toBe('Helicopter or Multirotor');
      expect(obs?.lat).toBe(40);
      expect(obs?.lon).toBe(-70);
      expect(obs?.alt).toBe(100);
      expect(obs?.speed).toBe(5.5);
      expect(obs?.height).toBe(30);
      expect(obs?.direction).toBe(270);
      expect(obs?.pilotLat).toBe(40.1);
      expect(obs?.pilotLon).toBe(-70.1);
      expect(obs?.homeLat).toBe(40.2);
      expect(obs?.homeLon).toBe(-70.2);
      expect(obs?.description).toBe('survey');
      expect(obs?.operatorId).toBe('OP1');
      expect(obs?.freq).toBe(2437000000);
      expect(logger.error).not.toHaveBeenCalled();
    });

    it('Basic ID의 MAC/RSSI가 최상위 값보다 우선해야 함', () => {
      const obs = normalizeTelemetry([
        { MAC: 'top', RSSI: -90, 'Basic ID': { id_type: ID_TYPE_SERIAL, id: 'X', MAC: 'inner', RSSI: -40 } },
      ]);
      expect(obs?.mac).toBe('inner');
      expect(obs?.rssi).toBe(-40);
    });

    it('뒤에 오는 파트가 같은 필드를 덮어써야 함', () => {
      const obs = normalizeTelemetry([
        { 'Location/Vector Message': { latitude: 1, longitude: 1 } },
        { 'Location/Vector Message': { latitude: 2, longitude: 3 } },
      ]);
      expect(obs?.lat).toBe(2);
      expect(obs?.lon).toBe(3);
    });

    it('CAA 등록번호는 id 없이 caa만 설정해야 함', () => {
      const obs = normalizeTelemetry([{ 'Basic ID': { id_type: ID_TYPE_CAA, id: 'CAA-7', MAC: 'm1' } }]);
      expect(obs?.id).toBeUndefined();
      expect(obs?.caa).toBe('CAA-7');
      expect(obs?.mac).toBe('m1');
    });

    it('맵이 아닌 항목은 건너뛰고 나머지를 처리해야 함', () => {
      const logger = createMockLogger();
      const obs = normalizeTelemetry([42, { 'Basic ID': { id_type: ID_TYPE_SERIAL, id: 'X' } }], logger);
      expect(obs?.id).toBe('X');
      expect(logger.error).toHaveBeenCalledTimes(1);
    });

    it('숫자 변환 실패 시 해당 필드만 기본값이 되어야 함', () => {
      const obs = normalizeTelemetry([
        { 'Location/Vector Message': { latitude: 'abc', longitude: '12.5', speed: null } },
      ]);
      expect(obs?.lat).toBe(0);
      expect(obs?.lon).toBe(12.5);
      expect(obs?.speed).toBe(0);
      expect(obs?.direction).toBeNull();
    });

    it('빈 리스트는 관측치가 없어야 함', () => {
      expect(normalizeTelemetry([])).toBeNull();
    });
  });

  describe('딕셔너리 형식', () => {
    it('링크 계층 필드와 조종자 위치를 읽어야 함', () => {
      const frame: RemoteIdFrame = {
        index: 5,
        runtime: 12,
        AUX_ADV_IND: { rssi: -70 },
        aext: { AdvA: '11:22:33:44:55:66 random' },
        'Basic ID': { id_type: ID_TYPE_SERIAL, id: 'ESP1', ua_type: 'helicopter or multirotor' },
        'Location/Vector Message': { latitude: 10, longitude: 20, pressure_altitude: '101.5 m' },
        'System Message': { operator_lat: 1.5, operator_lon: 2.5 },
      };
      const obs = normalizeTelemetry(frame);

      expect(obs?.index).toBe(5);
      expect(obs?.runtime).toBe(12);
      expect(obs?.rssi).toBe(-70);
      expect(obs?.mac).toBe('11:22:33:44:55:66');
      expect(obs?.id).toBe('ESP1');
      expect(obs?.uaType).toBe(2);
      expect(obs?.pressureAltitude).toBe(101.5);
      expect(obs?.pilotLat).toBe(1.5);
      expect(obs?.pilotLon).toBe(2.5);
      expect(obs?.homeLat).toBeUndefined();
    });
  });

  it('리스트/맵이 아닌 메시지는 null을 반환하고 로그를 남겨야 함', () => {
    const logger = createMockLogger();
    expect(normalizeTelemetry('hello', logger)).toBeNull();
    expect(normalizeTelemetry(null, logger)).toBeNull();
    expect(logger.error).toHaveBeenCalledTimes(2);
  });
});

describe('resolveUaType', () => {
  it('정수 코드와 이름을 모두 받아야 함', () => {
    expect(resolveUaType(1)).toEqual({ code: 1, name: 'Aeroplane/Airplane (Fixed wing)' });
    expect(resolveUaType('4')).toEqual({ code: 4, name: 'VTOL (Vertical Take-Off and Landing)' });
    expect(resolveUaType('GLIDER')).toEqual({ code: 6, name: 'Glider' });
  });

  it('코드표 밖의 값은 Unknown이어야 함', () => {
    expect(resolveUaType(99)).toEqual({ code: null, name: 'Unknown' });
    expect(resolveUaType('banana')).toEqual({ code: null, name: 'Unknown' });
    expect(resolveUaType(undefined)).toEqual({ code: null, name: 'Unknown' });
  });
});

describe('값 변환', () => {
  it('단위가 붙은 문자열은 앞의 숫자만 사용해야 함', () => {
    expect(toNumber('0.25 m/s', 0)).toBe(0.25);
    expect(toNumber('  -3 dBm', 0)).toBe(-3);
    expect(toNumber('m/s', 7)).toBe(7);
    expect(toNumber(Number.NaN, null)).toBeNull();
  });

  it('정수 변환은 소수점 이하를 버려야 함', () => {
    expect(toInt('12.9', 0)).toBe(12);
    expect(toInt(undefined, null)).toBeNull();
  });
});

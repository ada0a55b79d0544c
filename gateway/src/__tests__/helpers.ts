/**
 * 테스트 공용 헬퍼
 */

import { ID_TYPE_SERIAL } from '../../../shared/schemas';
import { DroneRecord } from '../core/drone/types';
import { Logger } from '../core/logging/console';
import { ErrorLogger } from '../core/errors/errorLogger';
import { SystemStatus } from '../core/system/systemStatus';

export function createMockLogger(): jest.Mocked<Logger> {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

/** 콘솔에 아무것도 쓰지 않는 에러 로거 */
export function createQuietErrorLogger(): ErrorLogger {
  return new ErrorLogger(createMockLogger());
}

export function createTestRecord(overrides: Partial<DroneRecord> = {}): DroneRecord {
  return {
    id: 'drone-X',
    idType: ID_TYPE_SERIAL,
    caa: '',
    uaType: 2,
    uaTypeName: 'Helicopter or Multirotor',
    affiliation: 'unknown',
    mac: 'aa:bb',
    rssi: -60,
    freq: null,
    lat: 40,
    lon: -70,
    alt: 100,
    height: 30,
    speed: 5.5,
    vspeed: 1,
    direction: 270,
    prevLat: null,
    prevLon: null,
    pilotLat: 0,
    pilotLon: 0,
    homeLat: 0,
    homeLon: 0,
    description: '',
    operatorIdType: 'Operator ID',
    operatorId: 'OP1',
    opStatus: '',
    heightType: '',
    ewDir: '',
    speedMultiplier: null,
    pressureAltitude: null,
    verticalAccuracy: '',
    horizontalAccuracy: '',
    baroAccuracy: '',
    speedAccuracy: '',
    timestamp: '',
    timestampAccuracy: '',
    index: 0,
    runtime: 0,
    lastUpdateTime: 0,
    lastSentTime: 0,
    lastSentLat: 40,
    lastSentLon: -70,
    ...overrides,
  };
}

export function createTestSystemStatus(overrides: Partial<SystemStatus> = {}): SystemStatus {
  return {
    serialNumber: 'KIT-1',
    lat: 37.5,
    lon: 127,
    alt: 50,
    speed: 0,
    track: 90,
    cpuUsage: 12.5,
    memoryTotal: 2048,
    memoryAvailable: 1024,
    diskTotal: 4096,
    diskUsed: 1000.5,
    temperature: 45,
    uptime: 3600,
    plutoTemp: '41.2',
    zynqTemp: 'N/A',
    ...overrides,
  };
}

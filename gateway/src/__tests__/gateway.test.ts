/**
 * 게이트웨이 통합 테스트
 */

import { ID_TYPE_CAA, ID_TYPE_SERIAL, RawRemoteIdMessage } from '../../../shared/schemas';
import { CotTransport } from '../core/dispatch/CotTransport';
import { ErrorCode } from '../core/errors/errorLogger';
import { DroneGateway, DroneGatewayConfig } from '../gateway';
import { createMockLogger, createQuietErrorLogger } from './helpers';

const BASE_CONFIG: DroneGatewayConfig = {
  maxDrones: 30,
  rateLimitSeconds: 1,
  inactivityTimeoutSeconds: 60,
  tickIntervalMs: 1000,
  deliveryTimeoutMs: 100,
  droneIdPrefix: 'drone-',
};

function serialMessage(id: string, mac: string, lat: number, lon: number): RawRemoteIdMessage {
  return [
    { MAC: mac, RSSI: -55, 'Basic ID': { id_type: ID_TYPE_SERIAL, id, ua_type: 2 } },
    { 'Location/Vector Message': { latitude: lat, longitude: lon, geodetic_altitude: 100 } },
  ];
}

function createGateway(config: Partial<DroneGatewayConfig> = {}, transport?: CotTransport) {
  let now = 100;
  const sent: Buffer[] = [];
  const errorLogger = createQuietErrorLogger();
  const gateway = new DroneGateway(
    { ...BASE_CONFIG, ...config },
    {
      transport: transport ?? {
        sendEvent: (bytes) => {
          sent.push(bytes);
        },
      },
      affiliations: { lookup: (uid) => (uid === 'drone-X' ? 'authorized' : 'unknown') },
      clock: () => now,
      logger: createMockLogger(),
      errorLogger,
    }
  );
  return {
    gateway,
    sent,
    errorLogger,
    setNow: (value: number) => {
      now = value;
    },
  };
}

describe('DroneGateway', () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it('CAA 전용 메시지는 같은 MAC의 드론에 병합해야 함', () => {
    const { gateway } = createGateway({ droneIdPrefix: '' });

    gateway.ingest(serialMessage('X', 'm1', 40, -70));
    const result = gateway.ingest([{ MAC: 'm1', 'Basic ID': { id_type: ID_TYPE_CAA, id: 'CAA-1' } }]);

    expect(result).toEqual({ outcome: 'updated', id: 'X', correlated: true });
    const drones = gateway.drones();
    expect(drones).toHaveLength(1);
    expect(drones[0].caa).toBe('CAA-1');
    expect(drones[0].mac).toBe('m1');
    expect(gateway.getStats()).toMatchObject({ activeDrones: 1, ingested: 2, correlated: 1, dropped: 0 });
  });

  it('시리얼 ID에 접두어를 붙이고 소속을 조회해야 함', () => {
    const { gateway } = createGateway();

    gateway.ingest(serialMessage('X', 'm1', 40, -70));
    gateway.ingest(serialMessage('drone-Y', 'm2', 41, -71));

    expect(gateway.registry.get('drone-X')?.affiliation).toBe('authorized');
    expect(gateway.registry.get('drone-Y')?.affiliation).toBe('unknown');
    expect(gateway.registry.has('drone-drone-Y')).toBe(false);
  });

  it('해석할 수 없는 메시지는 폐기하고 기록해야 함', () => {
    const { gateway, errorLogger } = createGateway();

    expect(gateway.ingest('not telemetry')).toEqual({ outcome: 'dropped', reason: 'unparseable' });
    expect(gateway.ingest([{ 'Basic ID': { id_type: ID_TYPE_CAA, id: 'CAA-9' } }])).toEqual({
      outcome: 'dropped',
      reason: 'no_id_no_mac',
    });

    expect(gateway.getStats()).toMatchObject({ ingested: 2, dropped: 2, activeDrones: 0 });
    expect(errorLogger.getCount(ErrorCode.NORMALIZATION_FAILED)).toBe(1);
    expect(errorLogger.getCount(ErrorCode.CORRELATION_MISS)).toBe(1);
  });

  it('틱마다 CoT 이벤트를 보내고 비활성 드론을 제거해야 함', () => {
    const { gateway, sent, setNow } = createGateway();
    gateway.ingest(serialMessage('X', 'm1', 40, -70));

    setNow(101);
    expect(gateway.tick().due).toEqual(['drone-X']);
    expect(sent).toHaveLength(1);
    expect(sent[0].toString('utf-8')).toContain('time="1970-01-01T00:01:41.000000Z"');

    setNow(161);
    expect(gateway.tick().evicted).toEqual(['drone-X']);
    expect(gateway.getStats()).toMatchObject({ activeDrones: 0, sent: 1, evicted: 1 });
  });

  it('용량 초과로 제거된 드론도 싱크에 통보해야 함', () => {
    const markInactive = jest.fn();
    const gateway = new DroneGateway(
      { ...BASE_CONFIG, maxDrones: 1 },
      { sinks: [{ markInactive }], clock: () => 0, logger: createMockLogger(), errorLogger: createQuietErrorLogger() }
    );

    gateway.ingest(serialMessage('A', 'm1', 1, 1));
    gateway.ingest(serialMessage('B', 'm2', 2, 2));

    expect(markInactive).toHaveBeenCalledWith('drone-A');
    expect(gateway.getStats().evicted).toBe(1);
  });

  it('센서 키트 상태는 틱을 기다리지 않고 송출해야 함', () => {
    const { gateway, sent, errorLogger } = createGateway();

    const result = gateway.ingestSystemStatus({ serial_number: 'KIT-9', gps_data: { latitude: 1, longitude: 2 } });

    expect(result).toMatchObject({ outcome: 'sent', status: { serialNumber: 'KIT-9', lat: 1, lon: 2 } });
    expect(sent).toHaveLength(1);
    expect(sent[0].toString('utf-8')).toContain('uid="sensor-KIT-9"');

    expect(gateway.ingestSystemStatus('bad')).toEqual({ outcome: 'dropped' });
    expect(errorLogger.getCount(ErrorCode.NORMALIZATION_FAILED)).toBe(1);
    expect(gateway.getStats()).toMatchObject({ systemStatus: 1, activeDrones: 0 });
  });

  it('위치 없는 키트 상태는 경고 후 (0, 0)으로 송출해야 함', () => {
    const logger = createMockLogger();
    const gateway = new DroneGateway(BASE_CONFIG, { logger, errorLogger: createQuietErrorLogger(), clock: () => 0 });

    expect(gateway.ingestSystemStatus({ serial_number: 'KIT-0' }).outcome).toBe('sent');
    expect(logger.warn).toHaveBeenCalledWith('키트 KIT-0 위치 없음, (0, 0)으로 송출');
  });

  it('start 후 주기적으로 틱을 실행해야 함', async () => {
    jest.useFakeTimers();
    const { gateway } = createGateway();
    const tick = jest.spyOn(gateway.scheduler, 'tick');

    gateway.start();
    gateway.start();
    expect(gateway.isRunning).toBe(true);

    jest.advanceTimersByTime(3000);
    expect(tick).toHaveBeenCalledTimes(3);

    await gateway.stop();
    expect(gateway.isRunning).toBe(false);
    jest.advanceTimersByTime(3000);
    expect(tick).toHaveBeenCalledTimes(3);
  });

  it('stop은 싱크와 전송을 한 번만 닫아야 함', async () => {
    const transportClose = jest.fn();
    const sinkClose = jest.fn();
    const gateway = new DroneGateway(BASE_CONFIG, {
      transport: { sendEvent: jest.fn(), close: transportClose },
      sinks: [{ close: sinkClose }],
      logger: createMockLogger(),
      errorLogger: createQuietErrorLogger(),
    });

    await Promise.all([gateway.stop(), gateway.stop()]);
    await gateway.stop();

    expect(sinkClose).toHaveBeenCalledTimes(1);
    expect(transportClose).toHaveBeenCalledTimes(1);
  });
});

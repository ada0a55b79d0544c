/**
 * 드론 레지스트리 테스트
 */

import { DroneRegistry } from '../core/drone/droneRegistry';
import { createMockLogger } from './helpers';

describe('DroneRegistry', () => {
  function createRegistry(capacity: number, onEvict = jest.fn()): DroneRegistry {
    return new DroneRegistry(
      { capacity, inactivityTimeout: 60 },
      { clock: () => 0, onEvict, logger: createMockLogger() }
    );
  }

  describe('용량 제한', () => {
    it('가장 먼저 삽입된 드론을 제거해야 함 (최근 업데이트 여부와 무관)', () => {
      const onEvict = jest.fn();
      const registry = createRegistry(3, onEvict);

      registry.upsert({ id: 'a', lat: 1, lon: 1 }, 0);
      registry.upsert({ id: 'b', lat: 1, lon: 1 }, 1);
      registry.upsert({ id: 'c', lat: 1, lon: 1 }, 2);
      registry.upsert({ id: 'a', lat: 2, lon: 2 }, 3);

      const result = registry.upsert({ id: 'd', lat: 1, lon: 1 }, 4);

      expect(result).toEqual({ outcome: 'created', id: 'd', evicted: 'a' });
      expect(registry.size).toBe(3);
      expect(registry.activeIds()).toEqual(['b', 'c', 'd']);
      expect(onEvict).toHaveBeenCalledWith('a', 'capacity');
    });

    it('N+1개의 신규 ID를 넣으면 N개만 남아야 함', () => {
      for (const capacity of [1, 2, 5]) {
        const registry = createRegistry(capacity);
        for (let i = 0; i <= capacity; i++) {
          registry.upsert({ id: `d${i}` }, i);
        }
        expect(registry.size).toBe(capacity);
        expect(registry.has('d0')).toBe(false);
      }
    });

    it('기존 드론 업데이트는 제거를 일으키지 않아야 함', () => {
      const onEvict = jest.fn();
      const registry = createRegistry(2, onEvict);
      registry.upsert({ id: 'a' }, 0);
      registry.upsert({ id: 'b' }, 1);
      registry.upsert({ id: 'b', lat: 3 }, 2);

      expect(registry.activeIds()).toEqual(['a', 'b']);
      expect(onEvict).not.toHaveBeenCalled();
    });

    it('제거 후 빈 슬롯을 재사용해야 함', () => {
      const registry = createRegistry(2);
      registry.upsert({ id: 'a' }, 0);
      registry.upsert({ id: 'b' }, 1);
      registry.remove('a');

      const result = registry.upsert({ id: 'c' }, 2);
      expect(result).toEqual({ outcome: 'created', id: 'c', evicted: null });
      expect(registry.activeIds()).toEqual(['b', 'c']);
    });

    it('반복적인 제거 후에도 삽입 순서를 유지해야 함', () => {
      const registry = createRegistry(2);
      for (let i = 0; i < 10; i++) {
        registry.upsert({ id: `d${i}` }, i);
      }
      expect(registry.activeIds()).toEqual(['d8', 'd9']);
    });

    it('용량이 양의 정수가 아니면 생성 시 예외를 던져야 함', () => {
      expect(() => createRegistry(0)).toThrow();
      expect(() => createRegistry(1.5)).toThrow();
    });
  });

  describe('병합', () => {
    it('비어 있는 부가 필드는 기존 값을 지우지 않아야 함', () => {
      const registry = createRegistry(5);
      registry.upsert(
        { id: 'X', lat: 40, lon: -70, operatorId: 'OP1', uaType: 2, uaTypeName: 'Helicopter or Multirotor', freq: 2.4e9 },
        0
      );
      registry.upsert({ id: 'X', lat: 41, lon: -71, speed: 3, operatorId: '', uaType: null }, 1);

      const drone = registry.get('X');
      expect(drone?.operatorId).toBe('OP1');
      expect(drone?.uaType).toBe(2);
      expect(drone?.freq).toBe(2.4e9);
      expect(drone?.lat).toBe(41);
      expect(drone?.lon).toBe(-71);
      expect(drone?.speed).toBe(3);
      expect(drone?.lastUpdateTime).toBe(1);
    });

    it('방위가 없으면 직전 위치에서 현재 위치로의 방위를 계산해야 함', () => {
      const registry = createRegistry(5);
      registry.upsert({ id: 'X', lat: 0, lon: 0 }, 0);
      expect(registry.get('X')?.direction).toBeNull();

      registry.upsert({ id: 'X', lat: 0, lon: 1 }, 1);
      expect(registry.get('X')?.direction).toBeCloseTo(90, 6);
    });

    it('수신기가 준 방위는 그대로 사용해야 함', () => {
      const registry = createRegistry(5);
      registry.upsert({ id: 'X', lat: 0, lon: 0 }, 0);
      registry.upsert({ id: 'X', lat: 0, lon: 1, direction: 45 }, 1);
      expect(registry.get('X')?.direction).toBe(45);
    });

    it('get은 복사본을 반환해야 함', () => {
      const registry = createRegistry(5);
      registry.upsert({ id: 'X', lat: 1 }, 0);
      const copy = registry.get('X');
      registry.upsert({ id: 'X', lat: 2 }, 1);

      expect(copy?.lat).toBe(1);
      expect(registry.get('X')?.lat).toBe(2);
    });
  });

  describe('MAC 상관', () => {
    it('같은 MAC을 가진 드론 중 먼저 생성된 드론에 병합해야 함', () => {
      const registry = createRegistry(5);
      registry.upsert({ id: 'drone-A', mac: 'm1' }, 0);
      registry.upsert({ id: 'drone-B', mac: 'm1' }, 1);
      registry.upsert({ id: 'drone-B', mac: 'm1', lat: 5 }, 2);

      const result = registry.upsert({ mac: 'm1', caa: 'CAA-9' }, 3);

      expect(result).toEqual({ outcome: 'updated', id: 'drone-A', correlated: true });
      expect(registry.get('drone-A')?.caa).toBe('CAA-9');
      expect(registry.get('drone-B')?.caa).toBe('');
      expect(registry.size).toBe(2);
    });

    it('일치하는 MAC이 없으면 폐기해야 함', () => {
      const registry = createRegistry(5);
      registry.upsert({ id: 'drone-A', mac: 'm1' }, 0);

      expect(registry.correlateByMac({ mac: 'zz', caa: 'C' }, 1)).toEqual({
        outcome: 'dropped',
        reason: 'no_mac_match',
      });
      expect(registry.upsert({ caa: 'C' }, 1)).toEqual({ outcome: 'dropped', reason: 'no_id_no_mac' });
      expect(registry.size).toBe(1);
    });
  });

  describe('비활성 처리', () => {
    it('타임아웃을 넘긴 드론만 표시하고 바로 제거하지는 않아야 함', () => {
      const registry = createRegistry(5);
      registry.upsert({ id: 'old' }, 0);
      registry.upsert({ id: 'fresh' }, 30);

      const expired = registry.sweep(61);

      expect(expired).toEqual([{ id: 'old', age: 61 }]);
      expect(registry.has('old')).toBe(true);
      expect(registry.remove('old')).toBe(true);
      expect(registry.activeIds()).toEqual(['fresh']);
    });

    it('경과 시간이 타임아웃과 같으면 아직 활성이어야 함', () => {
      const registry = createRegistry(5);
      registry.upsert({ id: 'X' }, 0);
      expect(registry.sweep(60)).toEqual([]);
    });
  });

  it('markSent는 송출 시각과 위치를 기록해야 함', () => {
    const registry = createRegistry(5);
    registry.upsert({ id: 'X', lat: 3, lon: 4 }, 0);
    registry.markSent('X', 10);

    const drone = registry.get('X');
    expect(drone?.lastSentTime).toBe(10);
    expect(drone?.lastSentLat).toBe(3);
    expect(drone?.lastSentLon).toBe(4);
  });
});

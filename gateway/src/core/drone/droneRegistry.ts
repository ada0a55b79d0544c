/**
 * 드론 레지스트리
 *
 * 고정 용량 슬롯 배열 + id→슬롯 인덱스
 * - 용량 초과 시 가장 먼저 삽입된 드론부터 제거 (FIFO, 업데이트 최신성과 무관)
 * - 비활성 타임아웃은 sweep()에서 표시만 하고, 제거는 remove()로 따로 수행
 * - 활성 드론 순회 순서는 삽입 순서
 */

import { createLogger, Logger } from '../logging/console';
import { GatewayEventLogger } from '../logging/logger';
import { initialBearing } from '../geo/geodesy';
import { DroneRecord, DroneSnapshot, EvictionReason, Observation } from './types';

export interface DroneRegistryConfig {
  /** 최대 드론 수 */
  capacity: number;
  /** 비활성 타임아웃 (초) */
  inactivityTimeout: number;
}

export interface DroneRegistryOptions {
  /** 현재 시각 (epoch 초) */
  clock?: () => number;
  /** 레코드 제거 직전 호출 */
  onEvict?: (id: string, reason: EvictionReason) => void;
  logger?: Logger;
  eventLogger?: GatewayEventLogger;
}

export type UpsertResult =
  | { outcome: 'created'; id: string; evicted: string | null }
  | { outcome: 'updated'; id: string; correlated: boolean }
  | { outcome: 'dropped'; reason: 'no_id_no_mac' | 'no_mac_match' };

/** sweep 결과 */
export interface ExpiredDrone {
  id: string;
  /** 마지막 업데이트 이후 경과 시간 (초) */
  age: number;
}

interface Slot {
  record: DroneRecord;
  generation: number;
}

interface OrderEntry {
  slot: number;
  generation: number;
}

/**
 * 새 레코드 생성 (관측치에 없는 값은 기본값)
 */
function createRecord(id: string, obs: Observation, now: number): DroneRecord {
  const lat = obs.lat ?? 0;
  const lon = obs.lon ?? 0;
  return {
    id,
    idType: obs.idType ?? '',
    caa: obs.caa ?? '',
    uaType: obs.uaType ?? null,
    uaTypeName: obs.uaTypeName ?? '',
    affiliation: obs.affiliation ?? 'unknown',
    mac: obs.mac ?? '',
    rssi: obs.rssi ?? 0,
    freq: obs.freq ?? null,
    lat,
    lon,
    alt: obs.alt ?? 0,
    height: obs.height ?? 0,
    speed: obs.speed ?? 0,
    vspeed: obs.vspeed ?? 0,
    direction: obs.direction ?? null,
    prevLat: null,
    prevLon: null,
    pilotLat: obs.pilotLat ?? 0,
    pilotLon: obs.pilotLon ?? 0,
    homeLat: obs.homeLat ?? 0,
    homeLon: obs.homeLon ?? 0,
    description: obs.description ?? '',
    operatorIdType: obs.operatorIdType ?? '',
    operatorId: obs.operatorId ?? '',
    opStatus: obs.opStatus ?? '',
    heightType: obs.heightType ?? '',
    ewDir: obs.ewDir ?? '',
    speedMultiplier: obs.speedMultiplier ?? null,
    pressureAltitude: obs.pressureAltitude ?? null,
    verticalAccuracy: obs.verticalAccuracy ?? '',
    horizontalAccuracy: obs.horizontalAccuracy ?? '',
    baroAccuracy: obs.baroAccuracy ?? '',
    speedAccuracy: obs.speedAccuracy ?? '',
    timestamp: obs.timestamp ?? '',
    timestampAccuracy: obs.timestampAccuracy ?? '',
    index: obs.index ?? 0,
    runtime: obs.runtime ?? 0,
    lastUpdateTime: now,
    lastSentTime: 0,
    lastSentLat: lat,
    lastSentLon: lon,
  };
}

/**
 * 기존 레코드에 관측치 병합
 * - 운동/무선 필드: 항상 덮어씀 (없으면 기본값)
 * - 부가 메타데이터: 값이 있을 때만 덮어씀
 */
function mergeObservation(record: DroneRecord, obs: Observation, now: number): void {
  const prevLat = record.lat;
  const prevLon = record.lon;
  record.prevLat = prevLat;
  record.prevLon = prevLon;

  record.lat = obs.lat ?? 0;
  record.lon = obs.lon ?? 0;
  record.speed = obs.speed ?? 0;
  record.vspeed = obs.vspeed ?? 0;
  record.alt = obs.alt ?? 0;
  record.height = obs.height ?? 0;
  record.pilotLat = obs.pilotLat ?? 0;
  record.pilotLon = obs.pilotLon ?? 0;
  record.homeLat = obs.homeLat ?? 0;
  record.homeLon = obs.homeLon ?? 0;
  record.description = obs.description ?? '';
  record.mac = obs.mac ?? '';
  record.rssi = obs.rssi ?? 0;
  record.index = obs.index ?? 0;
  record.runtime = obs.runtime ?? 0;
  record.idType = obs.idType ?? '';

  if (obs.uaType !== undefined && obs.uaType !== null) record.uaType = obs.uaType;
  if (obs.uaTypeName) record.uaTypeName = obs.uaTypeName;
  if (obs.operatorIdType) record.operatorIdType = obs.operatorIdType;
  if (obs.operatorId) record.operatorId = obs.operatorId;
  if (obs.opStatus) record.opStatus = obs.opStatus;
  if (obs.heightType) record.heightType = obs.heightType;
  if (obs.ewDir) record.ewDir = obs.ewDir;
  if (obs.speedMultiplier !== undefined) record.speedMultiplier = obs.speedMultiplier;
  if (obs.pressureAltitude !== undefined) record.pressureAltitude = obs.pressureAltitude;
  if (obs.verticalAccuracy) record.verticalAccuracy = obs.verticalAccuracy;
  if (obs.horizontalAccuracy) record.horizontalAccuracy = obs.horizontalAccuracy;
  if (obs.baroAccuracy) record.baroAccuracy = obs.baroAccuracy;
  if (obs.speedAccuracy) record.speedAccuracy = obs.speedAccuracy;
  if (obs.timestamp) record.timestamp = obs.timestamp;
  if (obs.timestampAccuracy) record.timestampAccuracy = obs.timestampAccuracy;
  if (obs.caa) record.caa = obs.caa;
  if (obs.freq !== undefined && obs.freq !== null) record.freq = obs.freq;
  if (obs.affiliation !== undefined) record.affiliation = obs.affiliation;

  if (obs.direction !== undefined && obs.direction !== null) {
    record.direction = obs.direction;
  } else if (record.lat !== prevLat || record.lon !== prevLon) {
    // 수신기가 방위를 주지 않으면 직전 위치 → 현재 위치로 계산
    record.direction = initialBearing(prevLat, prevLon, record.lat, record.lon);
  }

  record.lastUpdateTime = now;
}

export class DroneRegistry {
  private readonly config: DroneRegistryConfig;
  private readonly clock: () => number;
  private readonly onEvict?: (id: string, reason: EvictionReason) => void;
  private readonly logger: Logger;
  private readonly eventLogger?: GatewayEventLogger;

  private slots: Array<Slot | null>;
  private freeSlots: number[] = [];
  private index: Map<string, number> = new Map();
  /** 삽입 순서 큐 (제거된 항목은 세대 불일치로 건너뜀) */
  private order: OrderEntry[] = [];
  private head: number = 0;
  private generationCounter: number = 0;

  constructor(config: DroneRegistryConfig, options: DroneRegistryOptions = {}) {
    if (!Number.isInteger(config.capacity) || config.capacity <= 0) {
      throw new Error(`capacity는 양의 정수여야 합니다: ${config.capacity}`);
    }
    this.config = { ...config };
    this.clock = options.clock ?? (() => Date.now() / 1000);
    this.onEvict = options.onEvict;
    this.logger = options.logger ?? createLogger('Registry');
    this.eventLogger = options.eventLogger;

    this.slots = new Array<Slot | null>(config.capacity).fill(null);
    for (let i = config.capacity - 1; i >= 0; i--) {
      this.freeSlots.push(i);
    }
  }

  get capacity(): number {
    return this.config.capacity;
  }

  get inactivityTimeout(): number {
    return this.config.inactivityTimeout;
  }

  get size(): number {
    return this.index.size;
  }

  has(id: string): boolean {
    return this.index.has(id);
  }

  /**
   * 레코드 복사본 조회
   */
  get(id: string): DroneSnapshot | undefined {
    const record = this.lookup(id);
    return record ? { ...record } : undefined;
  }

  /**
   * 활성 드론 ID (삽입 순서)
   */
  activeIds(): string[] {
    const ids: string[] = [];
    for (let i = this.head; i < this.order.length; i++) {
      const slot = this.liveSlot(this.order[i]);
      if (slot) ids.push(slot.record.id);
    }
    return ids;
  }

  /**
   * 활성 레코드 복사본 (삽입 순서)
   * 송출 작업은 복사본만 보므로 이후 병합과 경합하지 않음
   */
  activeRecords(): DroneSnapshot[] {
    const records: DroneSnapshot[] = [];
    for (let i = this.head; i < this.order.length; i++) {
      const slot = this.liveSlot(this.order[i]);
      if (slot) records.push({ ...slot.record });
    }
    return records;
  }

  /**
   * 관측치 반영 (생성 또는 병합)
   * id가 없으면 MAC 상관으로 넘김
   */
  upsert(obs: Observation, now: number = this.clock()): UpsertResult {
    const id = obs.id;
    if (!id) {
      return this.correlateByMac(obs, now);
    }

    const existing = this.lookup(id);
    if (existing) {
      mergeObservation(existing, obs, now);
      this.logger.debug(`드론 업데이트: ${id}`);
      this.eventLogger?.log({ timestamp: now, event: 'drone_updated', drone_id: id, correlated: false });
      return { outcome: 'updated', id, correlated: false };
    }

    // 신규 키일 때만 용량 제거
    let evicted: string | null = null;
    if (this.index.size >= this.config.capacity) {
      evicted = this.evictOldest(now);
    }

    const record = createRecord(id, obs, now);
    this.insert(record);
    this.logger.debug(`신규 드론 추가: ${id}`);
    this.eventLogger?.log({
      timestamp: now,
      event: 'drone_created',
      drone_id: id,
      mac: record.mac,
      affiliation: record.affiliation,
    });
    return { outcome: 'created', id, evicted };
  }

  /**
   * id 없는 관측치(CAA 전용 방송)를 같은 MAC의 첫 번째 드론에 병합
   * 일치하는 드론이 없으면 폐기
   */
  correlateByMac(obs: Observation, now: number = this.clock()): UpsertResult {
    const mac = obs.mac;
    if (!mac) {
      return { outcome: 'dropped', reason: 'no_id_no_mac' };
    }

    for (let i = this.head; i < this.order.length; i++) {
      const slot = this.liveSlot(this.order[i]);
      if (slot && slot.record.mac === mac) {
        mergeObservation(slot.record, obs, now);
        const id = slot.record.id;
        this.logger.debug(`MAC ${mac} 상관으로 드론 업데이트: ${id}`);
        this.eventLogger?.log({ timestamp: now, event: 'drone_updated', drone_id: id, correlated: true });
        return { outcome: 'updated', id, correlated: true };
      }
    }

    return { outcome: 'dropped', reason: 'no_mac_match' };
  }

  /**
   * 송출 기록 갱신
   */
  markSent(id: string, now: number): void {
    const record = this.lookup(id);
    if (!record) return;
    record.lastSentTime = now;
    record.lastSentLat = record.lat;
    record.lastSentLon = record.lon;
  }

  /**
   * 비활성 드론 표시
   * 제거하지 않고 목록만 반환 (송출 순회 도중 변경 방지)
   */
  sweep(now: number = this.clock()): ExpiredDrone[] {
    const expired: ExpiredDrone[] = [];
    for (let i = this.head; i < this.order.length; i++) {
      const slot = this.liveSlot(this.order[i]);
      if (!slot) continue;
      const age = now - slot.record.lastUpdateTime;
      if (age > this.config.inactivityTimeout) {
        expired.push({ id: slot.record.id, age });
      }
    }
    return expired;
  }

  /**
   * 레코드 제거
   */
  remove(id: string): boolean {
    const slotIndex = this.index.get(id);
    if (slotIndex === undefined) return false;

    this.slots[slotIndex] = null;
    this.index.delete(id);
    this.freeSlots.push(slotIndex);
    this.compactOrder();
    return true;
  }

  // ============================================
  // 내부 슬롯 관리
  // ============================================

  private lookup(id: string): DroneRecord | undefined {
    const slotIndex = this.index.get(id);
    if (slotIndex === undefined) return undefined;
    return this.slots[slotIndex]?.record;
  }

  private liveSlot(entry: OrderEntry): Slot | null {
    const slot = this.slots[entry.slot];
    return slot && slot.generation === entry.generation ? slot : null;
  }

  private insert(record: DroneRecord): void {
    const slotIndex = this.freeSlots.pop();
    if (slotIndex === undefined) {
      throw new Error('빈 슬롯이 없습니다');
    }
    const generation = ++this.generationCounter;
    this.slots[slotIndex] = { record, generation };
    this.index.set(record.id, slotIndex);
    this.order.push({ slot: slotIndex, generation });
  }

  /**
   * 가장 먼저 삽입된 드론 제거
   */
  private evictOldest(now: number): string | null {
    while (this.head < this.order.length) {
      const slot = this.liveSlot(this.order[this.head]);
      this.head++;
      if (!slot) continue;

      const id = slot.record.id;
      this.onEvict?.(id, 'capacity');
      this.remove(id);
      this.logger.debug(`용량 초과로 가장 오래된 드론 제거: ${id}`);
      this.eventLogger?.log({ timestamp: now, event: 'drone_evicted', drone_id: id, reason: 'capacity' });
      return id;
    }
    return null;
  }

  /**
   * 삽입 순서 큐에서 제거된 항목 정리
   */
  private compactOrder(): void {
    const pending = this.order.length - this.head;
    if (this.head > this.config.capacity || pending > this.config.capacity * 2) {
      this.order = this.order.slice(this.head).filter((entry) => this.liveSlot(entry) !== null);
      this.head = 0;
    }
  }
}

/**
 * WebSocket 싱크
 *
 * 드론/조종자/이륙 지점 정보를 드론별 상태 캐시에 병합하고
 * 구독 중인 C2 UI 클라이언트에 drone_state 이벤트로 전송
 * 센서 키트 상태는 캐시 없이 system_status 이벤트로 전달
 */

import { DroneStateSnapshot, SystemStatusSnapshot } from '../../../../shared/schemas';
import { DroneSnapshot, isUnknownLocation } from '../../core/drone/types';
import { ISink } from '../../core/sinks/ISink';
import { SystemStatus } from '../../core/system/systemStatus';
import { EventBroadcaster } from '../../websocket/server';

/**
 * 레코드 → UI용 JSON 상태
 */
export function toStateSnapshot(drone: DroneSnapshot): DroneStateSnapshot {
  return {
    id: drone.id,
    description: drone.description,
    lat: drone.lat,
    lon: drone.lon,
    alt: drone.alt,
    height: drone.height,
    speed: drone.speed,
    vspeed: drone.vspeed,
    direction: drone.direction,
    rssi: drone.rssi,
    mac: drone.mac,
    id_type: drone.idType,
    caa: drone.caa,
    ua_type: drone.uaType,
    ua_type_name: drone.uaTypeName,
    operator_id_type: drone.operatorIdType,
    operator_id: drone.operatorId,
    op_status: drone.opStatus,
    height_type: drone.heightType,
    ew_dir: drone.ewDir,
    timestamp: drone.timestamp,
    index: drone.index,
    runtime: drone.runtime,
    freq: drone.freq,
    freq_mhz: drone.freq === null ? null : drone.freq / 1e6,
    affiliation: drone.affiliation,
  };
}

export function toSystemStatusSnapshot(status: SystemStatus): SystemStatusSnapshot {
  return {
    serial_number: status.serialNumber,
    lat: status.lat,
    lon: status.lon,
    alt: status.alt,
    speed: status.speed,
    track: status.track,
    cpu_usage: status.cpuUsage,
    memory_total_mb: status.memoryTotal,
    memory_available_mb: status.memoryAvailable,
    disk_total_mb: status.diskTotal,
    disk_used_mb: status.diskUsed,
    temperature: status.temperature,
    uptime: status.uptime,
    pluto_temp: status.plutoTemp,
    zynq_temp: status.zynqTemp,
  };
}

function stripPrefix(id: string, prefix: string): string {
  return id.startsWith(prefix) ? id.slice(prefix.length) : id;
}

export class WebSocketSink implements ISink {
  readonly name = 'websocket';
  private readonly broadcaster: EventBroadcaster;
  private readonly now: () => number;
  private cache: Map<string, DroneStateSnapshot> = new Map();

  constructor(broadcaster: EventBroadcaster, now: () => number = Date.now) {
    this.broadcaster = broadcaster;
    this.now = now;
  }

  get size(): number {
    return this.cache.size;
  }

  /**
   * 현재 캐시된 드론 상태 (구독 직후 전송용)
   */
  snapshot(): DroneStateSnapshot[] {
    return [...this.cache.values()].map((state) => ({ ...state }));
  }

  publishDrone(drone: DroneSnapshot): void {
    const previous = this.cache.get(drone.id);
    // 조종자/이륙 지점 필드는 이전 값 유지, 좌표가 (0, 0)으로 돌아가면 제거
    const state: DroneStateSnapshot = { ...previous, ...toStateSnapshot(drone) };
    if (isUnknownLocation(drone.pilotLat, drone.pilotLon)) {
      delete state.pilot_lat;
      delete state.pilot_lon;
      delete state.pilot_alt;
    }
    if (isUnknownLocation(drone.homeLat, drone.homeLon)) {
      delete state.home_lat;
      delete state.home_lon;
      delete state.home_alt;
    }
    this.publish(state);
  }

  publishPilot(id: string, lat: number, lon: number, alt: number): void {
    this.patch(stripPrefix(id, 'pilot-'), { pilot_lat: lat, pilot_lon: lon, pilot_alt: alt });
  }

  publishHome(id: string, lat: number, lon: number, alt: number): void {
    this.patch(stripPrefix(id, 'home-'), { home_lat: lat, home_lon: lon, home_alt: alt });
  }

  publishSystem(status: SystemStatus): void {
    this.broadcaster.broadcast({
      type: 'system_status',
      timestamp: this.now(),
      status: toSystemStatusSnapshot(status),
    });
  }

  markInactive(id: string): void {
    this.cache.delete(id);
    this.broadcaster.broadcast({ type: 'drone_inactive', timestamp: this.now(), drone_id: id });
  }

  close(): void {
    this.cache.clear();
  }

  private patch(id: string, fields: Partial<DroneStateSnapshot>): void {
    const current = this.cache.get(id);
    // 드론 본체 상태를 받기 전의 조종자/이륙 지점 정보는 버림
    if (!current) return;
    this.publish({ ...current, ...fields, id });
  }

  private publish(state: DroneStateSnapshot): void {
    this.cache.set(state.id, state);
    this.broadcaster.broadcast({ type: 'drone_state', timestamp: this.now(), drone: { ...state } });
  }
}

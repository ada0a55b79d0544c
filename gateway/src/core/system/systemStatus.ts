/**
 * 센서 키트 상태 정규화
 *
 * 수신기가 주기적으로 보내는 키트 상태(SystemStatusMessage) → SystemStatus
 * 없는 수치는 0, 메모리/디스크는 바이트 → MB
 */

import { getRecord, isRecord, toNumber, toText } from '../telemetry/coerce';

export interface SystemStatus {
  serialNumber: string;

  // 키트 GPS
  lat: number;
  lon: number;
  alt: number;
  speed: number;
  track: number;

  cpuUsage: number;
  memoryTotal: number;
  memoryAvailable: number;
  diskTotal: number;
  diskUsed: number;
  temperature: number;
  /** 가동 시간 (초) */
  uptime: number;

  /** SDR 온도 (측정값이 없으면 'N/A') */
  plutoTemp: string;
  zynqTemp: string;
}

const BYTES_PER_MB = 1024 * 1024;

const EMPTY: Record<string, unknown> = {};

function sdrTemp(value: unknown): string {
  const text = toText(value);
  return text === '' ? 'N/A' : text;
}

/**
 * 원시 상태 메시지 정규화
 *
 * @returns 맵이 아니면 null
 */
export function normalizeSystemStatus(message: unknown): SystemStatus | null {
  if (!isRecord(message)) return null;

  const gps = getRecord(message, 'gps_data') ?? EMPTY;
  const stats = getRecord(message, 'system_stats') ?? EMPTY;
  const memory = getRecord(stats, 'memory') ?? EMPTY;
  const disk = getRecord(stats, 'disk') ?? EMPTY;
  const temps = getRecord(message, 'ant_sdr_temps') ?? EMPTY;

  const serial = toText(message.serial_number);

  return {
    serialNumber: serial === '' ? 'unknown' : serial,
    lat: toNumber(gps.latitude, 0),
    lon: toNumber(gps.longitude, 0),
    alt: toNumber(gps.altitude, 0),
    speed: toNumber(gps.speed, 0),
    track: toNumber(gps.track, 0),
    cpuUsage: toNumber(stats.cpu_usage, 0),
    memoryTotal: toNumber(memory.total, 0) / BYTES_PER_MB,
    memoryAvailable: toNumber(memory.available, 0) / BYTES_PER_MB,
    diskTotal: toNumber(disk.total, 0) / BYTES_PER_MB,
    diskUsed: toNumber(disk.used, 0) / BYTES_PER_MB,
    temperature: toNumber(stats.temperature, 0),
    uptime: toNumber(stats.uptime, 0),
    plutoTemp: sdrTemp(temps.pluto_temp),
    zynqTemp: sdrTemp(temps.zynq_temp),
  };
}

/**
 * 키트 CoT UID
 */
export function systemUid(status: SystemStatus): string {
  return `sensor-${status.serialNumber}`;
}

/**
 * 공통 이벤트 JSON Schema 정의
 *
 * 수신기(Remote ID 프런트엔드) → 게이트웨이 → C2 UI 간 통신 프로토콜
 */

// ============================================
// 기본 타입
// ============================================

/** 드론 소속 분류 */
export type Affiliation =
  | 'authorized'    // 허가
  | 'unauthorized'  // 비허가
  | 'unknown';      // 미상

/** Basic ID의 id_type 값 */
export const ID_TYPE_SERIAL = 'Serial Number (ANSI/CTA-2063-A)';
export const ID_TYPE_CAA = 'CAA Assigned Registration ID';

// ============================================
// 수신기 → 게이트웨이 (원시 Remote ID)
// ============================================

/** 수치 필드는 숫자 또는 단위가 붙은 문자열로 들어온다 (예: "0.25 m/s") */
export type LooseNumber = number | string | null;

export interface BasicIdPart {
  id_type?: string;
  id?: string;
  ua_type?: number | string | null;
  MAC?: string;
  RSSI?: LooseNumber;
}

export interface LocationVectorPart {
  latitude?: LooseNumber;
  longitude?: LooseNumber;
  speed?: LooseNumber;
  vert_speed?: LooseNumber;
  geodetic_altitude?: LooseNumber;
  height_agl?: LooseNumber;
  direction?: LooseNumber;
  op_status?: string;
  height_type?: string;
  ew_dir_segment?: string;
  speed_multiplier?: LooseNumber;
  pressure_altitude?: LooseNumber;
  vertical_accuracy?: LooseNumber;
  horizontal_accuracy?: LooseNumber;
  baro_accuracy?: LooseNumber;
  speed_accuracy?: LooseNumber;
  timestamp?: LooseNumber;
  timestamp_accuracy?: LooseNumber;
}

export interface SelfIdPart {
  text?: string;
}

export interface OperatorIdPart {
  operator_id_type?: string;
  operator_id?: string;
}

/** 리스트 형식: latitude/longitude는 조종자 위치, home_lat/home_lon은 이륙 지점 */
export interface ListSystemPart {
  latitude?: LooseNumber;
  longitude?: LooseNumber;
  home_lat?: LooseNumber;
  home_lon?: LooseNumber;
}

/** 딕셔너리 형식: operator_lat/operator_lon만 제공 */
export interface FrameSystemPart {
  operator_lat?: LooseNumber;
  operator_lon?: LooseNumber;
}

export interface FrequencyPart {
  frequency?: LooseNumber;
}

/**
 * 리스트 형식 파트 (DJI/AntSDR 계열)
 * 파트마다 메시지 타입 이름 하나를 키로 가지며, MAC/RSSI가 최상위에 섞여 올 수 있음
 */
export interface RemoteIdListPart {
  'Basic ID'?: BasicIdPart;
  'Location/Vector Message'?: LocationVectorPart;
  'Self-ID Message'?: SelfIdPart;
  'Operator ID Message'?: OperatorIdPart;
  'System Message'?: ListSystemPart;
  'Frequency Message'?: FrequencyPart;
  MAC?: string;
  RSSI?: LooseNumber;
}

/**
 * 딕셔너리 형식 (ESP32 계열)
 * 하나의 맵에 모든 파트가 들어오며, 링크 계층 정보는 AUX_ADV_IND / aext에 있음
 */
export interface RemoteIdFrame {
  index?: LooseNumber;
  runtime?: LooseNumber;
  AUX_ADV_IND?: { rssi?: LooseNumber };
  aext?: { AdvA?: string };
  'Basic ID'?: BasicIdPart;
  'Location/Vector Message'?: LocationVectorPart;
  'Self-ID Message'?: SelfIdPart;
  'Operator ID Message'?: OperatorIdPart;
  'System Message'?: FrameSystemPart;
  'Frequency Message'?: FrequencyPart;
}

export type RawRemoteIdMessage = RemoteIdListPart[] | RemoteIdFrame;

// ============================================
// 수신기 → 게이트웨이 (센서 키트 상태)
// ============================================

/**
 * 센서 키트 상태 메시지
 * 메모리/디스크는 바이트 단위, SDR 온도는 측정 불가 시 문자열로 올 수 있음
 */
export interface SystemStatusMessage {
  serial_number?: string;
  gps_data?: {
    latitude?: LooseNumber;
    longitude?: LooseNumber;
    altitude?: LooseNumber;
    speed?: LooseNumber;
    track?: LooseNumber;
  };
  system_stats?: {
    cpu_usage?: LooseNumber;
    memory?: { total?: LooseNumber; available?: LooseNumber };
    disk?: { total?: LooseNumber; used?: LooseNumber };
    temperature?: LooseNumber;
    uptime?: LooseNumber;
  };
  ant_sdr_temps?: {
    pluto_temp?: LooseNumber;
    zynq_temp?: LooseNumber;
  };
}

// ============================================
// 게이트웨이 → C2 UI 이벤트
// ============================================

/** 드론 상태 스냅샷 (UI/싱크 공용 JSON 형태) */
export interface DroneStateSnapshot {
  id: string;
  description: string;
  lat: number;
  lon: number;
  alt: number;
  height: number;
  speed: number;
  vspeed: number;
  direction: number | null;
  rssi: number;
  mac: string;
  id_type: string;
  caa: string;
  ua_type: number | null;
  ua_type_name: string;
  operator_id_type: string;
  operator_id: string;
  op_status: string;
  height_type: string;
  ew_dir: string;
  timestamp: string;
  index: number;
  runtime: number;
  freq: number | null;
  freq_mhz: number | null;
  affiliation: Affiliation;
  pilot_lat?: number;
  pilot_lon?: number;
  pilot_alt?: number;
  home_lat?: number;
  home_lon?: number;
  home_alt?: number;
}

/** 드론 상태 업데이트 이벤트 */
export interface DroneStateEvent {
  type: 'drone_state';
  timestamp: number;
  drone: DroneStateSnapshot;
}

/** 드론 비활성 이벤트 (타임아웃 또는 용량 초과 제거) */
export interface DroneInactiveEvent {
  type: 'drone_inactive';
  timestamp: number;
  drone_id: string;
}

/** 구독 직후 전송되는 현재 상태 */
export interface InitialStateEvent {
  type: 'initial_state';
  timestamp: number;
  drones: DroneStateSnapshot[];
}

/** 게이트웨이 상태 이벤트 */
export interface GatewayStatusEvent {
  type: 'gateway_status';
  timestamp: number;
  active_drones: number;
  ingested: number;
  dropped: number;
  correlated: number;
  sent: number;
  failed: number;
  evicted: number;
  /** 처리한 센서 키트 상태 메시지 수 */
  system_updates: number;
}

/** 센서 키트 상태 (메모리/디스크는 MB) */
export interface SystemStatusSnapshot {
  serial_number: string;
  lat: number;
  lon: number;
  alt: number;
  speed: number;
  track: number;
  cpu_usage: number;
  memory_total_mb: number;
  memory_available_mb: number;
  disk_total_mb: number;
  disk_used_mb: number;
  temperature: number;
  uptime: number;
  pluto_temp: string;
  zynq_temp: string;
}

export interface SystemStatusEvent {
  type: 'system_status';
  timestamp: number;
  status: SystemStatusSnapshot;
}

export type GatewayToClientEvent =
  | DroneStateEvent
  | DroneInactiveEvent
  | InitialStateEvent
  | GatewayStatusEvent
  | SystemStatusEvent;

// ============================================
// 클라이언트 → 게이트웨이 명령
// ============================================

/**
 * 수신기가 원시 Remote ID 메시지를 밀어넣음
 * payload는 RawRemoteIdMessage 형태를 기대하지만 검증은 정규화 단계에서 수행
 */
export interface TelemetryCommand {
  type: 'telemetry';
  payload?: unknown;
}

/** 수신기가 센서 키트 상태(SystemStatusMessage)를 밀어넣음 */
export interface SystemStatusCommand {
  type: 'system_status';
  payload?: unknown;
}

/** UI가 드론 상태 스트림을 구독 */
export interface SubscribeCommand {
  type: 'subscribe';
}

export interface UnsubscribeCommand {
  type: 'unsubscribe';
}

/** 게이트웨이 상태 요청 */
export interface GetStatusCommand {
  type: 'get_status';
}

export type ClientToGatewayCommand =
  | TelemetryCommand
  | SystemStatusCommand
  | SubscribeCommand
  | UnsubscribeCommand
  | GetStatusCommand;

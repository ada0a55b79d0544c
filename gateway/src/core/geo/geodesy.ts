/**
 * 측지 계산 유틸리티
 */

const DEG_TO_RAD = Math.PI / 180;
const RAD_TO_DEG = 180 / Math.PI;

/**
 * 방위각을 [0, 360) 범위로 정규화
 */
export function normalizeBearing(degrees: number): number {
  const wrapped = ((degrees % 360) + 360) % 360;
  // -0 → 0, 360 → 0
  return wrapped === 360 || Object.is(wrapped, -0) ? 0 : wrapped;
}

/**
 * 두 지점 간 초기 대권 방위각 (도, [0, 360))
 */
export function initialBearing(lat1: number, lon1: number, lat2: number, lon2: number): number {
  const phi1 = lat1 * DEG_TO_RAD;
  const phi2 = lat2 * DEG_TO_RAD;
  const deltaLambda = (lon2 - lon1) * DEG_TO_RAD;

  const x = Math.sin(deltaLambda) * Math.cos(phi2);
  const y = Math.cos(phi1) * Math.sin(phi2) - Math.sin(phi1) * Math.cos(phi2) * Math.cos(deltaLambda);

  return normalizeBearing(Math.atan2(x, y) * RAD_TO_DEG);
}

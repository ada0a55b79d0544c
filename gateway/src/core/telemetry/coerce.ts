/**
 * 관대한 값 변환 유틸리티
 *
 * 수신기마다 숫자를 숫자/문자열/단위 붙은 문자열로 보내므로
 * 변환 실패 시 호출자가 준 기본값을 돌려준다.
 */

/**
 * 숫자 변환
 * 문자열은 첫 번째 토큰만 사용 ("0.25 m/s" → 0.25)
 */
export function toNumber<T extends number | null>(value: unknown, fallback: T): number | T {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : fallback;
  }
  if (typeof value === 'string') {
    const token = value.trim().split(/\s+/)[0];
    if (token === '') return fallback;
    const parsed = Number(token);
    return Number.isFinite(parsed) ? parsed : fallback;
  }
  return fallback;
}

/**
 * 정수 변환 (소수점 이하 버림)
 */
export function toInt<T extends number | null>(value: unknown, fallback: T): number | T {
  const parsed = toNumber(value, null);
  return parsed === null ? fallback : Math.trunc(parsed);
}

/**
 * 문자열 변환 (없으면 빈 문자열)
 */
export function toText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

/**
 * 일반 객체(맵) 여부
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 하위 맵 추출 (맵이 아니면 null)
 */
export function getRecord(source: Record<string, unknown>, key: string): Record<string, unknown> | null {
  const value = source[key];
  return isRecord(value) ? value : null;
}

/**
 * 보안 모듈 테스트
 */

import {
  RateLimiter,
  RequestInfo,
  SecurityConfig,
  validateAuth,
  validateCORS,
  validateMessage,
} from '../websocket/security';

const BASE_SECURITY: SecurityConfig = {
  authEnabled: true,
  authToken: 'test-secret',
  corsEnabled: true,
  corsOrigin: 'http://localhost:5173, http://c2.local',
  rateLimitEnabled: true,
  rateLimitMaxRequests: 3,
  rateLimitWindowMs: 1000,
};

function request(url: string, headers: RequestInfo['headers'] = {}): RequestInfo {
  return { url, headers };
}

describe('RateLimiter', () => {
  let now = 0;
  let limiter: RateLimiter;

  beforeEach(() => {
    now = 0;
    limiter = new RateLimiter(3, 1000, () => now);
  });

  afterEach(() => {
    limiter.dispose();
  });

  it('윈도우 안에서 최대 요청 수까지만 허용해야 함', () => {
    expect(limiter.check('a')).toBe(true);
    expect(limiter.check('a')).toBe(true);
    expect(limiter.check('a')).toBe(true);
    expect(limiter.check('a')).toBe(false);
    expect(limiter.check('b')).toBe(true);
  });

  it('윈도우가 지나면 다시 허용해야 함', () => {
    limiter.check('a');
    limiter.check('a');
    limiter.check('a');

    now = 1000;
    expect(limiter.check('a')).toBe(true);
  });

  it('reset은 해당 클라이언트 기록만 지워야 함', () => {
    for (let i = 0; i < 3; i++) {
      limiter.check('a');
      limiter.check('b');
    }
    limiter.reset('a');

    expect(limiter.check('a')).toBe(true);
    expect(limiter.check('b')).toBe(false);
  });
});

describe('validateAuth', () => {
  it('쿼리 토큰 또는 Bearer 헤더를 받아야 함', () => {
    expect(validateAuth(request('/?token=test-secret'), BASE_SECURITY)).toEqual({ valid: true });
    expect(
      validateAuth(request('/', { authorization: 'Bearer test-secret' }), BASE_SECURITY)
    ).toEqual({ valid: true });
  });

  it('토큰이 없거나 틀리면 거부해야 함', () => {
    expect(validateAuth(request('/'), BASE_SECURITY)).toEqual({
      valid: false,
      reason: '인증 토큰이 필요합니다',
    });
    expect(validateAuth(request('/?token=wrong'), BASE_SECURITY)).toEqual({
      valid: false,
      reason: '잘못된 인증 토큰입니다',
    });
  });

  it('인증이 꺼져 있으면 항상 허용해야 함', () => {
    expect(validateAuth(request('/'), { ...BASE_SECURITY, authEnabled: false })).toEqual({ valid: true });
  });
});

describe('validateCORS', () => {
  it('허용 목록의 Origin과 Origin 없는 연결은 허용해야 함', () => {
    expect(validateCORS(request('/', { origin: 'http://c2.local' }), BASE_SECURITY).valid).toBe(true);
    expect(validateCORS(request('/'), BASE_SECURITY).valid).toBe(true);
  });

  it('목록 밖의 Origin은 거부해야 함', () => {
    expect(validateCORS(request('/', { origin: 'http://evil.local' }), BASE_SECURITY)).toEqual({
      valid: false,
      reason: 'CORS: 허용되지 않은 Origin입니다',
    });
    expect(
      validateCORS(request('/', { origin: 'http://evil.local' }), { ...BASE_SECURITY, corsOrigin: '*' }).valid
    ).toBe(true);
  });
});

describe('validateMessage', () => {
  it('type 문자열이 있는 객체만 허용해야 함', () => {
    expect(validateMessage({ type: 'subscribe' })).toEqual({ valid: true });
    expect(validateMessage([1, 2])).toEqual({ valid: false, reason: '메시지는 JSON 객체여야 합니다' });
    expect(validateMessage({ kind: 'x' })).toEqual({ valid: false, reason: 'type 필드가 필요합니다' });
    expect(validateMessage({ type: 'x'.repeat(101) }).valid).toBe(false);
  });
});

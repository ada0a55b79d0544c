/**
 * CoT 전송 인터페이스 (TAK 서버 / 멀티캐스트 그룹 등)
 */

import { MaybePromise } from '../delivery/delivery';

export interface CotTransport {
  readonly name?: string;

  /**
   * 인코딩된 CoT 이벤트 하나 전송
   * 반환값은 사용하지 않음 (실패는 예외 또는 reject로 전달)
   */
  sendEvent(bytes: Buffer): MaybePromise<void>;

  close?(): MaybePromise<void>;
}

/**
 * 송출 작업 실행기
 *
 * 싱크/전송 호출 하나를 시간 제한이 있는 작업으로 실행하고
 * 결과를 DeliveryOutcome으로 돌려줌 (예외를 던지지 않음)
 */

import { createLogger, Logger } from '../logging/console';
import { describeError } from '../errors/errorLogger';

export type MaybePromise<T> = T | Promise<T>;

export type DeliveryOutcome =
  | { ok: true }
  | { ok: false; error: string; timedOut: boolean };

export type DeliveryTask = () => MaybePromise<void>;

const OK: DeliveryOutcome = { ok: true };

function failure(error: unknown, timedOut: boolean = false): DeliveryOutcome {
  return { ok: false, error: describeError(error), timedOut };
}

/**
 * 작업 실행
 * - 동기 작업: 호출 즉시 결과 반환
 * - 비동기 작업: timeoutMs 안에 끝나지 않으면 timedOut 실패로 결정
 */
export function runDelivery(task: DeliveryTask, timeoutMs: number): MaybePromise<DeliveryOutcome> {
  let result: MaybePromise<void>;
  try {
    result = task();
  } catch (error) {
    return failure(error);
  }

  if (!(result instanceof Promise)) {
    return OK;
  }

  const pending = result;
  return new Promise<DeliveryOutcome>((resolve) => {
    const timer = setTimeout(() => {
      resolve(failure(new Error(`${timeoutMs}ms 내에 완료되지 않음`), true));
    }, timeoutMs);
    timer.unref();

    pending.then(
      () => {
        clearTimeout(timer);
        resolve(OK);
      },
      (error: unknown) => {
        clearTimeout(timer);
        resolve(failure(error));
      }
    );
  });
}

/**
 * 진행 중인 비동기 송출 추적
 * 종료 시 flush()로 남은 작업을 기다림 (각 작업은 시간 제한이 있음)
 */
export class DeliveryTracker {
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private inFlight: Set<Promise<void>> = new Set();

  constructor(timeoutMs: number, logger: Logger = createLogger('Delivery')) {
    if (!(timeoutMs > 0)) {
      throw new Error(`timeoutMs는 양수여야 합니다: ${timeoutMs}`);
    }
    this.timeoutMs = timeoutMs;
    this.logger = logger;
  }

  get pending(): number {
    return this.inFlight.size;
  }

  /**
   * 작업 실행 후 결과 콜백 호출
   *
   * @returns 동기 작업이면 결과, 비동기면 null (결과는 onSettled로 전달)
   */
  run(task: DeliveryTask, onSettled: (outcome: DeliveryOutcome) => void): DeliveryOutcome | null {
    const outcome = runDelivery(task, this.timeoutMs);
    if (!(outcome instanceof Promise)) {
      onSettled(outcome);
      return outcome;
    }

    const settled: Promise<void> = outcome
      .then(onSettled)
      .catch((error: unknown) => {
        this.logger.error('송출 결과 처리 중 오류:', describeError(error));
      })
      .finally(() => {
        this.inFlight.delete(settled);
      });
    this.inFlight.add(settled);
    return null;
  }

  /**
   * 진행 중인 송출이 모두 끝날 때까지 대기
   */
  async flush(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }
}

/**
 * 드론 소속 분류 저장소
 *
 * affiliations.json을 읽어 UID → 소속(authorized/unauthorized/unknown) 조회
 * 파일 수정 시각이 바뀔 때만 다시 읽고, 파싱된 맵은 통째로 교체
 *
 * 파일 형식:
 *   { "authorized": ["drone-SN1"], "unauthorized": ["drone-SN2"], "unknown": [] }
 */

import * as fs from 'fs';
import { z } from 'zod';
import { Affiliation } from '../../../../shared/schemas';
import { createLogger, Logger } from '../../core/logging/console';
import { describeError } from '../../core/errors/errorLogger';

const uidList = z.array(z.string().min(1)).default([]);

export const affiliationFileSchema = z.object({
  authorized: uidList,
  unauthorized: uidList,
  unknown: uidList,
});

export type AffiliationFile = z.infer<typeof affiliationFileSchema>;

/** 소속 조회 인터페이스 */
export interface AffiliationLookup {
  lookup(uid: string): Affiliation;
}

type AffiliationSnapshot = ReadonlyMap<string, Affiliation>;

const EMPTY: AffiliationSnapshot = new Map();

/**
 * 파일 내용 → 조회 맵
 * 같은 UID가 여러 목록에 있으면 뒤의 목록(unknown > unauthorized > authorized)이 우선
 */
export function buildSnapshot(file: AffiliationFile): AffiliationSnapshot {
  const map = new Map<string, Affiliation>();
  for (const uid of file.authorized) map.set(uid, 'authorized');
  for (const uid of file.unauthorized) map.set(uid, 'unauthorized');
  for (const uid of file.unknown) map.set(uid, 'unknown');
  return map;
}

export class AffiliationStore implements AffiliationLookup {
  private readonly filePath: string;
  private readonly logger: Logger;
  private snapshot: AffiliationSnapshot = EMPTY;
  private lastMtimeMs: number | null = null;

  constructor(filePath: string, logger: Logger = createLogger('Affiliation')) {
    this.filePath = filePath;
    this.logger = logger;
  }

  get size(): number {
    return this.snapshot.size;
  }

  /**
   * UID 소속 조회 (목록에 없으면 unknown)
   */
  lookup(uid: string): Affiliation {
    this.refresh();
    return this.snapshot.get(uid) ?? 'unknown';
  }

  /**
   * 파일 수정 시각이 바뀌었으면 다시 읽기
   * 파일이 없거나 형식이 잘못되면 이전 스냅샷 유지
   *
   * @returns 새 스냅샷으로 교체되었는지 여부
   */
  refresh(): boolean {
    let mtimeMs: number;
    try {
      mtimeMs = fs.statSync(this.filePath).mtimeMs;
    } catch (error) {
      if (this.lastMtimeMs !== -1) {
        this.logger.warn(`소속 파일을 찾을 수 없음: ${this.filePath} (${describeError(error)})`);
        this.lastMtimeMs = -1;
      }
      return false;
    }

    if (mtimeMs === this.lastMtimeMs) return false;
    this.lastMtimeMs = mtimeMs;

    try {
      const content = fs.readFileSync(this.filePath, 'utf-8');
      const parsed = affiliationFileSchema.safeParse(JSON.parse(content));
      if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
        this.logger.warn(`소속 파일 형식 오류, 이전 목록 유지: ${issues.join('; ')}`);
        return false;
      }
      this.snapshot = buildSnapshot(parsed.data);
      this.logger.info(`소속 목록 로드: ${this.snapshot.size}개 UID (${this.filePath})`);
      return true;
    } catch (error) {
      this.logger.warn(`소속 파일 읽기 실패, 이전 목록 유지: ${describeError(error)}`);
      return false;
    }
  }
}

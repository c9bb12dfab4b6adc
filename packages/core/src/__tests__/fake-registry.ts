/**
 * 테스트용 in-memory Schema Registry (RetrievalPort 구현)
 *
 * - soft-delete된 버전은 getSchema에서 실패, deleted=true 조회에서만 성공
 * - 매 호출마다 이벤트 루프를 한 번 양보해 워커 간 인터리빙을 재현
 */
import type { RetrievalPort, SchemaRecord } from '@schemastat/shared';

export interface FakeVersion {
  version: number;
  id: number;
  schema: string;
  schemaType?: string;
  references?: number;
  deleted?: boolean;
  /** 일반 조회 실패 */
  failNormal?: boolean;
  /** deleted=true 조회 실패 */
  failDeleted?: boolean;
}

interface FakeSubject {
  versions: FakeVersion[];
  deleted: boolean;
}

export class FakeRegistry implements RetrievalPort {
  private readonly subjects = new Map<string, FakeSubject>();
  readonly failListVersions = new Set<string>();
  failListSubjects: { includeDeleted: boolean; message: string } | null = null;

  readonly calls: string[] = [];
  inFlight = 0;
  maxInFlight = 0;

  addSubject(name: string, versions: FakeVersion[], options: { deleted?: boolean } = {}): this {
    this.subjects.set(name, { versions, deleted: options.deleted ?? false });
    return this;
  }

  countCalls(method: string): number {
    return this.calls.filter((c) => c.startsWith(`${method}(`)).length;
  }

  private async track<T>(call: string, work: () => T): Promise<T> {
    this.calls.push(call);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      await new Promise<void>((resolve) => setImmediate(resolve));
      return work();
    } finally {
      this.inFlight--;
    }
  }

  private toRecord(subject: string, v: FakeVersion): SchemaRecord {
    return {
      subject,
      version: v.version,
      id: v.id,
      schemaType: v.schemaType ?? '',
      schema: v.schema,
      references: Array.from({ length: v.references ?? 0 }, (_, i) => ({
        name: `ref-${i}`,
        subject: `dep-${i}`,
        version: 1,
      })),
      ...(v.deleted ? { deleted: true } : {}),
    };
  }

  private findVersion(subject: string, version: string): FakeVersion | undefined {
    return this.subjects.get(subject)?.versions.find((v) => String(v.version) === version);
  }

  listSubjects(includeDeleted: boolean): Promise<string[]> {
    return this.track(`listSubjects(${includeDeleted})`, () => {
      if (this.failListSubjects && this.failListSubjects.includeDeleted === includeDeleted) {
        throw new Error(this.failListSubjects.message);
      }
      return [...this.subjects.entries()]
        .filter(([, s]) => includeDeleted || !s.deleted)
        .map(([name]) => name);
    });
  }

  listVersions(subject: string, includeDeleted: boolean): Promise<number[]> {
    return this.track(`listVersions(${subject})`, () => {
      const entry = this.subjects.get(subject);
      if (!entry || this.failListVersions.has(subject)) {
        throw new Error(`Subject '${subject}' not found`);
      }
      return entry.versions.filter((v) => includeDeleted || !v.deleted).map((v) => v.version);
    });
  }

  getSchema(subject: string, version: string): Promise<SchemaRecord> {
    return this.track(`getSchema(${subject},${version})`, () => {
      const v = this.findVersion(subject, version);
      if (!v || v.deleted || v.failNormal) {
        throw new Error(`schema not found: ${subject} v${version}`);
      }
      return this.toRecord(subject, v);
    });
  }

  getSchemaIncludingDeleted(subject: string, version: string, includeDeleted: boolean): Promise<SchemaRecord> {
    return this.track(`getSchemaIncludingDeleted(${subject},${version})`, () => {
      const v = this.findVersion(subject, version);
      if (!v || v.failDeleted || (v.deleted && !includeDeleted)) {
        throw new Error(`schema not found (deleted=${includeDeleted}): ${subject} v${version}`);
      }
      return this.toRecord(subject, v);
    });
  }
}

/** 지정 바이트 길이의 AVRO 스키마 본문 */
export function body(size: number): string {
  return 'a'.repeat(size);
}

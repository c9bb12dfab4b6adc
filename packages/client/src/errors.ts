/**
 * Schema Registry 요청 실패
 * status는 HTTP 응답을 받은 경우에만 존재
 */
export class RegistryRequestError extends Error {
  readonly status?: number;
  readonly path: string;

  constructor(message: string, path: string, options?: { status?: number; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'RegistryRequestError';
    this.path = path;
    this.status = options?.status;
  }

  get isNotFound(): boolean {
    return this.status === 404;
  }
}

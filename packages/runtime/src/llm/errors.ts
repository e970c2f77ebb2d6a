export interface ModelGatewayErrorOptions {
  status?: number;
  retryable?: boolean;
  attempts?: number;
  cause?: unknown;
}

/**
 * 模型网关的传输层错误。重试耗尽或遇到不可重试的失败时抛出。
 */
export class ModelGatewayError extends Error {
  public readonly status: number | undefined;

  public readonly retryable: boolean;

  public readonly attempts: number;

  constructor(message: string, options: ModelGatewayErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "ModelGatewayError";
    this.status = options.status;
    this.retryable = options.retryable ?? false;
    this.attempts = options.attempts ?? 1;
  }
}

export class RunCancelledError extends Error {
  constructor(message = "Run was cancelled") {
    super(message);
    this.name = "RunCancelledError";
  }
}

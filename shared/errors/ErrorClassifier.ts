/**
 * 統一錯誤分類器
 * 定義標準錯誤類型與 API 錯誤類別
 */

export enum ErrorType {
  UPSTREAM = 'upstream',
  VALIDATION = 'validation',
  NOT_FOUND = 'not_found',
  UNAVAILABLE = 'unavailable',
  CONFIGURATION = 'configuration',
  UNKNOWN = 'unknown'
}

export class APIError extends Error {
  constructor(
    public statusCode: number,
    public errorType: ErrorType,
    public errorCode: string,
    message: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'APIError';
    Object.setPrototypeOf(this, APIError.prototype);
  }

  toJSON() {
    return {
      success: false,
      error: {
        type: this.errorType,
        code: this.errorCode,
        message: this.message,
        details: this.details
      }
    };
  }
}

/**
 * 啟動時的致命設定錯誤（例如缺少 provider 金鑰），不屬於單次請求的失敗
 */
export class ConfigurationError extends Error {
  public readonly errorType = ErrorType.CONFIGURATION;

  constructor(public setting: string, message?: string) {
    super(message || `${setting} is missing`);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

// 常用錯誤定義
export const Errors = {
  NotFound: (resource: string = 'Resource') =>
    new APIError(404, ErrorType.NOT_FOUND, 'NOT_FOUND', `${resource} not found`),

  BadRequest: (message: string, details?: unknown) =>
    new APIError(400, ErrorType.VALIDATION, 'BAD_REQUEST', message, details),

  Upstream: (message: string = 'Upstream service failed') =>
    new APIError(502, ErrorType.UPSTREAM, 'UPSTREAM_ERROR', message),

  ServiceUnavailable: (message: string = 'Service unavailable') =>
    new APIError(503, ErrorType.UNAVAILABLE, 'SERVICE_UNAVAILABLE', message),
};

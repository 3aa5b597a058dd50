export class WebexApiError extends Error {
  readonly status: number;
  readonly body: string;

  constructor(params: { method: string; url: string; status: number; body: string }) {
    super(`Webex ${params.method} ${params.url} failed: ${params.status} ${params.body}`.trim());
    this.name = "WebexApiError";
    this.status = params.status;
    this.body = params.body;
  }
}

export class ProvisionFailure extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ProvisionFailure";
  }
}

export type TransportErrorCode = "connect-failed" | "not-ready" | "peer-away";

export class TransportError extends Error {
  readonly code: TransportErrorCode;

  constructor(code: TransportErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
    this.code = code;
  }
}

export function isTransportError(err: unknown, code?: TransportErrorCode): err is TransportError {
  if (!(err instanceof TransportError)) return false;
  return code ? err.code === code : true;
}

export class RelayError extends Error {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, options);
    this.name = "RelayError";
    this.status = options?.status;
  }
}

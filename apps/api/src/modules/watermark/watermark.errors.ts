import { getErrorMessage } from "../../lib/getErrorMessage";

export type WatermarkErrorCode = "LOAD_FAILURE" | "WRITE_FAILURE" | "INVALID_PARAMETER";

const STATUS_BY_CODE: Record<WatermarkErrorCode, number> = {
  LOAD_FAILURE: 422,
  WRITE_FAILURE: 500,
  INVALID_PARAMETER: 400,
};

export class WatermarkError extends Error {
  code: WatermarkErrorCode;
  status: number;
  details?: unknown;

  constructor(code: WatermarkErrorCode, message: string, opts: { cause?: unknown; details?: unknown } = {}) {
    super(message);
    this.name = "WatermarkError";
    this.code = code;
    this.status = STATUS_BY_CODE[code];
    this.details = opts.details;
    if (opts.cause !== undefined) this.cause = opts.cause;
  }
}

// keeps an existing WatermarkError, wraps anything else under `code`
export function toWatermarkError(err: unknown, code: WatermarkErrorCode, context: string): WatermarkError {
  if (err instanceof WatermarkError) return err;
  return new WatermarkError(code, `${context}: ${getErrorMessage(err)}`, { cause: err });
}

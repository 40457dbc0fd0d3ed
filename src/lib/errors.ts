import type { Response } from "express";
import { logError } from "./utils.js";

export abstract class BaseException extends Error {
  statusCode: number;

  constructor(statusCode: number, message: string, cause?: unknown) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.cause = cause;
  }

  toBody(): { error: string } {
    return { error: this.message };
  }
}

export class BadRequestException extends BaseException {
  constructor(message: string, cause?: unknown) {
    super(400, message, cause);
  }
}

export class NotFoundException extends BaseException {
  constructor(message: string, cause?: unknown) {
    super(404, message, cause);
  }
}

export class PayloadTooLargeException extends BaseException {
  constructor(message: string, cause?: unknown) {
    super(413, message, cause);
  }
}

export class InternalServerErrorException extends BaseException {
  constructor(cause?: unknown) {
    super(500, "Internal server error during data processing.", cause);
  }
}

export function toHttpException(err: unknown): BaseException {
  return err instanceof BaseException ? err : new InternalServerErrorException(err);
}

/* ルート共通：BaseException はそのまま、それ以外は 500（詳細はログのみ） */
export function sendError(res: Response, err: unknown, context: string) {
  const ex = toHttpException(err);
  if (ex.statusCode >= 500) logError(`${context} failed:`, err);
  res.status(ex.statusCode).json(ex.toBody());
}

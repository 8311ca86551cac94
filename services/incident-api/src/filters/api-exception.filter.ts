import { Catch, HttpException, HttpStatus, Logger } from "@nestjs/common";
import type { ArgumentsHost, ExceptionFilter } from "@nestjs/common";
import type { Response } from "express";

import { EvidenceStorageError, InferenceError } from "../errors.js";

export interface ApiErrorBody {
  success: false;
  message: string;
}

function httpMessage(exception: HttpException): string {
  const body = exception.getResponse();
  if (typeof body === "string") {
    return body;
  }
  if (typeof body === "object" && body !== null && "message" in body) {
    const { message } = body;
    if (Array.isArray(message)) {
      return message.join("; ");
    }
    if (typeof message === "string") {
      return message;
    }
  }
  return exception.message;
}

/** Renders every failure under /api as `{ success: false, message }`. */
@Catch()
export class ApiExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(ApiExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const [status, message] = this.describe(exception);
    const body: ApiErrorBody = { success: false, message };
    response.status(status).json(body);
  }

  private describe(exception: unknown): [number, string] {
    if (exception instanceof HttpException) {
      return [exception.getStatus(), httpMessage(exception)];
    }
    if (exception instanceof InferenceError || exception instanceof EvidenceStorageError) {
      return [HttpStatus.INTERNAL_SERVER_ERROR, exception.message];
    }
    this.logger.error("Unhandled request error", exception instanceof Error ? exception.stack : String(exception));
    return [HttpStatus.INTERNAL_SERVER_ERROR, "Internal server error"];
  }
}

import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
} from "@nestjs/common";
import { Response } from "express";
import { LoggerUtil } from "../logger/LoggerUtil";
import APIResponse from "../responses/response";
import { API_RESPONSES } from "../utils/response.messages";
import { DynamicFieldError } from "../../dynamic-fields/errors/dynamic-field.errors";

function httpExceptionMessage(exception: HttpException): string {
  const body = exception.getResponse();
  if (typeof body === "string") {
    return body;
  }
  const message: unknown = Reflect.get(body, "message");
  if (Array.isArray(message)) {
    return message.map(String).join("; ");
  }
  return typeof message === "string" ? message : exception.message;
}

/**
 * Renders every error raised under a route as the failed API envelope.
 */
@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  constructor(private readonly apiId: string) {}

  catch(exception: unknown, host: ArgumentsHost) {
    const response = host.switchToHttp().getResponse<Response>();

    if (exception instanceof DynamicFieldError) {
      return APIResponse.error(
        response,
        this.apiId,
        exception.message,
        exception.code,
        exception.statusCode,
      );
    }

    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      return APIResponse.error(
        response,
        this.apiId,
        httpExceptionMessage(exception),
        HttpStatus[status] ?? API_RESPONSES.BAD_REQUEST,
        status,
      );
    }

    LoggerUtil.error(
      API_RESPONSES.SERVER_ERROR,
      exception instanceof Error ? exception.message : String(exception),
      this.apiId,
    );
    return APIResponse.error(
      response,
      this.apiId,
      API_RESPONSES.UNEXPECTED_ERROR,
      API_RESPONSES.INTERNAL_SERVER_ERROR,
      HttpStatus.INTERNAL_SERVER_ERROR,
    );
  }
}

import {
  ExceptionFilter,
  Catch,
  ArgumentsHost,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { FastifyReply } from 'fastify';
import { ApiResponse, ErrorCode } from '../interfaces/response.interface';

const isErrorCode = (value: unknown): value is ErrorCode =>
  Object.values(ErrorCode).some((code) => code === value);

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<FastifyReply>();
    const { status, body } = this.toResponse(exception);
    response.status(status).send(body);
  }

  toResponse(exception: unknown): { status: number; body: ApiResponse<null> } {
    let status: number = HttpStatus.INTERNAL_SERVER_ERROR;
    let errorCode = ErrorCode.INTERNAL_ERROR;
    let message = 'Internal server error';

    if (exception instanceof HttpException) {
      status = exception.getStatus();
      const exceptionResponse = exception.getResponse();
      errorCode = this.mapStatusToErrorCode(status);

      if (typeof exceptionResponse === 'object' && exceptionResponse !== null) {
        const rawMessage = 'message' in exceptionResponse ? exceptionResponse.message : undefined;
        const rawCode = 'code' in exceptionResponse ? exceptionResponse.code : undefined;
        // ValidationPipe 返回的 message 是字符串数组
        if (Array.isArray(rawMessage)) {
          message = rawMessage.map(String).join('; ');
        } else if (typeof rawMessage === 'string') {
          message = rawMessage;
        } else {
          message = exception.message;
        }
        if (isErrorCode(rawCode)) {
          errorCode = rawCode;
        }
      } else {
        message = exceptionResponse;
      }
    } else if (exception instanceof Error) {
      message = exception.message;
      this.logger.error(`Unhandled error: ${exception.message}`, exception.stack);
    }

    return {
      status,
      body: {
        data: null,
        error: {
          code: errorCode,
          message,
        },
      },
    };
  }

  private mapStatusToErrorCode(status: number): ErrorCode {
    switch (status) {
      case HttpStatus.BAD_REQUEST:
        return ErrorCode.INVALID_INPUT;
      case HttpStatus.NOT_FOUND:
        return ErrorCode.NOT_FOUND;
      case HttpStatus.CONFLICT:
        return ErrorCode.CONFLICT;
      default:
        return ErrorCode.INTERNAL_ERROR;
    }
  }
}

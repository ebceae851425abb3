import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import type { FastifyReply } from 'fastify';
import { BackupError, type BackupErrorCode } from './errors.js';

const STATUS_BY_CODE: Record<BackupErrorCode, HttpStatus> = {
  INVALID_IDENTIFIER: HttpStatus.BAD_REQUEST,
  CONFIGURATION_ERROR: HttpStatus.INTERNAL_SERVER_ERROR,
  AUTH_ERROR: HttpStatus.UNAUTHORIZED,
  SNAPSHOT_NOT_FOUND: HttpStatus.NOT_FOUND,
  SOURCE_UNAVAILABLE: HttpStatus.NOT_FOUND,
  REPOSITORY_GONE: HttpStatus.NOT_FOUND,
  TARGET_NOT_EMPTY: HttpStatus.CONFLICT,
  SNAPSHOT_COMMITTED: HttpStatus.CONFLICT,
  CONCURRENT_BACKUP: HttpStatus.CONFLICT,
  NETWORK_ERROR: HttpStatus.BAD_GATEWAY,
  WORKSPACE_ERROR: HttpStatus.INTERNAL_SERVER_ERROR,
  ABORTED: HttpStatus.INTERNAL_SERVER_ERROR,
  INTERNAL_ERROR: HttpStatus.INTERNAL_SERVER_ERROR,
};

export function httpStatusFor(code: BackupErrorCode): HttpStatus {
  return STATUS_BY_CODE[code];
}

/** Turns BackupErrors thrown by controllers into `{statusCode, code, message}`. */
@Catch(BackupError)
export class BackupErrorFilter implements ExceptionFilter<BackupError> {
  private readonly logger = new Logger(BackupErrorFilter.name);

  catch(exception: BackupError, host: ArgumentsHost): void {
    const reply = host.switchToHttp().getResponse<FastifyReply>();
    const statusCode = httpStatusFor(exception.code);
    if (statusCode >= 500) {
      this.logger.error(`${exception.code}: ${exception.message}`, exception.stack);
    }
    void reply.status(statusCode).send({ statusCode, code: exception.code, message: exception.message });
  }
}

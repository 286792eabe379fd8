import { ArgumentsHost, Catch, ExceptionFilter, Logger } from '@nestjs/common';
import type { Response } from 'express';
import { AppError, describeError } from './errors';

/** Domain failures become `{ error: kind, message, ...details }`; Nest's HttpExceptions keep their default rendering. */
@Catch(AppError)
export class AppErrorFilter implements ExceptionFilter<AppError> {
  private readonly logger = new Logger(AppErrorFilter.name);

  catch(exception: AppError, host: ArgumentsHost) {
    const res = host.switchToHttp().getResponse<Response>();
    this.logger.warn(`${exception.kind}: ${exception.message}`);
    res.status(exception.status).json({
      error: exception.kind,
      message: describeError(exception),
      ...exception.details(),
    });
  }
}

import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus } from '@nestjs/common';
import type { Response } from 'express';
import { ConfigError, EvaluationError } from '../engine';

export interface EngineErrorBody {
  statusCode: number;
  error: string;
  message: string;
  path?: string;
}

export function engineErrorBody(exception: ConfigError | EvaluationError): EngineErrorBody {
  return {
    statusCode: HttpStatus.UNPROCESSABLE_ENTITY,
    error: exception.name,
    message: exception.message,
    ...(exception instanceof ConfigError && exception.path !== undefined
      ? { path: exception.path }
      : {}),
  };
}

/**
 * Invalid templates and malformed events reach clients as 422 with the
 * engine's message (and the template path for ConfigError).
 */
@Catch(ConfigError, EvaluationError)
export class EngineExceptionFilter implements ExceptionFilter {
  catch(exception: ConfigError | EvaluationError, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    response.status(HttpStatus.UNPROCESSABLE_ENTITY).json(engineErrorBody(exception));
  }
}

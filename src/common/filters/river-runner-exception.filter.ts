import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Inject,
} from '@nestjs/common';
import { Response } from 'express';
import { WINSTON_MODULE_PROVIDER } from 'nest-winston';
import { Logger } from 'winston';
import {
  FeatureNotFoundError,
  InvalidInputError,
  ProviderError,
  RiverRunnerError,
} from '../errors/river-runner.errors';

interface ErrorBody {
  statusCode: number;
  message: string[];
  error: string;
}

export function toErrorBody(exception: RiverRunnerError | SyntaxError): ErrorBody {
  if (exception instanceof InvalidInputError) {
    return {
      statusCode: HttpStatus.BAD_REQUEST,
      message: [exception.message],
      error: 'Bad Request',
    };
  }
  if (exception instanceof FeatureNotFoundError) {
    return {
      statusCode: HttpStatus.NOT_FOUND,
      message: [exception.message],
      error: 'Not Found',
    };
  }
  if (exception instanceof ProviderError) {
    return {
      statusCode: HttpStatus.BAD_GATEWAY,
      message: [exception.message],
      error: 'Bad Gateway',
    };
  }
  if (exception instanceof SyntaxError) {
    return {
      statusCode: HttpStatus.BAD_REQUEST,
      message: ['It is not a JSON format.'],
      error: 'Bad Request',
    };
  }
  return {
    statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
    message: ['Internal server error'],
    error: 'Internal Server Error',
  };
}

@Catch(RiverRunnerError, SyntaxError)
export class RiverRunnerExceptionFilter implements ExceptionFilter {
  constructor(
    @Inject(WINSTON_MODULE_PROVIDER)
    private readonly logger: Logger,
  ) {}

  catch(exception: RiverRunnerError | SyntaxError, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const body = toErrorBody(exception);

    if (body.statusCode >= 500) {
      this.logger.error(
        `[TRACE ERROR] ${exception.name}: ${exception.message}`,
        exception.stack,
      );
    } else {
      this.logger.warn(`[TRACE WARNING] ${exception.name}: ${exception.message}`);
    }

    response.status(body.statusCode).json(body);
  }
}

import { ArgumentsHost, Catch, ExceptionFilter, Logger } from '@nestjs/common';
import { Response } from 'express';
import { DecayAuditError, FetchError } from '../errors';

/**
 * Renders audit failures in the API's { success, error } envelope
 */
@Catch(DecayAuditError)
export class DecayAuditExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(DecayAuditExceptionFilter.name);

  catch(exception: DecayAuditError, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();

    if (exception instanceof FetchError) {
      this.logger.error(
        `Fetch failed for ${exception.siteUrl}` +
          (exception.window ? ` (${exception.window} window)` : '') +
          `: ${exception.message}`
      );
    } else {
      this.logger.warn(`${exception.code}: ${exception.message}`);
    }

    response.status(exception.statusCode).json({
      success: false,
      error: exception.message,
      code: exception.code,
    });
  }
}

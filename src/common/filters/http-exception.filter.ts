import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { ErrorBody, errorResponse } from '../../constants/response';
import { ViewService } from '../../views/view.service';

const GENERIC_PAGE_ERROR = 'Something went wrong. Please try again.';

export function isApiRequest(req: Request): boolean {
  return req.path === '/api' || req.path.startsWith('/api/');
}

/**
 * Answers `/api/*` requests with `{ error, details? }` JSON. Browser routes
 * get a redirect to /login on 401 and the error page otherwise.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  constructor(private readonly viewService: ViewService) {}

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const req = ctx.getRequest<Request>();
    const res = ctx.getResponse<Response>();

    let status = HttpStatus.INTERNAL_SERVER_ERROR;
    let body: ErrorBody = { error: 'Internal server error' };
    if (exception instanceof HttpException) {
      status = exception.getStatus();
      body = errorResponse(exception);
    } else {
      this.logger.error(
        `Unhandled error on ${req.method} ${req.originalUrl}`,
        exception instanceof Error ? exception.stack : String(exception),
      );
    }

    if (isApiRequest(req)) {
      res.status(status).json(body);
      return;
    }
    if (status === HttpStatus.UNAUTHORIZED) {
      res.redirect('/login');
      return;
    }
    res.status(status).send(
      this.viewService.renderPage(req, 'error', {
        pageTitle: 'Error',
        status,
        message: status >= 500 ? GENERIC_PAGE_ERROR : body.error,
      }),
    );
  }
}

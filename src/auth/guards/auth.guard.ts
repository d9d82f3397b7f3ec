import {
  CanActivate,
  ExecutionContext,
  HttpStatus,
  Injectable,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { Request } from 'express';
import { AppException } from '../../common/exceptions/app.exception';
import { ErrorCode } from '../../constants/error-codes';
import { IS_PUBLIC_KEY } from '../decorators/public.decorator';
import { sessionUserOf } from '../interfaces/session-user.interface';

/**
 * Global guard: every route needs a logged-in session unless it is marked
 * with @Public(). The exception filter turns the 401 into a redirect to
 * /login for browser routes.
 */
@Injectable()
export class SessionAuthGuard implements CanActivate {
  constructor(private readonly reflector: Reflector) {}

  canActivate(context: ExecutionContext): boolean {
    const isPublic = this.reflector.getAllAndOverride<boolean>(IS_PUBLIC_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (isPublic) {
      return true;
    }

    const request = context.switchToHttp().getRequest<Request>();
    if (!sessionUserOf(request.session)) {
      throw new AppException(
        ErrorCode.UNAUTHORIZED,
        'Unauthorized',
        HttpStatus.UNAUTHORIZED,
      );
    }
    return true;
  }
}

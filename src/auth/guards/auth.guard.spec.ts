import { HttpStatus } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { AppException } from '../../common/exceptions/app.exception';
import { Public } from '../decorators/public.decorator';
import { SessionAuthGuard } from './auth.guard';

class ProbeController {
  @Public()
  open() {}

  closed() {}
}

function contextFor(handler: () => void, session: object | undefined): any {
  return {
    getHandler: () => handler,
    getClass: () => ProbeController,
    switchToHttp: () => ({ getRequest: () => ({ session }) }),
  };
}

describe('SessionAuthGuard', () => {
  const guard = new SessionAuthGuard(new Reflector());

  it('lets @Public() routes through without a session', () => {
    expect(guard.canActivate(contextFor(ProbeController.prototype.open, {}))).toBe(true);
  });

  it('lets a logged-in session through', () => {
    const session = { userId: 3, username: 'carol' };

    expect(guard.canActivate(contextFor(ProbeController.prototype.closed, session))).toBe(true);
  });

  it('rejects a session without a user with 401', () => {
    expect.assertions(2);
    try {
      guard.canActivate(contextFor(ProbeController.prototype.closed, {}));
    } catch (err: any) {
      expect(err).toBeInstanceOf(AppException);
      expect(err.getStatus()).toBe(HttpStatus.UNAUTHORIZED);
    }
  });

  it('rejects requests that carry no session at all', () => {
    expect(() =>
      guard.canActivate(contextFor(ProbeController.prototype.closed, undefined)),
    ).toThrow('Unauthorized');
  });
});

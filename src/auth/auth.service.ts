import { Injectable, Logger } from '@nestjs/common';
import * as bcrypt from 'bcrypt';
import { Request } from 'express';
import { UserService } from '../user/user.service';
import { SessionUser } from './interfaces/session-user.interface';

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(private readonly userService: UserService) {}

  /**
   * Resolves a username/password pair to a session user. Blank input,
   * unknown usernames and wrong passwords all yield null.
   */
  async validateCredentials(
    username: string,
    password: string,
  ): Promise<SessionUser | null> {
    if (!username || !password) {
      return null;
    }
    const user = await this.userService.findByUsername(username);
    if (!user) {
      return null;
    }
    const matches = await bcrypt.compare(password, user.passwordHash);
    if (!matches) {
      return null;
    }
    return { userId: user._id, username: user.username };
  }

  /** Starts a fresh session for `user`, dropping whatever the old one held. */
  async logIn(req: Request, user: SessionUser): Promise<void> {
    await this.regenerate(req);
    req.session.userId = user.userId;
    req.session.username = user.username;
    this.logger.log(`User ${user.userId} (${user.username}) logged in`);
  }

  /** Clears the session, whether or not anyone was logged in. */
  async logOut(req: Request): Promise<void> {
    await this.regenerate(req);
  }

  private regenerate(req: Request): Promise<void> {
    return new Promise((resolve, reject) => {
      req.session.regenerate((err: unknown) => {
        if (err) {
          reject(err);
          return;
        }
        resolve();
      });
    });
  }
}

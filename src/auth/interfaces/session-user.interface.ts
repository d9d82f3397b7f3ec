import type { SessionData } from 'express-session';

export interface SessionUser {
  userId: number;
  username: string;
}

export type FlashCategory = 'success' | 'error' | 'info';

export interface FlashMessage {
  category: FlashCategory;
  message: string;
}

declare module 'express-session' {
  interface SessionData {
    userId: number;
    username: string;
    flash: FlashMessage[];
  }
}

export type SessionState = Partial<SessionData>;

/** The logged-in user held by the session, or null for anonymous requests. */
export function sessionUserOf(session: SessionState | undefined): SessionUser | null {
  if (!session || typeof session.userId !== 'number' || !session.username) {
    return null;
  }
  return { userId: session.userId, username: session.username };
}

import {
  FlashCategory,
  FlashMessage,
  SessionState,
} from '../auth/interfaces/session-user.interface';

/** Queues a message for the next rendered page. */
export function pushFlash(
  session: SessionState,
  category: FlashCategory,
  message: string,
): void {
  session.flash = [...(session.flash ?? []), { category, message }];
}

/** Returns the queued messages and clears them so they show once. */
export function takeFlash(session: SessionState | undefined): FlashMessage[] {
  if (!session) return [];
  const messages = session.flash ?? [];
  delete session.flash;
  return messages;
}

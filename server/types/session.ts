import type { Session, SessionData } from 'express-session';
import type { UserRole } from '../../shared/constants/statuses';

export interface SessionUser {
  id: string;
  email: string;
  name?: string;
  role: UserRole;
  nic?: string;
}

declare module 'express-session' {
  interface SessionData {
    user?: SessionUser;
  }
}

export function getSessionUser(req: { session?: Session & Partial<SessionData> }): SessionUser | undefined {
  return req.session?.user;
}

export function isAdminUser(user: SessionUser | undefined): boolean {
  return user?.role === 'admin' || user?.role === 'backoffice';
}

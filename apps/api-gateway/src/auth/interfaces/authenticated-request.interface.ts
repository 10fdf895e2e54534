import type { Request } from 'express';

/**
 * Shape of request.user after JWT validation.
 * Populated by JwtStrategy.validate() and attached by Passport.
 */
export interface RequestUser {
  /** Principal id - the owner stamped on every task it creates */
  principal: string;
}

export interface AuthenticatedRequest extends Request {
  user: RequestUser;
}

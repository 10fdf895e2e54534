export type { JwtPayload, TokenType } from './jwt-payload.interface';
export type { RequestUser, AuthenticatedRequest } from './authenticated-request.interface';

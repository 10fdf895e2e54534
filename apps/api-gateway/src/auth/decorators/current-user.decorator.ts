import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { AuthenticatedRequest, RequestUser } from '../interfaces';

/**
 * Extracts the authenticated principal from the request:
 *
 * ```ts
 * @Get('tasks')
 * list(@CurrentUser() user: RequestUser) { ... user.principal ... }
 * ```
 *
 * Only meaningful behind JwtAuthGuard.
 */
export const CurrentUser = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): RequestUser =>
    ctx.switchToHttp().getRequest<AuthenticatedRequest>().user,
);

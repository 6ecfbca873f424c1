import {
  CanActivate,
  ExecutionContext,
  Injectable,
  UnauthorizedException,
} from '@nestjs/common';
import { Request } from 'express';
import { AuthService } from '../auth.service';

const BEARER_PREFIX = /^Bearer\s+(.+)$/i;

/**
 * Статический bearer-токен из AUTH_TOKEN.
 * Нет заголовка - 401, неверный токен - 403.
 */
@Injectable()
export class TokenAuthGuard implements CanActivate {
  constructor(private readonly authService: AuthService) {}

  canActivate(context: ExecutionContext): boolean {
    if (this.authService.isDisabled()) {
      return true;
    }

    const request = context.switchToHttp().getRequest<Request>();
    const match = BEARER_PREFIX.exec(request.headers.authorization ?? '');

    if (!match) {
      throw new UnauthorizedException('Not authenticated');
    }

    this.authService.authenticateFromToken(match[1].trim());
    return true;
  }
}

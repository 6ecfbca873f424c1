import { ForbiddenException, Inject, Injectable } from '@nestjs/common';
import { createHash, timingSafeEqual } from 'crypto';
import { AUTH_CONFIG, AuthConfig } from '../config/auth.config';

// Хэш выравнивает длину, иначе timingSafeEqual падает на разных буферах
const digest = (value: string): Buffer => createHash('sha256').update(value).digest();

@Injectable()
export class AuthService {
  constructor(@Inject(AUTH_CONFIG) private readonly authConfig: AuthConfig) {}

  isDisabled(): boolean {
    return this.authConfig.disable;
  }

  authenticateFromToken(token: string): void {
    if (this.authConfig.disable) {
      return;
    }
    if (!timingSafeEqual(digest(token), digest(this.authConfig.token))) {
      throw new ForbiddenException('Invalid token');
    }
  }
}

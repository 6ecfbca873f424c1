import { ExecutionContext, ForbiddenException, UnauthorizedException } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { Test, TestingModule } from '@nestjs/testing';
import { AUTH_CONFIG, AuthConfig } from '../../config/auth.config';
import { AuthService } from '../auth.service';
import { TokenAuthGuard } from './token-auth.guard';

const contextWithHeaders = (headers: Record<string, string>): ExecutionContext =>
  new ExecutionContextHost([{ headers }, {}]);

describe('TokenAuthGuard', () => {
  const createGuard = async (config: AuthConfig): Promise<TokenAuthGuard> => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [TokenAuthGuard, AuthService, { provide: AUTH_CONFIG, useValue: config }],
    }).compile();

    return module.get<TokenAuthGuard>(TokenAuthGuard);
  };

  it('should allow a request with the configured token', async () => {
    const guard = await createGuard({ disable: false, token: 'test-secret' });

    expect(guard.canActivate(contextWithHeaders({ authorization: 'Bearer test-secret' }))).toBe(true);
  });

  it('should reject a request without the authorization header', async () => {
    const guard = await createGuard({ disable: false, token: 'test-secret' });

    expect(() => guard.canActivate(contextWithHeaders({}))).toThrow(UnauthorizedException);
  });

  it('should reject a wrong token with 403', async () => {
    const guard = await createGuard({ disable: false, token: 'test-secret' });

    expect(() =>
      guard.canActivate(contextWithHeaders({ authorization: 'Bearer other-secret' })),
    ).toThrow(ForbiddenException);
  });

  it('should allow everything when auth is disabled', async () => {
    const guard = await createGuard({ disable: true, token: '' });

    expect(guard.canActivate(contextWithHeaders({}))).toBe(true);
  });
});

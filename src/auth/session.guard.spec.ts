import { UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { SessionGuard } from './session.guard';
import { signSessionToken } from './session-token';
import { ANONYMOUS_ACTOR } from './actor';
import type { Actor } from './actor';
import { UserRole } from '../user/enums/user-role.enum';
import { InMemoryUserDirectory } from '../appointment/testing/in-memory-user.directory';

const SECRET = 'test-secret';

interface FakeRequest {
  headers: { authorization?: string };
  actor?: Actor;
}

function contextFor(request: FakeRequest): ExecutionContextHost {
  return new ExecutionContextHost([request]);
}

describe('SessionGuard', () => {
  const directory = new InMemoryUserDirectory();

  function createGuard(config: Record<string, string> = { SESSION_SECRET: SECRET }) {
    return new SessionGuard(new ConfigService(config), directory);
  }

  it('sin token deja un actor anónimo', async () => {
    const request: FakeRequest = { headers: {} };

    await expect(createGuard().canActivate(contextFor(request))).resolves.toBe(
      true,
    );
    expect(request.actor).toBe(ANONYMOUS_ACTOR);
  });

  it('resuelve el rol del usuario del token', async () => {
    const request: FakeRequest = {
      headers: { authorization: `Bearer ${signSessionToken('doctor-1', SECRET)}` },
    };

    await createGuard().canActivate(contextFor(request));

    expect(request.actor).toEqual({ userId: 'doctor-1', role: UserRole.DOCTOR });
  });

  it('un usuario inactivo queda como unknown', async () => {
    const request: FakeRequest = {
      headers: {
        authorization: `Bearer ${signSessionToken('doctor-retired', SECRET)}`,
      },
    };

    await createGuard().canActivate(contextFor(request));

    expect(request.actor).toEqual({
      userId: 'doctor-retired',
      role: UserRole.UNKNOWN,
    });
  });

  it('corta con 401 un token falsificado', async () => {
    const request: FakeRequest = {
      headers: { authorization: 'Bearer doctor-1.deadbeef' },
    };

    await expect(
      createGuard().canActivate(contextFor(request)),
    ).rejects.toBeInstanceOf(UnauthorizedException);
  });

  it('ignora esquemas que no son Bearer', async () => {
    const request: FakeRequest = { headers: { authorization: 'Basic abc' } };

    await createGuard().canActivate(contextFor(request));

    expect(request.actor).toBe(ANONYMOUS_ACTOR);
  });

  it('sin SESSION_SECRET toda sesión es anónima', async () => {
    const request: FakeRequest = {
      headers: { authorization: `Bearer ${signSessionToken('doctor-1', SECRET)}` },
    };

    await createGuard({}).canActivate(contextFor(request));

    expect(request.actor).toBe(ANONYMOUS_ACTOR);
  });
});

import {
  Injectable,
  CanActivate,
  ExecutionContext,
  UnauthorizedException,
  Logger,
  Inject,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Request } from 'express';
import { USER_DIRECTORY } from '../appointment/ports';
import type { UserDirectoryPort } from '../appointment/ports';
import { UserRole } from '../user/enums/user-role.enum';
import { ANONYMOUS_ACTOR, Actor } from './actor';
import { verifySessionToken } from './session-token';

// El guard deja el actor resuelto en el request
export interface RequestWithActor extends Request {
  actor?: Actor;
}

/**
 * Resuelve el actor de la sesión.
 *
 * Sin token el actor queda como UNKNOWN y es el core quien rechaza las
 * operaciones; un token presente pero inválido se corta acá con 401.
 */
@Injectable()
export class SessionGuard implements CanActivate {
  private readonly logger = new Logger(SessionGuard.name);

  constructor(
    private readonly configService: ConfigService,
    @Inject(USER_DIRECTORY)
    private readonly userDirectory: UserDirectoryPort,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<RequestWithActor>();
    const token = this.extractBearerToken(request.headers.authorization);

    request.actor = ANONYMOUS_ACTOR;

    if (!token) {
      return true;
    }

    const secret = this.configService.get<string>('SESSION_SECRET');

    if (!secret) {
      this.logger.warn(
        'SESSION_SECRET no está configurado. Todas las sesiones quedan como anónimas.',
      );
      return true;
    }

    const userId = verifySessionToken(token, secret);

    if (!userId) {
      throw new UnauthorizedException('Sesión inválida');
    }

    request.actor = await this.resolveActor(userId);
    return true;
  }

  private async resolveActor(userId: string): Promise<Actor> {
    const user = await this.userDirectory.findById(userId);

    if (!user || !user.isActive) {
      this.logger.warn(`Sesión de usuario inexistente o inactivo: ${userId}`);
      return { userId, role: UserRole.UNKNOWN };
    }

    return { userId: user.id, role: user.role };
  }

  private extractBearerToken(header: string | undefined): string | null {
    if (!header) {
      return null;
    }

    const [scheme, value] = header.split(' ');

    if (scheme?.toLowerCase() !== 'bearer' || !value) {
      return null;
    }

    return value.trim();
  }
}

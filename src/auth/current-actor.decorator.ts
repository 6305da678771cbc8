import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import { ANONYMOUS_ACTOR, Actor } from './actor';
import type { RequestWithActor } from './session.guard';

export const CurrentActor = createParamDecorator(
  (_data: unknown, context: ExecutionContext): Actor => {
    const request = context.switchToHttp().getRequest<RequestWithActor>();

    return request.actor ?? ANONYMOUS_ACTOR;
  },
);

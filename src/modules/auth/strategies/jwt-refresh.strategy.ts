import { Inject, Injectable } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import type { Request } from 'express';
import { Strategy } from 'passport-jwt';
import { APP_CONFIG } from '../../../config/app-config.module';
import type { Env } from '../../../config/env.validation';
import type { JwtRefreshPayload } from '../types/jwt-payload';

function extractRefreshToken(req: Request): string | null {
  const fromBody: unknown = req.body?.refreshToken;
  if (typeof fromBody === 'string' && fromBody.length > 0) return fromBody;

  const authHeader = req.headers.authorization;
  if (typeof authHeader === 'string' && authHeader.startsWith('Bearer ')) {
    return authHeader.slice('Bearer '.length);
  }

  return null;
}

@Injectable()
export class JwtRefreshStrategy extends PassportStrategy(Strategy, 'jwt-refresh') {
  constructor(@Inject(APP_CONFIG) config: Env) {
    super({
      jwtFromRequest: extractRefreshToken,
      ignoreExpiration: false,
      secretOrKey: config.JWT_REFRESH_SECRET,
      passReqToCallback: false,
    });
  }

  validate(payload: JwtRefreshPayload): JwtRefreshPayload | null {
    if (payload?.typ !== 'refresh') return null;
    return payload;
  }
}

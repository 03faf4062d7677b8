import { Inject, Injectable } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import { APP_CONFIG } from '../../../config/app-config.module';
import type { Env } from '../../../config/env.validation';
import type { JwtAccessPayload } from '../types/jwt-payload';

@Injectable()
export class JwtAccessStrategy extends PassportStrategy(Strategy, 'jwt-access') {
  constructor(@Inject(APP_CONFIG) config: Env) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: config.JWT_ACCESS_SECRET,
    });
  }

  validate(payload: JwtAccessPayload): JwtAccessPayload | null {
    if (payload?.typ !== 'access') return null;
    return payload;
  }
}

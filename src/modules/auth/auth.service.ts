import { Inject, Injectable, Logger } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { randomUUID } from 'node:crypto';
import { APP_CONFIG } from '../../config/app-config.module';
import type { Env } from '../../config/env.validation';
import { ServiceResult, ok, unauthorized } from '../../common/service-result';
import type { DbSession } from '../../database/db-session';
import { normalizeEmail, verifyPassword } from '../users/password';
import { UserView, UsersService, toUserView } from '../users/users.service';
import { LoginDto } from './dto/login.dto';
import type { JwtAccessPayload, JwtRefreshPayload } from './types/jwt-payload';

export type Tokens = {
  accessToken: string;
  refreshToken: string;
};

export type AuthResult = Tokens & { user: UserView };

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly jwt: JwtService,
    private readonly users: UsersService,
    @Inject(APP_CONFIG) private readonly config: Env,
  ) {}

  private async signTokens(user: { id: number; email: string }): Promise<Tokens> {
    const accessPayload: JwtAccessPayload = {
      sub: user.id,
      email: user.email,
      typ: 'access',
    };
    const refreshPayload: JwtRefreshPayload = {
      sub: user.id,
      jti: randomUUID(),
      typ: 'refresh',
    };

    const accessToken = await this.jwt.signAsync(accessPayload, {
      secret: this.config.JWT_ACCESS_SECRET,
      expiresIn: this.config.JWT_ACCESS_TTL_SECONDS,
    });
    const refreshToken = await this.jwt.signAsync(refreshPayload, {
      secret: this.config.JWT_REFRESH_SECRET,
      expiresIn: this.config.JWT_REFRESH_TTL_SECONDS,
    });

    return { accessToken, refreshToken };
  }

  async login(session: DbSession, dto: LoginDto): Promise<ServiceResult<AuthResult>> {
    const found = await this.users.findByEmail(session, dto.email);
    if (found.kind !== 'ok') return found;

    const user = found.value;
    if (!user || !(await verifyPassword(user.password, dto.password))) {
      this.logger.warn(`Failed login for ${normalizeEmail(dto.email)}`);
      return unauthorized('Invalid email or password');
    }

    this.logger.log(`User ${user.id} logged in`);
    return ok({ ...(await this.signTokens(user)), user: toUserView(user) });
  }

  /** Stateless: any unexpired refresh token for a user that still exists is accepted. */
  async refresh(session: DbSession, userId: number): Promise<ServiceResult<AuthResult>> {
    const found = await this.users.findOne(session, userId);
    if (found.kind === 'not_found') return unauthorized('User no longer exists');
    if (found.kind !== 'ok') return found;

    return ok({ ...(await this.signTokens(found.value)), user: found.value });
  }

  async me(session: DbSession, userId: number): Promise<ServiceResult<UserView>> {
    const found = await this.users.findOne(session, userId);
    if (found.kind === 'not_found') return unauthorized('User no longer exists');
    return found;
  }
}

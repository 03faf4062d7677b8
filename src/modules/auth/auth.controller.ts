import { Body, Controller, Get, HttpCode, HttpStatus, Post, Req, UseGuards } from '@nestjs/common';
import { SkipThrottle, Throttle } from '@nestjs/throttler';
import type { Request } from 'express';
import { respond } from '../../common/http/respond';
import { DatabaseService } from '../../database/database.service';
import { AuthService } from './auth.service';
import { CurrentUser } from './decorators/current-user.decorator';
import { LoginDto } from './dto/login.dto';
import { RefreshDto } from './dto/refresh.dto';
import { JwtAccessGuard } from './guards/jwt-access.guard';
import { JwtRefreshGuard } from './guards/jwt-refresh.guard';
import type { JwtAccessPayload, JwtRefreshPayload } from './types/jwt-payload';

@Controller('auth')
export class AuthController {
  constructor(
    private readonly db: DatabaseService,
    private readonly auth: AuthService,
  ) {}

  @Post('login')
  @HttpCode(HttpStatus.OK)
  @Throttle({ default: { limit: 5, ttl: 60_000 } })
  async login(@Body() dto: LoginDto) {
    return respond(await this.db.withSession((session) => this.auth.login(session, dto)));
  }

  @Post('refresh')
  @HttpCode(HttpStatus.OK)
  @UseGuards(JwtRefreshGuard)
  @SkipThrottle()
  async refresh(@Body() _dto: RefreshDto, @Req() req: Request & { user: JwtRefreshPayload }) {
    return respond(await this.db.withSession((session) => this.auth.refresh(session, req.user.sub)));
  }

  @Get('me')
  @UseGuards(JwtAccessGuard)
  @SkipThrottle()
  async me(@CurrentUser() user: JwtAccessPayload) {
    return respond(await this.db.withSession((session) => this.auth.me(session, user.sub)));
  }
}

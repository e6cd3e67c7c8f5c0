import { ExtractJwt, Strategy } from 'passport-jwt';
import { PassportStrategy } from '@nestjs/passport';
import { Injectable, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppEnv } from '../config/env.schema';
import { UsersService } from '../users/users.service';
import type { UserDocument } from '../users/user.types';
import type { JwtPayload } from './auth.types';

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  constructor(
    config: ConfigService<AppEnv, true>,
    private readonly usersService: UsersService,
  ) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      ignoreExpiration: false,
      secretOrKey: config.get('JWT_SECRET_KEY', { infer: true }),
      algorithms: [config.get('JWT_ALGORITHM', { infer: true })],
    });
  }

  /** Loads the stored user on every request so a deleted account loses access. */
  async validate(payload: JwtPayload): Promise<UserDocument> {
    const user = payload.sub
      ? await this.usersService.findByDiscordId(payload.sub)
      : null;
    if (!user) {
      throw new UnauthorizedException('Could not validate credentials');
    }
    return user;
  }
}

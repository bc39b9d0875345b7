import { Injectable, UnauthorizedException, Logger } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { ExtractJwt, Strategy } from 'passport-jwt';
import { ConfigService } from '@nestjs/config';
import { AccessGateService } from './access-gate.service';
import { JwtPayload, MONITOR_SUBJECT, resolveJwtSecret } from './auth.service';

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
  constructor(
    private readonly gate: AccessGateService,
    configService: ConfigService,
  ) {
    super({
      // The HTML display and the SSE stream cannot set headers, so they pass ?token=
      jwtFromRequest: ExtractJwt.fromExtractors([
        ExtractJwt.fromAuthHeaderAsBearerToken(),
        ExtractJwt.fromUrlQueryParameter('token'),
      ]),
      ignoreExpiration: false,
      secretOrKey: resolveJwtSecret(configService, new Logger(JwtStrategy.name)),
    });
  }

  validate(payload: JwtPayload): JwtPayload {
    // Tokens from a previous process are not honoured until someone logs in again
    if (payload.sub !== MONITOR_SUBJECT || !this.gate.isGranted()) {
      throw new UnauthorizedException('Access Denied.');
    }
    return payload;
  }
}

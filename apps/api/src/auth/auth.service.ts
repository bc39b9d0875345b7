import { Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import * as bcrypt from 'bcrypt';
import { AccessGateService } from './access-gate.service';

export const MONITOR_SUBJECT = 'monitor';
const DEV_JWT_SECRET = 'dev-only-insecure-secret';
const DEV_PASSWORD = 'change-me';

export interface JwtPayload {
  sub: string;
}

export interface AuthResponse {
  accessToken: string;
}

export function resolveJwtSecret(configService: ConfigService, logger: Logger): string {
  const secret = configService.get<string>('JWT_SECRET');
  const isProduction = configService.get<string>('NODE_ENV') === 'production';

  if (!secret && isProduction) {
    throw new Error('JWT_SECRET must be set in production environment');
  }
  if (!secret) {
    logger.warn('JWT_SECRET not set - using insecure default. SET THIS IN PRODUCTION!');
  }
  return secret || DEV_JWT_SECRET;
}

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);
  private passwordHash: Promise<string> | null = null;

  constructor(
    private readonly jwtService: JwtService,
    private readonly configService: ConfigService,
    private readonly gate: AccessGateService,
  ) {}

  // Hashed once on first use; the plain password is not kept around
  private getPasswordHash(): Promise<string> {
    if (!this.passwordHash) {
      const password = this.configService.get<string>('STOCK_MONITOR_PASSWORD');
      const isProduction = this.configService.get<string>('NODE_ENV') === 'production';
      if (!password && isProduction) {
        throw new Error('STOCK_MONITOR_PASSWORD must be set in production environment');
      }
      if (!password) {
        this.logger.warn('STOCK_MONITOR_PASSWORD not set - using the development default');
      }
      const rounds = this.configService.get<number>('BCRYPT_ROUNDS', 10);
      this.passwordHash = bcrypt.hash(password || DEV_PASSWORD, Number(rounds));
    }
    return this.passwordHash;
  }

  async login(password: string): Promise<AuthResponse> {
    const hash = await this.getPasswordHash();
    const isPasswordValid = await bcrypt.compare(password, hash);

    if (!isPasswordValid) {
      this.logger.warn('Login rejected: wrong access code');
      throw new UnauthorizedException('Access Denied.');
    }

    this.gate.grant();
    const payload: JwtPayload = { sub: MONITOR_SUBJECT };
    return { accessToken: this.jwtService.sign(payload) };
  }
}

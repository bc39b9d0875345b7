import { Logger, UnauthorizedException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtModule, JwtService } from '@nestjs/jwt';
import { Test } from '@nestjs/testing';
import { AccessGateService } from './access-gate.service';
import { AuthService, JwtPayload, resolveJwtSecret } from './auth.service';

describe('AuthService', () => {
  let authService: AuthService;
  let jwtService: JwtService;
  let gate: AccessGateService;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({
      imports: [JwtModule.register({ secret: 'test-secret' })],
      providers: [
        AuthService,
        AccessGateService,
        {
          provide: ConfigService,
          useValue: new ConfigService({ STOCK_MONITOR_PASSWORD: 'test-secret', BCRYPT_ROUNDS: 4 }),
        },
      ],
    }).compile();

    authService = moduleRef.get(AuthService);
    jwtService = moduleRef.get(JwtService);
    gate = moduleRef.get(AccessGateService);
  });

  it('opens the gate and signs a token for the right password', async () => {
    const { accessToken } = await authService.login('test-secret');

    expect(gate.isGranted()).toBe(true);
    expect(jwtService.verify<JwtPayload & { iat: number }>(accessToken).sub).toBe('monitor');
  });

  it('denies a wrong password and leaves the gate closed', async () => {
    await expect(authService.login('wrong')).rejects.toThrow(new UnauthorizedException('Access Denied.'));
    expect(gate.isGranted()).toBe(false);
  });

  it('keeps the gate open after a later failed attempt', async () => {
    await authService.login('test-secret');
    await expect(authService.login('wrong')).rejects.toBeInstanceOf(UnauthorizedException);
    expect(gate.isGranted()).toBe(true);
  });
});

describe('AccessGateService', () => {
  it('remembers the first grant only', () => {
    const gate = new AccessGateService();
    gate.grant(new Date('2024-03-01T09:30:00Z'));
    gate.grant(new Date('2024-03-01T10:00:00Z'));
    expect(gate.grantedSince).toEqual(new Date('2024-03-01T09:30:00Z'));
  });
});

describe('resolveJwtSecret', () => {
  const logger = new Logger('resolveJwtSecret');
  const originalNodeEnv = process.env.NODE_ENV;

  afterEach(() => {
    process.env.NODE_ENV = originalNodeEnv;
  });

  it('uses the configured secret', () => {
    expect(resolveJwtSecret(new ConfigService({ JWT_SECRET: 'test-secret' }), logger)).toBe('test-secret');
  });

  it('falls back to the development secret outside production', () => {
    process.env.NODE_ENV = 'test';
    expect(resolveJwtSecret(new ConfigService({}), logger)).toBe('dev-only-insecure-secret');
  });

  it('refuses to start in production without a secret', () => {
    process.env.NODE_ENV = 'production';
    expect(() => resolveJwtSecret(new ConfigService({}), logger)).toThrow(
      'JWT_SECRET must be set in production environment',
    );
  });
});

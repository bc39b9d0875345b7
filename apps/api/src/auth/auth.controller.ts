import { Body, Controller, Get, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { IsString, MinLength } from 'class-validator';
import { AccessGateService } from './access-gate.service';
import { AuthResponse, AuthService } from './auth.service';
import { Public } from './public.decorator';

class LoginDto {
  @IsString()
  @MinLength(1)
  password!: string;
}

@Controller('auth')
export class AuthController {
  constructor(
    private readonly authService: AuthService,
    private readonly gate: AccessGateService,
  ) {}

  @Public()
  @Post('login')
  @HttpCode(HttpStatus.OK)
  async login(@Body() dto: LoginDto): Promise<AuthResponse> {
    return this.authService.login(dto.password);
  }

  @Public()
  @Get('status')
  status() {
    return { granted: this.gate.isGranted() };
  }
}

import { Body, Controller, HttpCode, Post } from '@nestjs/common';
import { Public } from '../../common/decorators/public.decorator';
import { AuthService } from './auth.service';
import { LoginDto, RegisterDto, TokenResponseDto } from './dto/auth.dto';

@Controller('auth')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  /**
   * POST /api/auth/register
   * 注册（7 天体验期）并返回 token
   */
  @Post('register')
  @Public()
  async register(@Body() dto: RegisterDto): Promise<TokenResponseDto> {
    return this.authService.registerAndSignIn(dto);
  }

  /**
   * POST /api/auth/login
   */
  @Post('login')
  @Public()
  @HttpCode(200)
  async login(@Body() dto: LoginDto): Promise<TokenResponseDto> {
    return this.authService.login(dto);
  }
}

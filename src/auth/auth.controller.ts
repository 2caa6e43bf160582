import { Body, Controller, Get, Post, Req } from '@nestjs/common';
import { actorOf, AuthRequest } from './auth.types';
import { AuthService } from './auth.service';
import { Public } from './public.decorator';

@Controller('auth')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  @Post('login')
  @Public()
  login(@Body() body: { username?: string; password?: string }) {
    return this.authService.signIn(body);
  }

  @Post('logout')
  logout(@Req() req: AuthRequest) {
    return this.authService.signOut(actorOf(req));
  }

  @Get('me')
  me(@Req() req: AuthRequest) {
    return this.authService.me(actorOf(req));
  }

  @Post('password')
  changePassword(
    @Req() req: AuthRequest,
    @Body() body: { currentPassword?: string; newPassword?: string },
  ) {
    return this.authService.changePassword(actorOf(req), body);
  }
}

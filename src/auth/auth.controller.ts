import {
  Body,
  Controller,
  Get,
  HttpException,
  HttpStatus,
  Post,
  Req,
  Res,
} from '@nestjs/common';
import { ApiExcludeController } from '@nestjs/swagger';
import { Request, Response } from 'express';
import { pushFlash } from '../common/flash';
import { errorResponse } from '../constants/response';
import { CreateUserDto } from '../user/dto/create-user.dto';
import { LoginUserDto } from '../user/dto/login-user.dto';
import { UserService } from '../user/user.service';
import { errorMessages, ViewService } from '../views/view.service';
import { AuthService } from './auth.service';
import { Public } from './decorators/public.decorator';
import { sessionUserOf } from './interfaces/session-user.interface';

export const INVALID_CREDENTIALS_MESSAGE = 'Invalid username or password';

@ApiExcludeController()
@Public()
@Controller()
export class AuthController {
  constructor(
    private readonly authService: AuthService,
    private readonly userService: UserService,
    private readonly viewService: ViewService,
  ) {}

  @Get()
  home(@Req() req: Request, @Res() res: Response) {
    res.redirect(sessionUserOf(req.session) ? '/dashboard' : '/login');
  }

  @Get('login')
  loginPage(@Req() req: Request, @Res() res: Response) {
    res.send(this.viewService.renderPage(req, 'login', { pageTitle: 'Log in' }));
  }

  @Post('login')
  async login(
    @Body() loginUserDto: LoginUserDto,
    @Req() req: Request,
    @Res() res: Response,
  ) {
    const user = await this.authService.validateCredentials(
      loginUserDto.username ?? '',
      loginUserDto.password ?? '',
    );
    if (!user) {
      res
        .status(HttpStatus.UNAUTHORIZED)
        .send(
          this.viewService.renderPage(
            req,
            'login',
            { pageTitle: 'Log in', username: loginUserDto.username },
            errorMessages(INVALID_CREDENTIALS_MESSAGE),
          ),
        );
      return;
    }

    await this.authService.logIn(req, user);
    pushFlash(req.session, 'success', 'Login successful!');
    res.redirect('/dashboard');
  }

  @Get('register')
  registerPage(@Req() req: Request, @Res() res: Response) {
    res.send(this.viewService.renderPage(req, 'register', { pageTitle: 'Register' }));
  }

  @Post('register')
  async register(
    @Body() createUserDto: CreateUserDto,
    @Req() req: Request,
    @Res() res: Response,
  ) {
    try {
      await this.userService.register(createUserDto);
    } catch (error) {
      if (!(error instanceof HttpException)) throw error;
      res
        .status(error.getStatus())
        .send(
          this.viewService.renderPage(
            req,
            'register',
            {
              pageTitle: 'Register',
              username: createUserDto.username,
              email: createUserDto.email,
            },
            errorMessages(errorResponse(error).error),
          ),
        );
      return;
    }

    pushFlash(req.session, 'success', 'Registration successful! Please login.');
    res.redirect('/login');
  }

  @Get('logout')
  async logout(@Req() req: Request, @Res() res: Response) {
    await this.authService.logOut(req);
    pushFlash(req.session, 'info', 'You have been logged out');
    res.redirect('/login');
  }
}

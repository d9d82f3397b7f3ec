import { Controller, Get } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { Public } from '../auth/decorators/public.decorator';
import { UserListResponse } from './interfaces/user.interface';
import { UserService } from './user.service';

@ApiTags('Users')
@Controller('api')
export class UserController {
  constructor(private readonly userService: UserService) {}

  @Get('users')
  @ApiOperation({ summary: 'List all users (session required)' })
  async listUsers(): Promise<UserListResponse> {
    return { users: await this.userService.listAll() };
  }

  @Public()
  @Get('public/users')
  @ApiOperation({ summary: 'List all users' })
  listPublicUsers(): Promise<UserListResponse> {
    return this.listUsers();
  }
}

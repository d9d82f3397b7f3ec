import { ApiProperty } from '@nestjs/swagger';
import { IsString } from 'class-validator';
import {
  EMAIL_MAX_LENGTH,
  USERNAME_MAX_LENGTH,
} from '../schemas/user.schema';

/**
 * Form body of POST /register. Only types are checked here; UserService
 * runs the ordered registration checks and reports the first failure.
 */
export class CreateUserDto {
  @ApiProperty({
    example: 'alice',
    description: 'Unique username',
    maxLength: USERNAME_MAX_LENGTH,
  })
  @IsString()
  readonly username!: string;

  @ApiProperty({
    example: 'alice@example.com',
    description: 'Unique email address',
    format: 'email',
    maxLength: EMAIL_MAX_LENGTH,
  })
  @IsString()
  readonly email!: string;

  @ApiProperty({ example: 'change-me', description: 'Password' })
  @IsString()
  readonly password!: string;

  @ApiProperty({ example: 'change-me', description: 'Password, repeated' })
  @IsString()
  readonly confirm_password!: string;
}

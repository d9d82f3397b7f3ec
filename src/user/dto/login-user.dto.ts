import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsOptional, IsString } from 'class-validator';

/** Blank or missing credentials fail like wrong ones, in AuthController. */
export class LoginUserDto {
  @ApiPropertyOptional({ example: 'alice' })
  @IsOptional()
  @IsString()
  readonly username?: string;

  @ApiPropertyOptional({ example: 'change-me' })
  @IsOptional()
  @IsString()
  readonly password?: string;
}

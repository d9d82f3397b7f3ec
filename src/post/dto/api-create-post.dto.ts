import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsOptional, IsString, MaxLength } from 'class-validator';
import { TITLE_MAX_LENGTH } from '../schemas/post.schema';

/**
 * JSON body of POST /api/public/posts_21201532. Every field is optional here
 * so that PostService can report all missing fields in one error.
 */
export class ApiCreatePostDto {
  @ApiPropertyOptional({ example: 'Hello', maxLength: TITLE_MAX_LENGTH })
  @IsOptional()
  @IsString()
  @MaxLength(TITLE_MAX_LENGTH)
  readonly title?: string;

  @ApiPropertyOptional({ example: 'First post on the board' })
  @IsOptional()
  @IsString()
  readonly content?: string;

  @ApiPropertyOptional({ example: 'alice', description: 'Author username' })
  @IsOptional()
  @IsString()
  readonly username?: string;
}

import { IsOptional, IsString } from 'class-validator';

/** Form body of POST /create_post. Presence and length are checked by PostService. */
export class CreatePostDto {
  @IsOptional()
  @IsString()
  readonly title?: string;

  @IsOptional()
  @IsString()
  readonly content?: string;
}

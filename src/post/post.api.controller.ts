import { Body, Controller, Get, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { Public } from '../auth/decorators/public.decorator';
import { ApiCreatePostDto } from './dto/api-create-post.dto';
import {
  PostCreatedResponse,
  PostListResponse,
} from './interfaces/post.interface';
import { PostService } from './post.service';

@ApiTags('Posts')
@Controller('api')
export class PostApiController {
  constructor(private readonly postService: PostService) {}

  @Get('posts')
  @ApiOperation({ summary: 'List all posts, newest first (session required)' })
  async listPosts(): Promise<PostListResponse> {
    return { posts: await this.postService.listAll() };
  }

  @Public()
  @Get('public/posts_21201532')
  @ApiOperation({ summary: 'List all posts, newest first' })
  listPublicPosts(): Promise<PostListResponse> {
    return this.listPosts();
  }

  /**
   * Public by policy: the author is named by `username` in the body rather
   * than taken from the session. This is the only path that notifies other
   * users.
   */
  @Public()
  @Post('public/posts_21201532')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Create a post and notify every other user' })
  async createPost(
    @Body() apiCreatePostDto: ApiCreatePostDto,
  ): Promise<PostCreatedResponse> {
    const post = await this.postService.createAndNotify(apiCreatePostDto);
    return { message: 'Post created successfully', post };
  }
}

import {
  Body,
  Controller,
  Get,
  HttpException,
  Post,
  Req,
  Res,
} from '@nestjs/common';
import { ApiExcludeController } from '@nestjs/swagger';
import { Request, Response } from 'express';
import { GetUser } from '../auth/decorators/user.decorator';
import { SessionUser } from '../auth/interfaces/session-user.interface';
import { pushFlash } from '../common/flash';
import { errorResponse } from '../constants/response';
import { errorMessages, ViewService } from '../views/view.service';
import { CreatePostDto } from './dto/create-post.dto';
import { PostService } from './post.service';

@ApiExcludeController()
@Controller()
export class PostController {
  constructor(
    private readonly postService: PostService,
    private readonly viewService: ViewService,
  ) {}

  @Get('dashboard')
  async dashboard(
    @GetUser() user: SessionUser,
    @Req() req: Request,
    @Res() res: Response,
  ) {
    const posts = await this.postService.listRecentForUser(user);
    res.send(
      this.viewService.renderPage(req, 'dashboard', {
        pageTitle: 'Dashboard',
        user,
        posts,
      }),
    );
  }

  @Get('posts')
  async posts(@Req() req: Request, @Res() res: Response) {
    const posts = await this.postService.listAll();
    res.send(
      this.viewService.renderPage(req, 'posts', { pageTitle: 'Posts', posts }),
    );
  }

  @Get('create_post')
  createPostPage(@Req() req: Request, @Res() res: Response) {
    res.send(
      this.viewService.renderPage(req, 'create_post', { pageTitle: 'New post' }),
    );
  }

  @Post('create_post')
  async createPost(
    @GetUser() user: SessionUser,
    @Body() createPostDto: CreatePostDto,
    @Req() req: Request,
    @Res() res: Response,
  ) {
    try {
      await this.postService.createFromForm(user, createPostDto);
    } catch (error) {
      if (!(error instanceof HttpException)) throw error;
      res
        .status(error.getStatus())
        .send(
          this.viewService.renderPage(
            req,
            'create_post',
            {
              pageTitle: 'New post',
              title: createPostDto.title,
              content: createPostDto.content,
            },
            errorMessages(errorResponse(error).error),
          ),
        );
      return;
    }

    pushFlash(req.session, 'success', 'Post created successfully!');
    res.redirect('/posts');
  }
}

import { HttpStatus, Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { SessionUser } from '../auth/interfaces/session-user.interface';
import {
  AppException,
  errorMessage,
  isAppException,
} from '../common/exceptions/app.exception';
import { ErrorCode } from '../constants/error-codes';
import { NotificationService } from '../notifications/notification.service';
import { SequenceService } from '../sequence/sequence.service';
import { User } from '../user/interfaces/user.interface';
import { UserService } from '../user/user.service';
import { ApiCreatePostDto } from './dto/api-create-post.dto';
import { CreatePostDto } from './dto/create-post.dto';
import {
  FanOutReconcileResult,
  Post,
  PostSummary,
} from './interfaces/post.interface';
import { TITLE_MAX_LENGTH } from './schemas/post.schema';

export const DASHBOARD_POST_LIMIT = 5;

const NEWEST_FIRST = { createdAt: -1, _id: -1 } as const;

const API_POST_FIELDS = ['title', 'content', 'username'] as const;

export function toPostSummary(post: Post, author: string): PostSummary {
  return {
    id: post._id,
    title: post.title,
    content: post.content,
    author,
    created_at: post.createdAt.toISOString(),
  };
}

@Injectable()
export class PostService {
  private readonly logger = new Logger(PostService.name);

  constructor(
    @InjectModel('Post') private readonly postModel: Model<Post>,
    private readonly userService: UserService,
    private readonly notificationService: NotificationService,
    private readonly sequenceService: SequenceService,
  ) {}

  /**
   * Form path: the session user posts. No notifications are sent.
   */
  async createFromForm(
    user: SessionUser,
    createPostDto: CreatePostDto,
  ): Promise<PostSummary> {
    const { title, content } = createPostDto;
    if (!title || !content) {
      throw new AppException(
        ErrorCode.MISSING_FIELDS,
        'Title and content are required',
      );
    }
    if (title.length > TITLE_MAX_LENGTH) {
      throw new AppException(
        ErrorCode.TITLE_TOO_LONG,
        `Title must be at most ${TITLE_MAX_LENGTH} characters`,
      );
    }

    try {
      const created = await this.insertPost(title, content, user.userId, false);
      return toPostSummary(created, user.username);
    } catch (error) {
      this.logger.error(
        `Failed to create post for user ${user.userId}: ${errorMessage(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw new AppException(
        ErrorCode.POST_CREATE_FAILED,
        'Failed to create post. Please try again.',
        HttpStatus.INTERNAL_SERVER_ERROR,
      );
    }
  }

  /**
   * JSON API path: the author is named in the payload, and every other user
   * is notified. The post and the notification batch are committed
   * separately; until the batch is in, the post keeps `fanOutPending` set
   * and reconcilePendingFanOut() can finish the job.
   */
  async createAndNotify(payload: ApiCreatePostDto): Promise<PostSummary> {
    if (Object.keys(payload).length === 0) {
      throw new AppException(ErrorCode.NO_DATA_PROVIDED, 'No data provided');
    }
    const missing = API_POST_FIELDS.filter((field) => !payload[field]);
    const { title, content, username } = payload;
    if (missing.length > 0 || !title || !content || !username) {
      throw new AppException(
        ErrorCode.MISSING_FIELDS,
        'Title, content, and username are required',
        HttpStatus.BAD_REQUEST,
        `Missing fields: ${missing.join(', ')}`,
      );
    }

    try {
      const author = await this.userService.getByUsername(username);
      const created = await this.insertPost(title, content, author._id, true);
      await this.completeFanOut(created, author);
      return toPostSummary(created, author.username);
    } catch (error) {
      // unknown author keeps its 404
      if (isAppException(error)) throw error;
      this.logger.error(
        `Failed to create post for ${username}: ${errorMessage(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw new AppException(
        ErrorCode.POST_CREATE_FAILED,
        'Failed to create post',
        HttpStatus.INTERNAL_SERVER_ERROR,
        errorMessage(error),
      );
    }
  }

  /**
   * Finishes the fan-out of every post whose notification batch never
   * committed.
   */
  async reconcilePendingFanOut(): Promise<FanOutReconcileResult> {
    const pending = await this.postModel
      .find({ fanOutPending: true })
      .sort({ _id: 1 })
      .lean()
      .exec();

    let notified = 0;
    for (const post of pending) {
      const author = await this.userService.findById(post.userId);
      if (!author) {
        this.logger.warn(`Post ${post._id} references missing user ${post.userId}`);
        continue;
      }
      notified += await this.completeFanOut(post, author);
    }

    return { posts: pending.length, notified };
  }

  async listRecentForUser(
    user: SessionUser,
    limit = DASHBOARD_POST_LIMIT,
  ): Promise<PostSummary[]> {
    const posts = await this.postModel
      .find({ userId: user.userId })
      .sort(NEWEST_FIRST)
      .limit(limit)
      .lean()
      .exec();
    return posts.map((post) => toPostSummary(post, user.username));
  }

  async listAll(): Promise<PostSummary[]> {
    const posts = await this.postModel
      .find()
      .sort(NEWEST_FIRST)
      .populate<{ userId: Pick<User, '_id' | 'username'> | null }>('userId', 'username')
      .lean()
      .exec();
    return posts.map((post) => ({
      id: post._id,
      title: post.title,
      content: post.content,
      author: post.userId?.username ?? '',
      created_at: post.createdAt.toISOString(),
    }));
  }

  private async insertPost(
    title: string,
    content: string,
    userId: number,
    fanOutPending: boolean,
  ): Promise<Post> {
    const id = await this.sequenceService.next('post');
    const created = await this.postModel.create({
      _id: id,
      title,
      content,
      userId,
      fanOutPending,
    });
    return created.toObject();
  }

  private async completeFanOut(
    post: Pick<Post, '_id' | 'title'>,
    author: Pick<User, '_id' | 'username'>,
  ): Promise<number> {
    const notified = await this.notificationService.createForPost(post, author);
    await this.postModel
      .updateOne({ _id: post._id }, { $set: { fanOutPending: false } })
      .exec();
    return notified;
  }
}

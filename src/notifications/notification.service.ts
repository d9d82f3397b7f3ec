import { Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { Post } from '../post/interfaces/post.interface';
import { SequenceService } from '../sequence/sequence.service';
import { User } from '../user/interfaces/user.interface';
import { UserService } from '../user/user.service';
import { NotificationDto } from './dto/notification.dto';
import { Notification } from './interfaces/notification.interface';
import { MESSAGE_MAX_LENGTH } from './notification.schema';

export function postNotificationMessage(username: string, title: string): string {
  return `New post by ${username}: ${title}`.slice(0, MESSAGE_MAX_LENGTH);
}

export function toNotificationDto(notification: Notification): NotificationDto {
  return {
    id: notification._id,
    message: notification.message,
    is_read: notification.isRead,
    created_at: notification.createdAt.toISOString(),
    post_id: notification.postId,
  };
}

@Injectable()
export class NotificationService {
  private readonly logger = new Logger(NotificationService.name);

  constructor(
    @InjectModel('Notification')
    private readonly notificationModel: Model<Notification>,
    private readonly userService: UserService,
    private readonly sequenceService: SequenceService,
  ) {}

  /**
   * Fans a post out to every user except its author, one unread
   * notification each, in a single batch insert. Recipients that already
   * hold a notification for the post are skipped, so running it again for
   * the same post only fills the gaps.
   *
   * @returns the number of notifications created
   */
  async createForPost(
    post: Pick<Post, '_id' | 'title'>,
    author: Pick<User, '_id' | 'username'>,
  ): Promise<number> {
    const [recipientIds, notifiedIds] = await Promise.all([
      this.userService.listIdsExcept(author._id),
      this.notificationModel.distinct('userId', { postId: post._id }).exec(),
    ]);

    const alreadyNotified = new Set<number>(notifiedIds.map(Number));
    const pending = recipientIds.filter((id) => !alreadyNotified.has(id));
    if (pending.length === 0) return 0;

    const firstId = await this.sequenceService.reserve('notification', pending.length);
    const message = postNotificationMessage(author.username, post.title);
    await this.notificationModel.insertMany(
      pending.map((userId, index) => ({
        _id: firstId + index,
        userId,
        postId: post._id,
        message,
        isRead: false,
      })),
    );

    this.logger.log(`Post ${post._id} fanned out to ${pending.length} users`);
    return pending.length;
  }

  async listForUser(userId: number): Promise<NotificationDto[]> {
    const notifications = await this.notificationModel
      .find({ userId })
      .sort({ createdAt: -1, _id: -1 })
      .lean()
      .exec();
    return notifications.map(toNotificationDto);
  }

  async listForUsername(username: string): Promise<NotificationDto[]> {
    const user = await this.userService.getByUsername(username);
    return this.listForUser(user._id);
  }

  /**
   * Flips every unread notification of the user to read. Calling it again
   * with nothing unread changes nothing.
   *
   * @returns how many notifications changed
   */
  async markAllRead(userId: number): Promise<number> {
    const result = await this.notificationModel
      .updateMany({ userId, isRead: false }, { $set: { isRead: true } })
      .exec();
    return result.modifiedCount;
  }

  async markAllReadForUsername(username: string): Promise<number> {
    const user = await this.userService.getByUsername(username);
    return this.markAllRead(user._id);
  }
}

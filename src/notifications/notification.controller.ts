import {
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Req,
  Res,
} from '@nestjs/common';
import { ApiExcludeEndpoint, ApiOperation, ApiTags } from '@nestjs/swagger';
import { Request, Response } from 'express';
import { Public } from '../auth/decorators/public.decorator';
import { GetUser } from '../auth/decorators/user.decorator';
import { SessionUser } from '../auth/interfaces/session-user.interface';
import { MessageBody, messageResponse } from '../constants/response';
import { ViewService } from '../views/view.service';
import { NotificationListResponse } from './dto/notification.dto';
import { NotificationService } from './notification.service';

// Both prefixes stay reachable; they share one handler per operation.
const PUBLIC_NOTIFICATION_PATHS = [
  'api/public/notifications/:username',
  'api/public/notifications_21201532/:username',
];

@ApiTags('Notifications')
@Controller()
export class NotificationController {
  constructor(
    private readonly notificationService: NotificationService,
    private readonly viewService: ViewService,
  ) {}

  @Get('notifications')
  @ApiExcludeEndpoint()
  async page(
    @GetUser() user: SessionUser,
    @Req() req: Request,
    @Res() res: Response,
  ) {
    const notifications = await this.notificationService.listForUser(user.userId);
    res.send(
      this.viewService.renderPage(req, 'notifications', {
        pageTitle: 'Notifications',
        notifications,
      }),
    );
  }

  @Public()
  @Get(PUBLIC_NOTIFICATION_PATHS)
  @ApiOperation({ summary: 'List notifications for a user, newest first' })
  async listForUsername(
    @Param('username') username: string,
  ): Promise<NotificationListResponse> {
    return {
      notifications: await this.notificationService.listForUsername(username),
    };
  }

  @Public()
  @Post(PUBLIC_NOTIFICATION_PATHS.map((path) => `${path}/mark-read`))
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Mark all notifications of a user as read' })
  async markAllRead(@Param('username') username: string): Promise<MessageBody> {
    await this.notificationService.markAllReadForUsername(username);
    return messageResponse('Notifications marked as read');
  }
}

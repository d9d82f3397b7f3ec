import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { NotificationModule } from '../notifications/notification.module';
import { SequenceModule } from '../sequence/sequence.module';
import { UserModule } from '../user/user.module';
import { PostApiController } from './post.api.controller';
import { PostController } from './post.controller';
import { PostSchema } from './schemas/post.schema';
import { PostService } from './post.service';

@Module({
  imports: [
    MongooseModule.forFeature([{ name: 'Post', schema: PostSchema }]),
    UserModule,
    NotificationModule,
    SequenceModule,
  ],
  controllers: [PostController, PostApiController],
  providers: [PostService],
  exports: [PostService],
})
export class PostModule {}

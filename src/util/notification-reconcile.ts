import 'reflect-metadata';
import 'dotenv/config';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '../app.module';
import { PostService } from '../post/post.service';

/**
 * Completes the notification fan-out of API posts whose batch never
 * committed (posts still flagged `fanOutPending`).
 */
async function run() {
  const logger = new Logger('NotificationReconcile');
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['log', 'warn', 'error'],
  });

  try {
    const result = await app.get(PostService).reconcilePendingFanOut();
    logger.log(
      `Notification reconciliation results (posts: ${result.posts}, notifications created: ${result.notified})`,
    );
  } finally {
    await app.close();
  }
}

run().catch((err) => {
  console.error('Notification reconciliation failed:', err);
  process.exit(1);
});

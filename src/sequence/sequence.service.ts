import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { Counter } from './counter.schema';

export type SequenceName = 'user' | 'post' | 'notification';

/**
 * Hands out the numeric ids used as `_id` by users, posts and notifications.
 */
@Injectable()
export class SequenceService {
  constructor(
    @InjectModel('Counter') private readonly counterModel: Model<Counter>,
  ) {}

  /**
   * Reserves `count` consecutive ids and returns the first one.
   */
  async reserve(name: SequenceName, count = 1): Promise<number> {
    if (!Number.isInteger(count) || count < 1) {
      throw new Error(`Cannot reserve ${count} ids from "${name}"`);
    }
    const counter = await this.counterModel
      .findOneAndUpdate(
        { _id: name },
        { $inc: { seq: count } },
        { new: true, upsert: true },
      )
      .lean()
      .exec();
    if (!counter) {
      throw new Error(`Counter "${name}" could not be incremented`);
    }
    return counter.seq - count + 1;
  }

  next(name: SequenceName): Promise<number> {
    return this.reserve(name, 1);
  }
}

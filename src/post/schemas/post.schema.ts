import { Schema } from 'mongoose';
import { Post } from '../interfaces/post.interface';

export const TITLE_MAX_LENGTH = 200;

export const PostSchema = new Schema<Post>(
  {
    _id: { type: Number, required: true },
    title: { type: String, required: true, maxlength: TITLE_MAX_LENGTH },
    content: { type: String, required: true },
    userId: { type: Number, ref: 'User', required: true, index: true },
    fanOutPending: { type: Boolean, required: true, default: false },
  },
  {
    versionKey: false,
    timestamps: { createdAt: true, updatedAt: false },
  },
);

PostSchema.index({ createdAt: -1, _id: -1 });
PostSchema.index(
  { fanOutPending: 1 },
  { partialFilterExpression: { fanOutPending: true } },
);

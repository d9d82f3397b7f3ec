import { Schema } from 'mongoose';
import { Notification } from './interfaces/notification.interface';

export const MESSAGE_MAX_LENGTH = 500;

export const NotificationSchema = new Schema<Notification>(
  {
    _id: { type: Number, required: true },
    userId: { type: Number, ref: 'User', required: true, index: true },
    postId: { type: Number, ref: 'Post', required: true },
    message: { type: String, required: true, maxlength: MESSAGE_MAX_LENGTH },
    isRead: { type: Boolean, required: true, default: false },
  },
  {
    versionKey: false,
    timestamps: { createdAt: true, updatedAt: false },
  },
);

// one notification per recipient and post
NotificationSchema.index({ userId: 1, postId: 1 }, { unique: true });
NotificationSchema.index({ userId: 1, createdAt: -1 });

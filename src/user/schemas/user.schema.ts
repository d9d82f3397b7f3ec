import { Schema } from 'mongoose';
import isEmail from 'validator/lib/isEmail';
import { User } from '../interfaces/user.interface';

export const USERNAME_MAX_LENGTH = 50;
export const EMAIL_MAX_LENGTH = 100;

function transformValue(doc: unknown, ret: { [key: string]: unknown }) {
  delete ret.passwordHash;
  delete ret.__v;
  return ret;
}

export const UserSchema = new Schema<User>(
  {
    _id: { type: Number, required: true },

    username: {
      type: String,
      required: true,
      unique: true,
      maxlength: USERNAME_MAX_LENGTH,
    },

    email: {
      type: String,
      required: true,
      unique: true,
      maxlength: EMAIL_MAX_LENGTH,
      validate: {
        validator: (value: string) => isEmail(value),
        message: 'Please provide a valid email address',
      },
    },

    passwordHash: { type: String, required: true },
  },
  {
    toJSON: {
      virtuals: false,
      transform: transformValue,
    },
    versionKey: false,
    timestamps: { createdAt: true, updatedAt: false },
  },
);

import { HttpStatus, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectModel } from '@nestjs/mongoose';
import * as bcrypt from 'bcrypt';
import { Model } from 'mongoose';
import isEmail from 'validator/lib/isEmail';
import {
  AppException,
  errorMessage,
  isDuplicateKeyError,
} from '../common/exceptions/app.exception';
import { AppConfig } from '../config/configuration';
import { ErrorCode } from '../constants/error-codes';
import { SequenceService } from '../sequence/sequence.service';
import { CreateUserDto } from './dto/create-user.dto';
import { User, UserSummary } from './interfaces/user.interface';
import {
  EMAIL_MAX_LENGTH,
  USERNAME_MAX_LENGTH,
} from './schemas/user.schema';

export function toUserSummary(user: User): UserSummary {
  return {
    id: user._id,
    username: user.username,
    email: user.email,
    created_at: user.createdAt.toISOString(),
  };
}

@Injectable()
export class UserService {
  private readonly logger = new Logger(UserService.name);

  constructor(
    @InjectModel('User') private readonly userModel: Model<User>,
    private readonly sequenceService: SequenceService,
    private readonly configService: ConfigService<AppConfig, true>,
  ) {}

  /**
   * Registers a user. Checks run in order and stop at the first failure:
   * password confirmation, then username, then email, then the shape of
   * the username and email.
   */
  async register(createUserDto: CreateUserDto): Promise<UserSummary> {
    const { username, email, password, confirm_password } = createUserDto;

    if (password !== confirm_password) {
      throw new AppException(
        ErrorCode.PASSWORDS_DO_NOT_MATCH,
        'Passwords do not match',
      );
    }
    if (await this.userModel.exists({ username }).exec()) {
      throw new AppException(
        ErrorCode.USERNAME_TAKEN,
        'Username already exists',
        HttpStatus.CONFLICT,
      );
    }
    if (await this.userModel.exists({ email }).exec()) {
      throw new AppException(
        ErrorCode.EMAIL_TAKEN,
        'Email already exists',
        HttpStatus.CONFLICT,
      );
    }
    if (!username || username.length > USERNAME_MAX_LENGTH) {
      throw new AppException(
        ErrorCode.INVALID_USERNAME,
        `Username must be 1 to ${USERNAME_MAX_LENGTH} characters`,
      );
    }
    if (email.length > EMAIL_MAX_LENGTH || !isEmail(email)) {
      throw new AppException(ErrorCode.INVALID_EMAIL, 'Invalid email address');
    }

    const passwordHash = await bcrypt.hash(
      password,
      this.configService.get('bcryptRounds', { infer: true }),
    );

    try {
      const id = await this.sequenceService.next('user');
      const created = await this.userModel.create({
        _id: id,
        username,
        email,
        passwordHash,
      });
      this.logger.log(`Registered user ${id} (${username})`);
      return toUserSummary(created);
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        this.logger.warn(`Registration raced on a unique field for ${username}`);
      } else {
        this.logger.error(
          `Registration failed for ${username}: ${errorMessage(error)}`,
          error instanceof Error ? error.stack : undefined,
        );
      }
      throw new AppException(
        ErrorCode.REGISTRATION_FAILED,
        'Registration failed. Please try again.',
        HttpStatus.INTERNAL_SERVER_ERROR,
      );
    }
  }

  findByUsername(username: string): Promise<User | null> {
    return this.userModel.findOne({ username }).lean().exec();
  }

  findById(id: number): Promise<User | null> {
    return this.userModel.findById(id).lean().exec();
  }

  async getByUsername(username: string): Promise<User> {
    const user = await this.findByUsername(username);
    if (!user) {
      throw new AppException(
        ErrorCode.USER_NOT_FOUND,
        'User not found',
        HttpStatus.NOT_FOUND,
      );
    }
    return user;
  }

  async listAll(): Promise<UserSummary[]> {
    const users = await this.userModel.find().sort({ _id: 1 }).lean().exec();
    return users.map(toUserSummary);
  }

  /** Ids of every user except `excludedId`, ascending. */
  async listIdsExcept(excludedId: number): Promise<number[]> {
    const users = await this.userModel
      .find({ _id: { $ne: excludedId } })
      .select('_id')
      .sort({ _id: 1 })
      .lean()
      .exec();
    return users.map((user) => user._id);
  }
}

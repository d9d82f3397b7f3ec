import { HttpStatus } from '@nestjs/common';
import { AppException } from '../common/exceptions/app.exception';
import { mockQuery } from '../common/testing/mock-query';
import { ErrorCode } from '../constants/error-codes';
import { NotificationService } from '../notifications/notification.service';
import { PostService } from './post.service';

const createdAt = new Date('2024-03-01T10:00:00.000Z');
const alice = {
  _id: 1,
  username: 'alice',
  email: 'alice@x.com',
  passwordHash: 'hash',
  createdAt,
};

function setup() {
  const postModel: any = {
    create: jest.fn(async (doc: Record<string, unknown>) => ({
      toObject: () => ({ ...doc, createdAt }),
    })),
    updateOne: jest.fn(() => mockQuery({ modifiedCount: 1 })),
    find: jest.fn(),
  };
  const userService: any = {
    getByUsername: jest.fn(async () => alice),
    findById: jest.fn(),
    listIdsExcept: jest.fn(async () => [2]),
  };
  const sequenceService: any = {
    next: jest.fn(async () => 7),
    reserve: jest.fn(async () => 20),
  };
  const notificationModel: any = {
    distinct: jest.fn(() => mockQuery([])),
    insertMany: jest.fn(async (docs: unknown[]) => docs),
  };
  const notificationService = new NotificationService(
    notificationModel,
    userService,
    sequenceService,
  );
  const service = new PostService(
    postModel,
    userService,
    notificationService,
    sequenceService,
  );
  return { service, postModel, userService, notificationModel, notificationService };
}

async function expectAppException(promise: Promise<unknown>) {
  try {
    await promise;
  } catch (err) {
    expect(err).toBeInstanceOf(AppException);
    return err as AppException;
  }
  throw new Error('Expected an AppException');
}

describe('PostService', () => {
  describe('createAndNotify', () => {
    it('creates the post, notifies the other user, then clears the pending flag', async () => {
      const { service, postModel, notificationModel } = setup();

      const post = await service.createAndNotify({ title: 'T', content: 'C', username: 'alice' });

      expect(post).toEqual({
        id: 7,
        title: 'T',
        content: 'C',
        author: 'alice',
        created_at: '2024-03-01T10:00:00.000Z',
      });
      expect(postModel.create).toHaveBeenCalledWith({
        _id: 7,
        title: 'T',
        content: 'C',
        userId: 1,
        fanOutPending: true,
      });
      expect(notificationModel.insertMany).toHaveBeenCalledWith([
        { _id: 20, userId: 2, postId: 7, message: 'New post by alice: T', isRead: false },
      ]);
      expect(postModel.updateOne).toHaveBeenCalledWith(
        { _id: 7 },
        { $set: { fanOutPending: false } },
      );
      expect(postModel.create.mock.invocationCallOrder[0]).toBeLessThan(
        notificationModel.insertMany.mock.invocationCallOrder[0],
      );
      expect(notificationModel.insertMany.mock.invocationCallOrder[0]).toBeLessThan(
        postModel.updateOne.mock.invocationCallOrder[0],
      );
    });

    it('rejects an empty payload', async () => {
      const { service, postModel } = setup();

      const err = await expectAppException(service.createAndNotify({}));

      expect(err.getStatus()).toBe(HttpStatus.BAD_REQUEST);
      expect(err.getBody()).toEqual({
        code: ErrorCode.NO_DATA_PROVIDED,
        message: 'No data provided',
        details: null,
      });
      expect(postModel.create).not.toHaveBeenCalled();
    });

    it('lists every missing field', async () => {
      const { service, userService } = setup();

      const err = await expectAppException(
        service.createAndNotify({ title: 'T', content: '' }),
      );

      expect(err.getStatus()).toBe(HttpStatus.BAD_REQUEST);
      expect(err.getBody()).toEqual({
        code: ErrorCode.MISSING_FIELDS,
        message: 'Title, content, and username are required',
        details: 'Missing fields: content, username',
      });
      expect(userService.getByUsername).not.toHaveBeenCalled();
    });

    it('answers 404 for an unknown author', async () => {
      const { service, userService, postModel } = setup();
      userService.getByUsername.mockRejectedValue(
        new AppException(ErrorCode.USER_NOT_FOUND, 'User not found', HttpStatus.NOT_FOUND),
      );

      const err = await expectAppException(
        service.createAndNotify({ title: 'T', content: 'C', username: 'ghost' }),
      );

      expect(err.getStatus()).toBe(HttpStatus.NOT_FOUND);
      expect(postModel.create).not.toHaveBeenCalled();
    });

    it('reports a failed author lookup as a creation failure with details', async () => {
      const { service, userService, postModel } = setup();
      userService.getByUsername.mockRejectedValue(new Error('connection reset'));

      const err = await expectAppException(
        service.createAndNotify({ title: 'T', content: 'C', username: 'alice' }),
      );

      expect(err.getStatus()).toBe(HttpStatus.INTERNAL_SERVER_ERROR);
      expect(err.getBody()).toEqual({
        code: ErrorCode.POST_CREATE_FAILED,
        message: 'Failed to create post',
        details: 'connection reset',
      });
      expect(postModel.create).not.toHaveBeenCalled();
    });

    it('leaves the post pending when the notification batch fails', async () => {
      const { service, postModel, notificationModel } = setup();
      notificationModel.insertMany.mockRejectedValue(new Error('write conflict'));

      const err = await expectAppException(
        service.createAndNotify({ title: 'T', content: 'C', username: 'alice' }),
      );

      expect(err.getStatus()).toBe(HttpStatus.INTERNAL_SERVER_ERROR);
      expect(err.getBody()).toEqual({
        code: ErrorCode.POST_CREATE_FAILED,
        message: 'Failed to create post',
        details: 'write conflict',
      });
      expect(postModel.create).toHaveBeenCalledWith(
        expect.objectContaining({ _id: 7, fanOutPending: true }),
      );
      expect(postModel.updateOne).not.toHaveBeenCalled();
    });
  });

  describe('createFromForm', () => {
    const session = { userId: 1, username: 'alice' };

    it('creates a post without notifying anyone', async () => {
      const { service, postModel, notificationModel } = setup();

      const post = await service.createFromForm(session, { title: 'T', content: 'C' });

      expect(post.author).toBe('alice');
      expect(postModel.create).toHaveBeenCalledWith({
        _id: 7,
        title: 'T',
        content: 'C',
        userId: 1,
        fanOutPending: false,
      });
      expect(notificationModel.insertMany).not.toHaveBeenCalled();
    });

    it('requires both title and content', async () => {
      const { service, postModel } = setup();

      const err = await expectAppException(
        service.createFromForm(session, { title: '', content: 'C' }),
      );

      expect(err.message).toBe('Title and content are required');
      expect(postModel.create).not.toHaveBeenCalled();
    });

    it('rejects a title longer than 200 characters', async () => {
      const { service, postModel } = setup();

      const err = await expectAppException(
        service.createFromForm(session, { title: 'x'.repeat(201), content: 'C' }),
      );

      expect(err.getStatus()).toBe(HttpStatus.BAD_REQUEST);
      expect(err.getBody()).toEqual({
        code: ErrorCode.TITLE_TOO_LONG,
        message: 'Title must be at most 200 characters',
        details: null,
      });
      expect(postModel.create).not.toHaveBeenCalled();
    });

    it('reports persistence failures generically', async () => {
      const { service, postModel } = setup();
      postModel.create.mockRejectedValue(new Error('disk full'));

      const err = await expectAppException(
        service.createFromForm(session, { title: 'T', content: 'C' }),
      );

      expect(err.getStatus()).toBe(HttpStatus.INTERNAL_SERVER_ERROR);
      expect(err.getBody()).toEqual({
        code: ErrorCode.POST_CREATE_FAILED,
        message: 'Failed to create post. Please try again.',
        details: null,
      });
    });
  });

  it('reconciles pending fan-outs and skips posts without an author', async () => {
    const { service, postModel, userService, notificationService } = setup();
    postModel.find.mockReturnValue(
      mockQuery([
        { _id: 7, title: 'T', content: 'C', userId: 1, fanOutPending: true, createdAt },
        { _id: 8, title: 'U', content: 'D', userId: 99, fanOutPending: true, createdAt },
      ]),
    );
    userService.findById.mockImplementation(async (id: number) => (id === 1 ? alice : null));
    const createForPost = jest.spyOn(notificationService, 'createForPost').mockResolvedValue(2);

    const result = await service.reconcilePendingFanOut();

    expect(result).toEqual({ posts: 2, notified: 2 });
    expect(postModel.find).toHaveBeenCalledWith({ fanOutPending: true });
    expect(createForPost).toHaveBeenCalledTimes(1);
    expect(createForPost).toHaveBeenCalledWith(expect.objectContaining({ _id: 7 }), alice);
    expect(postModel.updateOne).toHaveBeenCalledTimes(1);
    expect(postModel.updateOne).toHaveBeenCalledWith(
      { _id: 7 },
      { $set: { fanOutPending: false } },
    );
  });

  it('lists the newest five posts of the session user', async () => {
    const { service, postModel } = setup();
    const query = mockQuery([
      { _id: 9, title: 'B', content: 'b', userId: 1, fanOutPending: false, createdAt },
    ]);
    postModel.find.mockReturnValue(query);

    const posts = await service.listRecentForUser({ userId: 1, username: 'alice' });

    expect(postModel.find).toHaveBeenCalledWith({ userId: 1 });
    expect(query.sort).toHaveBeenCalledWith({ createdAt: -1, _id: -1 });
    expect(query.limit).toHaveBeenCalledWith(5);
    expect(posts).toEqual([
      { id: 9, title: 'B', content: 'b', author: 'alice', created_at: '2024-03-01T10:00:00.000Z' },
    ]);
  });

  it('lists all posts with their authors', async () => {
    const { service, postModel } = setup();
    const query = mockQuery([
      { _id: 9, title: 'B', content: 'b', userId: { _id: 2, username: 'bob' }, createdAt },
      { _id: 8, title: 'A', content: 'a', userId: null, createdAt },
    ]);
    postModel.find.mockReturnValue(query);

    const posts = await service.listAll();

    expect(query.populate).toHaveBeenCalledWith('userId', 'username');
    expect(posts.map((post) => post.author)).toEqual(['bob', '']);
  });
});

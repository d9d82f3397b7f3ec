import { SequenceService } from './sequence.service';

function makeLeanQuery<T>(value: T) {
  return {
    lean: () => ({
      exec: async () => value,
    }),
  };
}

describe('SequenceService', () => {
  it('returns the incremented value for a single id', async () => {
    const counterModel: any = {
      findOneAndUpdate: jest.fn(() => makeLeanQuery({ _id: 'post', seq: 7 })),
    };
    const service = new SequenceService(counterModel);

    await expect(service.next('post')).resolves.toBe(7);
    expect(counterModel.findOneAndUpdate).toHaveBeenCalledWith(
      { _id: 'post' },
      { $inc: { seq: 1 } },
      { new: true, upsert: true },
    );
  });

  it('returns the first id of a reserved block', async () => {
    const counterModel: any = {
      findOneAndUpdate: jest.fn(() => makeLeanQuery({ _id: 'notification', seq: 13 })),
    };
    const service = new SequenceService(counterModel);

    await expect(service.reserve('notification', 3)).resolves.toBe(11);
    expect(counterModel.findOneAndUpdate).toHaveBeenCalledWith(
      { _id: 'notification' },
      { $inc: { seq: 3 } },
      { new: true, upsert: true },
    );
  });

  it('refuses an empty block', async () => {
    const counterModel: any = { findOneAndUpdate: jest.fn() };
    const service = new SequenceService(counterModel);

    await expect(service.reserve('user', 0)).rejects.toThrow(
      'Cannot reserve 0 ids from "user"',
    );
    expect(counterModel.findOneAndUpdate).not.toHaveBeenCalled();
  });
});

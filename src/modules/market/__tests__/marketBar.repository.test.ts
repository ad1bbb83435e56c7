import { describe, it, expect, beforeEach, vi } from 'vitest';
import { MongoBarRepository } from '../marketBar.repository';
import { ValidatedBar } from '../market.types';
import { PartialBatchError } from '../../../common/errors/backfillErrors';

const { bulkWrite, findOne, runInTransaction } = vi.hoisted(() => ({
  bulkWrite: vi.fn(),
  findOne: vi.fn(),
  runInTransaction: vi.fn(),
}));

vi.mock('../marketBar.model', () => ({ default: { bulkWrite, findOne } }));
vi.mock('../../../common/utils/transaction', () => ({ runInTransaction }));

const session = { id: 'session-1' };

const makeBar = (iso: string): ValidatedBar => ({
  symbol: 'AAPL',
  timestamp: new Date(iso),
  date: iso.slice(0, 10),
  open: 170,
  high: 171,
  low: 169,
  close: 170.5,
  volume: 1200,
});

describe('MongoBarRepository', () => {
  let repository: MongoBarRepository;

  beforeEach(() => {
    vi.clearAllMocks();
    runInTransaction.mockImplementation(async (callback: (s: unknown) => Promise<unknown>) => callback(session));
    repository = new MongoBarRepository();
  });

  describe('insertIfAbsent', () => {
    it('writes one insert-only upsert per bar inside the transaction', async () => {
      bulkWrite.mockResolvedValue({ upsertedCount: 1, modifiedCount: 0, matchedCount: 1 });
      const first = makeBar('2024-03-15T09:30:00Z');
      const second = makeBar('2024-03-15T09:31:00Z');

      const inserted = await repository.insertIfAbsent([first, second]);

      expect(inserted).toBe(1);
      expect(runInTransaction).toHaveBeenCalledTimes(1);
      expect(bulkWrite).toHaveBeenCalledWith(
        [
          {
            updateOne: {
              filter: { symbol: 'AAPL', timestamp: first.timestamp },
              update: {
                $setOnInsert: {
                  symbol: 'AAPL',
                  timestamp: first.timestamp,
                  date: '2024-03-15',
                  open: 170,
                  high: 171,
                  low: 169,
                  close: 170.5,
                  volume: 1200,
                },
              },
              upsert: true,
            },
          },
          expect.objectContaining({
            updateOne: expect.objectContaining({ filter: { symbol: 'AAPL', timestamp: second.timestamp }, upsert: true }),
          }),
        ],
        { ordered: true, session }
      );
    });

    it('returns 0 for an empty batch without writing', async () => {
      await expect(repository.insertIfAbsent([])).resolves.toBe(0);
      expect(runInTransaction).not.toHaveBeenCalled();
      expect(bulkWrite).not.toHaveBeenCalled();
    });

    it('propagates a failed transactional write', async () => {
      bulkWrite.mockRejectedValue(new Error('E11000 duplicate key'));

      await expect(repository.insertIfAbsent([makeBar('2024-03-15T09:30:00Z')])).rejects.toThrow('E11000 duplicate key');
    });

    it('writes without a session on a standalone server', async () => {
      runInTransaction.mockImplementation(async (callback: (s: unknown) => Promise<unknown>) => callback(null));
      bulkWrite.mockResolvedValue({ upsertedCount: 1 });

      await repository.insertIfAbsent([makeBar('2024-03-15T09:30:00Z')]);

      expect(bulkWrite.mock.calls[0][1]).toEqual({ ordered: true });
    });

    it('reports rows kept by a session-less write that failed part way', async () => {
      runInTransaction.mockImplementation(async (callback: (s: unknown) => Promise<unknown>) => callback(null));
      bulkWrite.mockRejectedValue(Object.assign(new Error('write failed'), { upsertedCount: 2 }));

      const result = repository.insertIfAbsent([
        makeBar('2024-03-15T09:30:00Z'),
        makeBar('2024-03-15T09:31:00Z'),
        makeBar('2024-03-15T09:32:00Z'),
      ]);

      await expect(result).rejects.toBeInstanceOf(PartialBatchError);
      await expect(result).rejects.toMatchObject({ written: 2 });
    });

    it('rethrows a session-less failure that stored nothing', async () => {
      runInTransaction.mockImplementation(async (callback: (s: unknown) => Promise<unknown>) => callback(null));
      bulkWrite.mockRejectedValue(new Error('server selection timed out'));

      const result = repository.insertIfAbsent([makeBar('2024-03-15T09:30:00Z')]);

      await expect(result).rejects.not.toBeInstanceOf(PartialBatchError);
      await expect(result).rejects.toThrow('server selection timed out');
    });
  });

  describe('findLatestDate', () => {
    const chain = (row: { date: string } | null) => {
      const query = { sort: vi.fn(), select: vi.fn(), lean: vi.fn() };
      query.sort.mockReturnValue(query);
      query.select.mockReturnValue(query);
      query.lean.mockResolvedValue(row);
      findOne.mockReturnValue(query);
      return query;
    };

    it('reads the date of the newest bar for the upper-cased symbol', async () => {
      const query = chain({ date: '2024-03-12' });

      await expect(repository.findLatestDate('aapl')).resolves.toBe('2024-03-12');
      expect(findOne).toHaveBeenCalledWith({ symbol: 'AAPL' });
      expect(query.sort).toHaveBeenCalledWith({ timestamp: -1 });
      expect(query.select).toHaveBeenCalledWith('date');
    });

    it('returns null when the symbol has no bars', async () => {
      chain(null);

      await expect(repository.findLatestDate('MSFT')).resolves.toBeNull();
    });
  });
});

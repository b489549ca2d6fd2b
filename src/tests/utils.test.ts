import { StorageError } from '../errors';
import { loadEnv } from '../env';
import { parseCalendarDate, parseRange } from '../utils/dates';
import { isValidEmail } from '../utils/email';
import { formatId, nextId } from '../utils/id';
import { WriteLock } from '../utils/lock';
import { hashPassword, verifyPassword } from '../utils/password';
import { withRetry } from '../utils/retry';
import { caught, rejected } from './__mocks__/helpers';

describe('ids', () => {
  test('first id of an empty collection', () => {
    expect(nextId('rentals', [])).toBe('A001');
    expect(nextId('users', [])).toBe('U001');
    expect(nextId('vehicles', [])).toBe('UID001');
  });

  test('one past the highest suffix, gaps are not reused', () => {
    expect(nextId('rentals', [{ id: 'A001' }, { id: 'A007' }, { id: 'A003' }])).toBe('A008');
    expect(nextId('vehicles', [{ id: 'UID009' }, { id: 'UID010' }])).toBe('UID011');
  });

  test('ids with another prefix or a non-numeric suffix are ignored', () => {
    expect(nextId('users', [{ id: 'U001' }, { id: 'UID005' }, { id: 'GUEST' }])).toBe('U002');
  });

  test('referenced ids count towards the next id', () => {
    expect(nextId('users', [{ id: 'U001' }], ['U001', 'U005', 'GUEST'])).toBe('U006');
    expect(nextId('vehicles', [], ['UID003'])).toBe('UID004');
  });

  test('padding stops at three digits', () => {
    expect(formatId('rentals', 1234)).toBe('A1234');
    expect(formatId('vehicles', 42)).toBe('UID042');
  });
});

describe('dates', () => {
  test('parses real calendar days only', () => {
    expect(parseCalendarDate('2024-02-29')).not.toBeNull();
    expect(parseCalendarDate('2023-02-29')).toBeNull();
    expect(parseCalendarDate('2024-1-5')).toBeNull();
    expect(parseCalendarDate('2024-13-01')).toBeNull();
  });

  test('counts calendar days across month ends', () => {
    expect(parseRange('2024-02-28', '2024-03-01')).toEqual({ startDate: '2024-02-28', endDate: '2024-03-01', days: 2 });
    expect(parseRange('2024-12-31', '2025-01-01').days).toBe(1);
  });

  test('format errors win over an inverted range', () => {
    expect(caught(() => parseRange('2024-01-05', 'tomorrow'))).toMatchObject({ code: 'bad_date_format' });
  });

  test('same-day ranges are inverted', () => {
    expect(caught(() => parseRange('2024-01-05', '2024-01-05'))).toMatchObject({ code: 'inverted_range' });
  });
});

describe('email', () => {
  test.each([
    ['a@b.com', true],
    ['first.last+tag@mail.example.org', true],
    ['no-at-sign.com', false],
    ['a@b', false],
    ['a b@c.com', false]
  ])('%s -> %s', (email, ok) => {
    expect(isValidEmail(email)).toBe(ok);
  });
});

describe('passwords', () => {
  test('a hash verifies only its own password', () => {
    const stored = hashPassword('test-secret');
    expect(stored.startsWith('scrypt$')).toBe(true);
    expect(verifyPassword('test-secret', stored)).toBe(true);
    expect(verifyPassword('other-secret', stored)).toBe(false);
  });

  test('the same password hashes differently each time', () => {
    expect(hashPassword('test-secret')).not.toBe(hashPassword('test-secret'));
  });

  test('unknown hash formats never verify', () => {
    expect(verifyPassword('test-secret', 'plain:test-secret')).toBe(false);
    expect(verifyPassword('test-secret', 'scrypt$$')).toBe(false);
  });
});

describe('WriteLock', () => {
  test('runs work one at a time in call order', async () => {
    const lock = new WriteLock();
    const events: string[] = [];
    const step = (name: string, ms: number) => () =>
      new Promise<string>((resolve) => {
        events.push(`start ${name}`);
        setTimeout(() => {
          events.push(`end ${name}`);
          resolve(name);
        }, ms);
      });

    const results = await Promise.all([lock.run(step('a', 20)), lock.run(step('b', 0)), lock.run(step('c', 5))]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(events).toEqual(['start a', 'end a', 'start b', 'end b', 'start c', 'end c']);
  });

  test('a failed run does not block the next one', async () => {
    const lock = new WriteLock();
    const failed = lock.run(async () => {
      throw new Error('boom');
    });
    const next = lock.run(async () => 'ok');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });
});

describe('withRetry', () => {
  let warn: jest.SpyInstance;
  beforeEach(() => {
    warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });
  afterEach(() => warn.mockRestore());

  test('retries a transient failure', async () => {
    let calls = 0;
    const result = await withRetry('read vehicles', { retries: 2, delayMs: 0 }, async () => {
      calls++;
      if (calls < 2) throw new Error('EBUSY');
      return 'data';
    });

    expect(result).toBe('data');
    expect(calls).toBe(2);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  test('gives up after the configured retries with a StorageError', async () => {
    let calls = 0;
    const err = await rejected(
      withRetry('write rentals', { retries: 2, delayMs: 0 }, async () => {
        calls++;
        throw new Error('EIO');
      })
    );

    expect(calls).toBe(3);
    expect(err).toBeInstanceOf(StorageError);
    expect(err).toMatchObject({ message: 'write rentals failed: EIO', code: 'storage_error' });
  });
});

describe('loadEnv', () => {
  test('defaults', () => {
    expect(loadEnv({})).toEqual({
      PORT: 3000,
      STORE: { DRIVER: 'file', DATA_DIR: './data', DATABASE_URL: undefined, RETRIES: 2, RETRY_DELAY_MS: 50 }
    });
  });

  test('coerces numbers from the environment', () => {
    const env = loadEnv({ PORT: '8080', STORE_DRIVER: 'memory', STORE_RETRIES: '0' });
    expect(env.PORT).toBe(8080);
    expect(env.STORE.DRIVER).toBe('memory');
    expect(env.STORE.RETRIES).toBe(0);
  });

  test('postgres needs a database url', () => {
    expect(() => loadEnv({ STORE_DRIVER: 'postgres' })).toThrow('DATABASE_URL is required when STORE_DRIVER=postgres');
    expect(loadEnv({ STORE_DRIVER: 'postgres', DATABASE_URL: 'postgres://localhost:5432/rentals' }).STORE.DATABASE_URL).toBe(
      'postgres://localhost:5432/rentals'
    );
  });
});

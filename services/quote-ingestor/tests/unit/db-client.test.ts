import { describe, it, expect, vi, beforeEach } from 'vitest';

const pgMock = vi.hoisted(() => {
  const client = {
    connect: vi.fn(),
    end: vi.fn(),
    on: vi.fn(),
    query: vi.fn(),
  };
  return { client, Client: vi.fn(function () { return client; }) };
});

vi.mock('pg', () => ({ default: { Client: pgMock.Client } }));

import { withDbClient } from '../../src/db/client.js';
import { StoreError } from '../../src/errors.js';
import { silentLogger } from '../../src/logger.js';

const { client, Client } = pgMock;

describe('db/client withDbClient', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    client.connect.mockResolvedValue(undefined);
    client.end.mockResolvedValue(undefined);
  });

  it('opens one connection, hands it to the callback and closes it', async () => {
    const res = await withDbClient('postgres://u@h/db', silentLogger, async (db) => {
      expect(db).toBe(client);
      return 'done';
    });

    expect(res).toBe('done');
    expect(Client).toHaveBeenCalledWith({ connectionString: 'postgres://u@h/db' });
    expect(client.connect).toHaveBeenCalledTimes(1);
    expect(client.end).toHaveBeenCalledTimes(1);
    expect(client.on).toHaveBeenCalledWith('error', expect.any(Function));
  });

  it('closes the connection and rethrows when the callback fails', async () => {
    const boom = new Error('boom');

    await expect(withDbClient('postgres://u@h/db', silentLogger, async () => { throw boom; })).rejects.toBe(boom);
    expect(client.end).toHaveBeenCalledTimes(1);
  });

  it('keeps the callback error when closing also fails', async () => {
    const boom = new Error('boom');
    client.end.mockRejectedValue(new Error('socket closed'));

    await expect(withDbClient('postgres://u@h/db', silentLogger, async () => { throw boom; })).rejects.toBe(boom);
  });

  it('wraps connect failures in StoreError without running the callback', async () => {
    client.connect.mockRejectedValue(new Error('ECONNREFUSED'));
    const fn = vi.fn();

    const p = withDbClient('postgres://u@h/db', silentLogger, fn);
    await expect(p).rejects.toBeInstanceOf(StoreError);
    await expect(p).rejects.toMatchObject({ op: 'connect' });
    expect(fn).not.toHaveBeenCalled();
  });

  it('reports a close failure after a successful run', async () => {
    client.end.mockRejectedValue(new Error('socket closed'));

    await expect(withDbClient('postgres://u@h/db', silentLogger, async () => 1)).rejects.toMatchObject({ op: 'close' });
  });
});

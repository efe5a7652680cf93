import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Mock } from 'vitest';

vi.mock('../../src/repositories/quotes.repo.js', () => {
  return {
    insertQuoteIfAbsent: vi.fn(),
    maxQuoteTimestamp: vi.fn(),
  };
});

vi.mock('../../src/repositories/stocks.repo.js', () => {
  return {
    findStockIdByTicker: vi.fn(),
    insertStock: vi.fn(),
    setLastUpdate: vi.fn(),
  };
});

import { refreshLastUpdate } from '../../src/services/freshness.service.js';
import { maxQuoteTimestamp } from '../../src/repositories/quotes.repo.js';
import { setLastUpdate } from '../../src/repositories/stocks.repo.js';
import { silentLogger } from '../../src/logger.js';

const ctx = { db: { query: vi.fn() }, logger: silentLogger };

describe('freshness.service', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('moves lastUpdate to the newest quote on record', async () => {
    const maxTs = new Date('2024-03-15T13:32:00Z');
    (maxQuoteTimestamp as unknown as Mock).mockResolvedValue(maxTs);

    await expect(refreshLastUpdate(ctx, 7)).resolves.toEqual(maxTs);
    expect(maxQuoteTimestamp).toHaveBeenCalledWith(ctx, 7);
    expect(setLastUpdate).toHaveBeenCalledWith(ctx, 7, maxTs);
  });

  it('leaves the marker unset when the stock has no quotes', async () => {
    (maxQuoteTimestamp as unknown as Mock).mockResolvedValue(null);

    await expect(refreshLastUpdate(ctx, 7)).resolves.toBeNull();
    expect(setLastUpdate).not.toHaveBeenCalled();
  });
});

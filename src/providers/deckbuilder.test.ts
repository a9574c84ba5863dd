import { beforeEach, describe, expect, it, vi } from 'vitest';
import { ProviderError } from '../errors.js';
import type { RequestedItem } from '../core/types.js';
import { CryptMtgProvider } from './cryptmtg.js';
import { MagiCarteProvider } from './magicarte.js';

const { post } = vi.hoisted(() => ({ post: vi.fn() }));

vi.mock('axios', () => ({ default: { post } }));

const URL = 'https://vendor.test/decklist';

const items: RequestedItem[] = [
  { name: 'Sol Ring', quantity: 4 },
  { name: 'Esper Sentinel', quantity: 1, setCode: 'PLST', collectorNumber: 'MH2-12' },
  { name: 'Counterspell', quantity: 1 }
];

describe('DeckBuilderProvider', () => {
  beforeEach(() => {
    post.mockReset();
  });

  it('submits the list and maps listings onto requested items', async () => {
    post.mockResolvedValue({
      data: {
        items: [
          { title: 'Sol Ring [Commander Masters] Near Mint', price: '$1.25', quantity: '1 / 3' },
          { title: 'Esper Sentinel [Modern Horizons 2] Lightly Played Foil', price: 'CAD $12.50', quantity: '0 / 2' },
          { title: 'Sol Ring [Commander Legends] Near Mint', price: '$0.99', quantity: '1 / 6' },
          { title: 'Mystery Booster', price: 'N/A', quantity: '' }
        ]
      }
    });

    const provider = new CryptMtgProvider({ url: URL, requestTimeoutMs: 45000 });
    const observations = await provider.queryPrices(items);

    expect(post).toHaveBeenCalledWith(
      URL,
      { decklist: '4 Sol Ring\n1 Esper Sentinel\n1 Counterspell' },
      expect.objectContaining({ timeout: 45000 })
    );
    expect(observations).toEqual([
      {
        status: 'found',
        requestedKey: 'sol ring',
        vendor: 'CryptMTG',
        matchedName: 'Sol Ring',
        unitPrice: 0.99,
        availableQuantity: 6
      },
      {
        status: 'found',
        requestedKey: 'esper sentinel',
        vendor: 'CryptMTG',
        matchedName: 'Esper Sentinel',
        unitPrice: 12.5,
        availableQuantity: 2
      },
      { status: 'not-found', requestedKey: 'counterspell', vendor: 'CryptMTG' }
    ]);
  });

  it('reuses the cached answer for the same list', async () => {
    post.mockResolvedValue({ data: { data: { items: [{ title: 'Sol Ring', price: '1.00', quantity: '1 / 1' }] } } });
    const provider = new MagiCarteProvider({ url: URL });

    await provider.queryPrices(items);
    const observations = await provider.queryPrices(items);

    expect(post).toHaveBeenCalledTimes(1);
    expect(observations[0]).toMatchObject({ status: 'found', vendor: 'MagiCarte', unitPrice: 1 });
  });

  it('rejects responses without an item list', async () => {
    post.mockResolvedValue({ data: '<html>maintenance</html>' });
    const provider = new CryptMtgProvider({ url: URL });

    await expect(provider.queryPrices(items)).rejects.toBeInstanceOf(ProviderError);
  });

  it('lets transport errors reach the caller', async () => {
    post.mockRejectedValue(new Error('socket hang up'));
    const provider = new MagiCarteProvider({ url: URL });

    await expect(provider.queryPrices(items)).rejects.toThrow('socket hang up');
  });
});

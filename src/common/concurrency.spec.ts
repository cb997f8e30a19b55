import { mapWithConcurrency } from './concurrency';

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('mapWithConcurrency', () => {
  it('should return results in input order', async () => {
    const delays = [30, 0, 10, 5];
    const results = await mapWithConcurrency(delays, 2, async (delay, index) => {
      await new Promise((resolve) => setTimeout(resolve, delay));
      return `item-${index}`;
    });

    expect(results).toEqual(['item-0', 'item-1', 'item-2', 'item-3']);
  });

  it('should never run more than the limit at once', async () => {
    let inFlight = 0;
    let maxInFlight = 0;

    await mapWithConcurrency(Array.from({ length: 9 }, (_, i) => i), 3, async (item) => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await tick();
      inFlight--;
      return item;
    });

    expect(maxInFlight).toBe(3);
  });

  it('should handle an empty list', async () => {
    const worker = jest.fn();

    await expect(mapWithConcurrency([], 4, worker)).resolves.toEqual([]);
    expect(worker).not.toHaveBeenCalled();
  });

  it('should still make progress with a non-positive limit', async () => {
    await expect(mapWithConcurrency([1, 2], 0, async (n) => n * 2)).resolves.toEqual([2, 4]);
  });

  it('should reject when a worker rejects', async () => {
    await expect(
      mapWithConcurrency([1, 2, 3], 2, async (n) => {
        if (n === 2) throw new Error('boom');
        return n;
      }),
    ).rejects.toThrow('boom');
  });
});

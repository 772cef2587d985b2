import { MarketDataEngine, normalizeBars } from '../MarketDataEngine';
import { BarSource } from '../BarSource';
import { Bar } from '../../types/market';
import { HOUR, START, bar } from '../../__fixtures__/builders';

const fakeSource = (name: string, bars: Bar[]) => {
  const fetchBars = jest.fn(async () => bars);
  const source: BarSource = { name, fetchBars };
  return { source, fetchBars };
};

const unordered = [
  bar({ timestamp: START + HOUR, close: 100.5 }),
  bar({ timestamp: START }),
  bar({ timestamp: START + 2 * HOUR }),
  bar({ timestamp: START + HOUR, close: 100.25 }),
];

describe('MarketDataEngine', () => {
  it('should sort bars and keep the last duplicate', () => {
    const bars = normalizeBars(unordered);
    expect(bars.map((b) => b.timestamp)).toEqual([START, START + HOUR, START + 2 * HOUR]);
    expect(bars[1].close).toBe(100.25);
  });

  it('should truncate to the most recent bars', async () => {
    const { source } = fakeSource('fake', unordered);
    const bars = await new MarketDataEngine([source]).getBars('X', '1h', 2);
    expect(bars.map((b) => b.timestamp)).toEqual([START + HOUR, START + 2 * HOUR]);
  });

  it('should serve repeated requests from the cache until the TTL expires', async () => {
    let now = 0;
    const { source, fetchBars } = fakeSource('fake', unordered);
    const engine = new MarketDataEngine([source], { cacheTtlMs: 1000, now: () => now });

    await engine.getBars('X', '1h', 10);
    now = 999;
    await engine.getBars('X', '1h', 10);
    expect(fetchBars).toHaveBeenCalledTimes(1);

    now = 1000;
    await engine.getBars('X', '1h', 10);
    expect(fetchBars).toHaveBeenCalledTimes(2);
  });

  it('should not let callers mutate the cache', async () => {
    const { source } = fakeSource('fake', unordered);
    const engine = new MarketDataEngine([source]);
    const first = await engine.getBars('X', '1h', 10);
    first.pop();
    expect(await engine.getBars('X', '1h', 10)).toHaveLength(3);
  });

  it('should select a source by name', async () => {
    const primary = fakeSource('primary', unordered);
    const secondary = fakeSource('secondary', [bar()]);
    const engine = new MarketDataEngine([primary.source, secondary.source]);

    expect(await engine.getBars('X', '1h', 10, 'secondary')).toHaveLength(1);
    expect(primary.fetchBars).not.toHaveBeenCalled();
    await expect(engine.getBars('X', '1h', 10, 'missing')).rejects.toThrow("Unknown bar source 'missing'");
  });

  it('should propagate source failures', async () => {
    const source: BarSource = {
      name: 'broken',
      fetchBars: jest.fn(async () => {
        throw new Error('offline');
      }),
    };
    await expect(new MarketDataEngine([source]).getBars('X', '1h')).rejects.toThrow('offline');
  });

  it('should need at least one source', () => {
    expect(() => new MarketDataEngine([])).toThrow('at least one bar source');
  });
});

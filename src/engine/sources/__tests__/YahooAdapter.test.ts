import { AxiosAdapter, AxiosError, InternalAxiosRequestConfig } from 'axios';
import { YahooAdapter, historyDays, normalizeSymbol } from '../YahooAdapter';
import { YahooApiClient } from '../../../client/YahooApiClient';
import { DataError } from '../../../core/errors';

const NOW = Date.UTC(2024, 0, 10);

const chartPayload = {
  chart: {
    result: [
      {
        meta: { currency: 'USD', symbol: 'EURUSD=X' },
        timestamp: [1704157200, 1704153600, 1704160800],
        indicators: {
          quote: [
            {
              open: [1.102, 1.1, null],
              high: [1.104, 1.101, 1.106],
              low: [1.101, 1.099, 1.103],
              close: [1.103, 1.1005, 1.105],
              volume: [null, 0, 12],
            },
          ],
        },
      },
    ],
    error: null,
  },
};

const stubAdapter = (payload: unknown, calls: InternalAxiosRequestConfig[] = []): AxiosAdapter => {
  return async (config) => {
    calls.push(config);
    return { data: payload, status: 200, statusText: 'OK', headers: {}, config };
  };
};

const adapterWith = (payload: unknown, calls: InternalAxiosRequestConfig[] = []): YahooAdapter =>
  new YahooAdapter(new YahooApiClient({ baseUrl: 'http://chart.test/', adapter: stubAdapter(payload, calls) }), () => NOW);

describe('YahooAdapter', () => {
  it('should normalize FX majors and leave other symbols alone', () => {
    expect(normalizeSymbol('eurusd')).toBe('EURUSD=X');
    expect(normalizeSymbol('EUR.USD')).toBe('EURUSD=X');
    expect(normalizeSymbol('EURUSD=X')).toBe('EURUSD=X');
    expect(normalizeSymbol('AAPL')).toBe('AAPL');
  });

  it('should cap the history window per interval', () => {
    expect(historyDays('1h', 500)).toBe(21);
    expect(historyDays('1m', 50000)).toBe(7);
    expect(historyDays('5m', 10)).toBe(1);
    expect(historyDays('1d', 10000)).toBe(3650);
  });

  it('should request the chart endpoint with interval and period bounds', async () => {
    const calls: InternalAxiosRequestConfig[] = [];
    await adapterWith(chartPayload, calls).fetchBars('EURUSD', '1h', 500);
    expect(calls).toHaveLength(1);
    expect(calls[0].baseURL).toBe('http://chart.test');
    expect(calls[0].url).toBe('/v8/finance/chart/EURUSD%3DX');
    expect(calls[0].params).toEqual({
      interval: '1h',
      period1: (NOW - 21 * 24 * 60 * 60 * 1000) / 1000,
      period2: NOW / 1000,
    });
  });

  it('should convert rows to sorted bars and skip rows with missing prices', async () => {
    const bars = await adapterWith(chartPayload).fetchBars('EURUSD', '1h');
    expect(bars).toEqual([
      { timestamp: 1704153600000, open: 1.1, high: 1.101, low: 1.099, close: 1.1005, volume: 0 },
      { timestamp: 1704157200000, open: 1.102, high: 1.104, low: 1.101, close: 1.103, volume: 0 },
    ]);
  });

  it('should keep only the latest bars when limited', async () => {
    const bars = await adapterWith(chartPayload).fetchBars('EURUSD', '1h', 1);
    expect(bars.map((b) => b.timestamp)).toEqual([1704157200000]);
  });

  it('should surface API errors as DataError', async () => {
    const payload = { chart: { result: null, error: { code: 'Not Found', description: 'No data found' } } };
    await expect(adapterWith(payload).fetchBars('NOPE', '1d')).rejects.toThrow(
      new DataError('Chart API error for NOPE: Not Found No data found'),
    );
  });

  it('should reject responses of an unexpected shape', async () => {
    await expect(adapterWith({ quotes: [] }).fetchBars('AAPL', '1d')).rejects.toThrow(DataError);
  });

  it('should propagate transport failures', async () => {
    const failing: AxiosAdapter = async (config) => {
      throw new AxiosError('timeout of 10000ms exceeded', 'ECONNABORTED', config);
    };
    const adapter = new YahooAdapter(new YahooApiClient({ adapter: failing }), () => NOW);
    await expect(adapter.fetchBars('AAPL', '1d')).rejects.toThrow('timeout of 10000ms exceeded');
  });
});

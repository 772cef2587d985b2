import { AccountManager, tradingDayOf } from '../AccountManager';

const DAY1 = Date.UTC(2024, 0, 1, 9);
const DAY1_LATE = Date.UTC(2024, 0, 1, 23, 59);
const DAY2 = Date.UTC(2024, 0, 2, 0, 0);

describe('AccountManager', () => {
  it('should key trading days by UTC date', () => {
    expect(tradingDayOf(DAY1)).toBe('2024-01-01');
    expect(tradingDayOf(DAY2)).toBe('2024-01-02');
  });

  it('should apply realized PnL and count the trade', () => {
    const account = new AccountManager(10000);
    account.beginBar(DAY1);
    account.updateOnTradeEnd(100);
    account.updateOnTradeEnd(-75);
    expect(account.getState()).toEqual({
      initialCapital: 10000,
      equity: 10025,
      dailyLossAccumulated: 75,
      tradesTodayCount: 2,
      tradingDay: '2024-01-01',
    });
  });

  it('should reset daily counters only when the date changes', () => {
    const account = new AccountManager(10000);
    expect(account.beginBar(DAY1)).toBe(true);
    account.updateOnTradeEnd(-50);
    expect(account.beginBar(DAY1_LATE)).toBe(false);
    expect(account.getState().dailyLossAccumulated).toBe(50);

    expect(account.beginBar(DAY2)).toBe(true);
    expect(account.getState()).toMatchObject({ equity: 9950, dailyLossAccumulated: 0, tradesTodayCount: 0, tradingDay: '2024-01-02' });
  });

  it('should hand out frozen snapshots', () => {
    const account = new AccountManager(10000);
    const snapshot = account.getState();
    account.updateOnTradeEnd(10);
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(snapshot.equity).toBe(10000);
    expect(account.equity).toBe(10010);
  });
});

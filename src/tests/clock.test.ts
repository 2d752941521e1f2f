import { getNow, parseTestNow, setTestNow, toEpochSeconds } from '../shared/clock';

describe('clock', () => {
  afterEach(() => {
    setTestNow(null);
  });

  test('a frozen time is returned until cleared', () => {
    const frozen = new Date('2026-03-02T09:00:00Z');

    setTestNow(frozen);
    expect(getNow()).toBe(frozen);

    setTestNow(null);
    expect(getNow()).not.toBe(frozen);
  });

  test('epoch seconds round down', () => {
    expect(toEpochSeconds(new Date(1_700_000_000_999))).toBe(1_700_000_000);
  });

  describe('X-Test-Now values', () => {
    test('epoch milliseconds', () => {
      expect(parseTestNow('1772442000000')).toEqual(new Date('2026-03-02T09:00:00Z'));
    });

    test('ISO-8601 with an offset', () => {
      expect(parseTestNow('2026-03-02T10:00:00+01:00')).toEqual(new Date('2026-03-02T09:00:00Z'));
      expect(parseTestNow('2026-03-02T09:00:00.000Z')).toEqual(new Date('2026-03-02T09:00:00Z'));
    });

    test('absent or unreadable values name no instant', () => {
      expect(parseTestNow(undefined)).toBeNull();
      expect(parseTestNow('')).toBeNull();
      expect(parseTestNow('next tuesday')).toBeNull();
      expect(parseTestNow('-5')).toBeNull();
    });
  });
});

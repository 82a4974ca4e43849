import { LogHelper } from '../utils/LogHelper';

describe('LogHelper', () => {

  test('FormatForCloud writes one JSON line with the params after the fixed keys', () => {
    const line = LogHelper.FormatForCloud('bar chart roles resolved', { rows: 2, columns: ['category', 'value'] });

    expect(line).toBe('{"severity":"INFO","message":"bar chart roles resolved","filter":"Chartsmith","rows":2,"columns":["category","value"]}');
  });

  test('FormatForCloud tags warnings', () => {
    expect(JSON.parse(LogHelper.FormatForCloud('x column "m" not found', undefined, 'WARNING')).severity).toBe('WARNING');
  });

  test('nothing is printed under the test config', () => {
    const spy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    try {
      LogHelper.LogForCloud('hidden');
      expect(LogHelper.IsSilent()).toBe(true);
      expect(spy).not.toHaveBeenCalled();
    } finally {
      spy.mockRestore();
    }
  });
});

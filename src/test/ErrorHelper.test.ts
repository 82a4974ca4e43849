import { ChartRenderError, DataFormatError } from '../utils/ChartErrors';
import { ErrorHelper } from '../utils/ErrorHelper';

describe('ErrorHelper.formatForCloud', () => {

  it('logs chart errors by message and type, without a stack', () => {
    const line = ErrorHelper.formatForCloud(new DataFormatError('no data provided'), 'create bar chart');

    expect(JSON.parse(line)).toEqual({
      severity: 'ERROR',
      message: 'no data provided',
      filter: 'Chartsmith',
      errorType: 'DataFormatError',
      context: 'create bar chart',
    });
  });

  it('records the cause of a render failure', () => {
    const line = ErrorHelper.formatForCloud(new ChartRenderError('could not draw pie chart: font', new Error('font')));
    const parsed = JSON.parse(line);

    expect(parsed.message).toBe('could not draw pie chart: font');
    expect(parsed.errorType).toBe('ChartRenderError');
    expect(String(parsed.cause).startsWith('Error: font')).toBe(true);
  });

  it('serializes thrown values that are not errors', () => {
    expect(JSON.parse(ErrorHelper.formatForCloud({ code: 7 }))).toEqual({
      severity: 'ERROR',
      message: '{"code":7}',
      filter: 'Chartsmith',
    });
  });
});

describe('ErrorHelper.MessageOf', () => {
  it('returns the message of an error and the text of anything else', () => {
    expect(ErrorHelper.MessageOf(new Error('boom'))).toBe('boom');
    expect(ErrorHelper.MessageOf('plain')).toBe('plain');
  });
});

import { InvalidQueryError } from '../utils/errors';
import { parseCliArgs } from './args';

describe('parseCliArgs', () => {
  it('applies defaults', () => {
    expect(parseCliArgs([])).toEqual({
      topN: 1,
      autolocate: false,
      chooseLocation: false,
      help: false,
    });
  });

  it('reads short, long and inline flags', () => {
    expect(
      parseCliArgs(['-a', 'New York, NY', '-n', '3', '--radius=25.5', '--autolocate', '--choose-location', '--data', 'x.csv'])
    ).toEqual({
      address: 'New York, NY',
      topN: 3,
      radiusKm: 25.5,
      autolocate: true,
      chooseLocation: true,
      dataFile: 'x.csv',
      help: false,
    });
  });

  it('passes negative numbers through for query validation', () => {
    const options = parseCliArgs(['--top', '-1', '-r', '-5']);
    expect(options.topN).toBe(-1);
    expect(options.radiusKm).toBe(-5);
  });

  it('recognises help', () => {
    expect(parseCliArgs(['-h']).help).toBe(true);
  });

  it('rejects a non-numeric count', () => {
    expect(() => parseCliArgs(['--top', 'three'])).toThrow(new InvalidQueryError('--top must be a number'));
  });

  it('accepts exponent notation but not other bases', () => {
    expect(parseCliArgs(['-r', '1e1']).radiusKm).toBe(10);
    expect(() => parseCliArgs(['--top', '0x2'])).toThrow('--top must be a number');
    expect(() => parseCliArgs(['--radius=0b1'])).toThrow('--radius must be a number');
  });

  it('rejects a flag without a value', () => {
    expect(() => parseCliArgs(['--radius'])).toThrow('--radius needs a value');
  });

  it('rejects unknown options', () => {
    expect(() => parseCliArgs(['--bogus'])).toThrow('Unknown option: --bogus');
    expect(() => parseCliArgs(['--autolocate=yes'])).toThrow('Unknown option: --autolocate=yes');
  });
});

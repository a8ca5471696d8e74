import { parseColorOutput } from './helpers';

describe('parseColorOutput', () => {
  it('should parse a hex color', () => {
    expect(parseColorOutput('#1A2b3C\n')).toEqual({ r: 26, g: 43, b: 60 });
  });

  it('should find a hex color inside other text', () => {
    expect(parseColorOutput('average: #ff0000 (center region)')).toEqual({ r: 255, g: 0, b: 0 });
  });

  it('should parse an r,g,b triple', () => {
    expect(parseColorOutput('12, 34,56')).toEqual({ r: 12, g: 34, b: 56 });
  });

  it('should reject out-of-range channels', () => {
    expect(parseColorOutput('300,0,0')).toBeNull();
  });

  it('should return null without a color', () => {
    expect(parseColorOutput('')).toBeNull();
    expect(parseColorOutput('capture failed')).toBeNull();
  });
});

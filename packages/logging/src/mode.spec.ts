import { parseMode, resolveVerbosity } from './mode';

describe('parseMode', () => {
  it('should recognize dev', () => {
    expect(parseMode('dev')).toBe('dev');
  });

  it('should recognize prod', () => {
    expect(parseMode('prod')).toBe('prod');
  });

  it.each(['', 'production', 'development', 'DEV', ' dev', 'staging'])(
    'should fall back to prod for %p',
    (raw) => {
      expect(parseMode(raw)).toBe('prod');
    },
  );
});

describe('resolveVerbosity', () => {
  it('should map dev to debug', () => {
    expect(resolveVerbosity(parseMode('dev'))).toBe('debug');
  });

  it('should map prod to info', () => {
    expect(resolveVerbosity(parseMode('prod'))).toBe('info');
  });

  it('should map an unrecognized mode string to info', () => {
    expect(resolveVerbosity(parseMode('qa'))).toBe('info');
  });
});

import { log, setLogLevel, isLogLevel } from './logger';

describe('logger', () => {
  afterEach(() => {
    setLogLevel('warn');
    vi.restoreAllMocks();
  });

  it('passes the tag and arguments to the console', () => {
    const spy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    log.warn('[Test]', 'something', 3);
    expect(spy).toHaveBeenCalledWith('[Test]', 'something', 3);
  });

  it('drops messages below the level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    log.debug('[Test]', 'hidden');
    log.info('[Test]', 'hidden');
    expect(debug).not.toHaveBeenCalled();
    expect(info).not.toHaveBeenCalled();

    setLogLevel('debug');
    log.debug('[Test]', 'shown');
    expect(debug).toHaveBeenCalledWith('[Test]', 'shown');
  });

  it('silences everything at silent', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    setLogLevel('silent');
    log.error('[Test]', 'x');
    expect(error).not.toHaveBeenCalled();
  });

  it('recognises level names', () => {
    expect(isLogLevel('info')).toBe(true);
    expect(isLogLevel('toString')).toBe(false);
    expect(isLogLevel('trace')).toBe(false);
  });
});

import { isDebugLoggingEnabled } from '../../../src/infra/config/debug-flags.js';

describe('debug-flags', () => {
  it('enables debug logging only for RECOLLECT_DEBUG=1', () => {
    expect(isDebugLoggingEnabled({ RECOLLECT_DEBUG: '1' })).toBe(true);
    expect(isDebugLoggingEnabled({ RECOLLECT_DEBUG: 'true' })).toBe(false);
    expect(isDebugLoggingEnabled({})).toBe(false);
  });

  it('lets the environment override the config', () => {
    const config = { debug: { loggingEnabled: true } };

    expect(isDebugLoggingEnabled({}, config)).toBe(true);
    expect(isDebugLoggingEnabled({ RECOLLECT_DEBUG: '0' }, config)).toBe(false);
  });
});

import { describe, it, expect, afterEach } from 'vitest';
import { createLogger, logger, setLogLevel } from '@fileclassify/utils';

describe('setLogLevel', () => {
  const initial = logger.level;

  afterEach(() => {
    setLogLevel(initial);
  });

  it('should raise children created before the change', () => {
    setLogLevel('info');
    const child = createLogger({ component: 'level-test' });
    expect(child.isLevelEnabled('debug')).toBe(false);

    setLogLevel('debug');

    expect(logger.level).toBe('debug');
    expect(child.isLevelEnabled('debug')).toBe(true);
  });
});

import { describe, it, expect } from 'vitest';
import { buildTestDeps } from '../../helpers/build-test-deps';

describe('buildDeps', () => {
  it('applies log level, service name and NODE_ENV from config to the logger', async () => {
    const { deps, close } = await buildTestDeps({
      nodeEnv: 'production',
      logLevel: 'warn',
      serviceName: 'users-demo',
    });
    try {
      expect(deps.logger.level).toBe('warn');
      expect(deps.logger.defaultMeta).toEqual({ service: 'users-demo', env: 'production' });
    } finally {
      await close();
    }
  });
});

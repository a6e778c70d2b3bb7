import { describe, it, expect } from 'vitest';

import config from '../../vitest.config.js';

describe('package test configuration', () => {
  it('sets retry and timeout on the project itself', () => {
    expect(config.test?.retry).toBe(0);
    expect(config.test?.testTimeout).toBe(process.env.CI === 'true' ? 30000 : 10000);
  });
});

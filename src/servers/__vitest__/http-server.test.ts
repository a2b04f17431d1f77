import { describe, it, expect } from 'vitest';
import { parseApiKeys } from '../http-server.js';

describe('parseApiKeys', () => {
  it('should return no keys when unset', () => {
    expect(parseApiKeys(undefined)).toEqual([]);
  });

  it('should split, trim and drop empty entries', () => {
    expect(parseApiKeys(' test-key-1, ,test-key-2 ,')).toEqual(['test-key-1', 'test-key-2']);
  });
});

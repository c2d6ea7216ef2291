/**
 * Record store helpers
 */
import { describe, it, expect } from 'vitest';
import { hostnamesEqual, normalizeHostname } from '../../../src/providers/base/RecordStore.js';

describe('normalizeHostname', () => {
  it('should lowercase and drop the trailing dot', () => {
    expect(normalizeHostname(' Home.Example.COM. ')).toBe('home.example.com');
  });
});

describe('hostnamesEqual', () => {
  it('should compare names the way resolvers do', () => {
    expect(hostnamesEqual('home.example.com', 'HOME.example.com.')).toBe(true);
    expect(hostnamesEqual('home.example.com', 'www.example.com')).toBe(false);
  });
});

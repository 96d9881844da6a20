import { describe, expect, it } from 'vitest';
import { PermissionSet, WILDCARD } from '../src/permissions.js';

describe('PermissionSet', () => {
  it('allows listed tools only', () => {
    const set = new PermissionSet(['echo-test', 'list-files']);
    expect(set.allows('echo-test')).toBe(true);
    expect(set.allows('list-files')).toBe(true);
    expect(set.allows('deploy')).toBe(false);
  });

  it('treats the wildcard as every tool', () => {
    const set = new PermissionSet([WILDCARD]);
    expect(set.allows('anything')).toBe(true);
  });

  it('denies everything when empty', () => {
    expect(new PermissionSet().allows('echo-test')).toBe(false);
  });

  it('ignores blank entries', () => {
    const set = new PermissionSet(['  ', 'echo-test ']);
    expect(set.toArray()).toEqual(['echo-test']);
    expect(set.allows('')).toBe(false);
  });
});

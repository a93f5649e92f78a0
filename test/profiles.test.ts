import { describe, expect, it } from 'vitest';
import {
  defaultProfile,
  getContentArea,
  getProfile,
  phoneProfile,
  wideProfile,
} from '../src/viewport-profiles/profiles.js';

describe('viewport profiles', () => {
  it('defaults to the 80x24 terminal', () => {
    expect(getProfile()).toBe(defaultProfile);
    expect(getContentArea(getProfile())).toEqual({ width: 76, height: 22 });
  });

  it('looks profiles up by name', () => {
    expect(getProfile('wide')).toBe(wideProfile);
    expect(getContentArea(wideProfile)).toEqual({ width: 80, height: 37 });
    expect(getContentArea(phoneProfile)).toEqual({ width: 38, height: 29 });
  });

  it('rejects unknown names', () => {
    expect(() => getProfile('nope')).toThrow('Unknown profile: nope. Available: vt100, wide, phone');
    expect(() => getProfile('constructor')).toThrow('Unknown profile: constructor.');
  });

  it('never returns an empty content area', () => {
    const tiny = { ...phoneProfile, columns: 1, rows: 1 };
    expect(getContentArea(tiny)).toEqual({ width: 1, height: 1 });
  });
});

import type { Size, ViewportProfile } from '../types.js';

/**
 * Classic 80x24 terminal
 */
export const vt100Profile: ViewportProfile = {
  name: 'vt100',
  columns: 80,
  rows: 24,
  margins: {
    top: 1,
    right: 2,
    bottom: 1, // Status line
    left: 2,
  },
  justify: false,
};

/**
 * Large desktop terminal window
 */
export const wideProfile: ViewportProfile = {
  name: 'wide',
  columns: 120,
  rows: 40,
  margins: {
    top: 1,
    right: 20,
    bottom: 2,
    left: 20,
  },
  justify: true,
};

/**
 * Narrow terminal on a phone (e.g. an SSH client in portrait)
 */
export const phoneProfile: ViewportProfile = {
  name: 'phone',
  columns: 40,
  rows: 30,
  margins: {
    top: 0,
    right: 1,
    bottom: 1,
    left: 1,
  },
  justify: false,
};

/**
 * Registry of available viewport profiles
 */
export const profiles: Record<string, ViewportProfile> = {
  vt100: vt100Profile,
  wide: wideProfile,
  phone: phoneProfile,
};

/**
 * Default profile used when none is specified
 */
export const defaultProfile: ViewportProfile = vt100Profile;

/**
 * Get a profile by name, or return the default if not found
 */
export function getProfile(name?: string): ViewportProfile {
  if (!name) {
    return defaultProfile;
  }
  if (!Object.hasOwn(profiles, name)) {
    throw new Error(`Unknown profile: ${name}. Available: ${Object.keys(profiles).join(', ')}`);
  }
  return profiles[name];
}

/**
 * Get the content area (viewport minus margins), never smaller than one cell
 */
export function getContentArea(profile: ViewportProfile): Size {
  return {
    width: Math.max(1, profile.columns - profile.margins.left - profile.margins.right),
    height: Math.max(1, profile.rows - profile.margins.top - profile.margins.bottom),
  };
}

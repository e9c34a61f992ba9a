import { ValidationError } from '../errors.js';
import type { ProfileSettings, ScanProfile } from '../types/scanner.js';

// Scan presets: concurrency vs. per-step timeout (seconds)
export const SCAN_PROFILES: Record<ScanProfile, ProfileSettings> = {
  // Fast LAN sweep, misses slow hosts
  lightning: { label: 'Lightning', threads: 200, timeout: 0.5 },

  quick: { label: 'Quick', threads: 100, timeout: 1.0 },

  // Default when nothing else is chosen
  balanced: { label: 'Balanced', threads: 50, timeout: 2.0 },

  deep: { label: 'Deep', threads: 30, timeout: 3.0 },

  // Low footprint for congested or monitored networks
  paranoid: { label: 'Paranoid', threads: 10, timeout: 5.0 },
};

export const DEFAULT_PROFILE: ScanProfile = 'balanced';

export function normalizeProfileName(name: string): string {
  return name.trim().toLowerCase();
}

// Validate profile name
export function isValidProfile(profile: string): profile is ScanProfile {
  return Object.prototype.hasOwnProperty.call(SCAN_PROFILES, profile);
}

export function resolveProfile(name: string): { profile: ScanProfile; threads: number; timeout: number } {
  const normalized = normalizeProfileName(name);
  if (!isValidProfile(normalized)) {
    throw new ValidationError(
      'UnknownProfile',
      `Unknown scan profile "${name}" (expected one of: ${getAvailableProfiles().join(', ')})`
    );
  }

  const { threads, timeout } = SCAN_PROFILES[normalized];
  return { profile: normalized, threads, timeout };
}

// Get all available profiles
export function getAvailableProfiles(): ScanProfile[] {
  return ['lightning', 'quick', 'balanced', 'deep', 'paranoid'];
}

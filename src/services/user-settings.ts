// User Settings Service
// Persists scan preferences in user-settings.json and turns them into scan parameters

import * as fs from 'fs';
import * as path from 'path';
import type { Region, ScanParameters } from '../types';
import { parseRegion } from '../constants/markets';
import { DEFAULT_TAX_RATE } from '../constants/yield-policy';

export interface UserSettings {
  // Market
  region: Region;
  minStock: number;
  offlineMaxAgeMinutes: number;   // how old a stored snapshot may be for an offline replay

  // Crafting model
  mastery: number;
  taxRate: number;                // fraction of the sale price kept after market tax
  requireStock: boolean;
  recursive: boolean;
  maxDepth: number;

  // Display
  maxResults: number;
}

export const MAX_RECURSION_DEPTH = 5;

// Share of the sale price kept after the central market tax
export const TAX_PRESETS = {
  valuePack: DEFAULT_TAX_RATE,
  noValuePack: 0.65,
} as const;

export const DEFAULT_SETTINGS: UserSettings = {
  region: 'NA',
  minStock: 0,
  offlineMaxAgeMinutes: 24 * 60,
  mastery: 2000,
  taxRate: DEFAULT_TAX_RATE,
  requireStock: false,
  recursive: false,
  maxDepth: 3,
  maxResults: 50,
};

function readNumber(value: unknown, fallback: number, min: number, max: number = Infinity): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) return fallback;
  return Math.min(Math.max(value, min), max);
}

function readBoolean(value: unknown, fallback: boolean): boolean {
  return typeof value === 'boolean' ? value : fallback;
}

/**
 * Merge whatever was on disk with the defaults, dropping or clamping values that are out of range
 */
export function sanitizeSettings(raw: unknown, defaults: UserSettings = DEFAULT_SETTINGS): UserSettings {
  if (typeof raw !== 'object' || raw === null) return { ...defaults };
  const data: Record<string, unknown> = Object.fromEntries(Object.entries(raw));

  const taxRate = readNumber(data.taxRate, defaults.taxRate, 0, 1);

  return {
    region: (typeof data.region === 'string' ? parseRegion(data.region) : null) ?? defaults.region,
    minStock: Math.floor(readNumber(data.minStock, defaults.minStock, 0)),
    offlineMaxAgeMinutes: readNumber(data.offlineMaxAgeMinutes, defaults.offlineMaxAgeMinutes, 0),
    mastery: readNumber(data.mastery, defaults.mastery, 0),
    taxRate: taxRate > 0 ? taxRate : defaults.taxRate,
    requireStock: readBoolean(data.requireStock, defaults.requireStock),
    recursive: readBoolean(data.recursive, defaults.recursive),
    maxDepth: Math.floor(readNumber(data.maxDepth, defaults.maxDepth, 1, MAX_RECURSION_DEPTH)),
    maxResults: Math.floor(readNumber(data.maxResults, defaults.maxResults, 1)),
  };
}

export function toScanParameters(settings: UserSettings): ScanParameters {
  return {
    mastery: settings.mastery,
    taxRate: settings.taxRate,
    minStock: settings.minStock,
    maxDepth: settings.maxDepth,
    requireStock: settings.requireStock,
    recursive: settings.recursive,
  };
}

export class UserSettingsManager {
  private settings: UserSettings;
  private settingsPath: string;
  private defaults: UserSettings;

  constructor(dataDir: string = process.cwd()) {
    this.settingsPath = path.join(dataDir, 'user-settings.json');
    // MARKET_REGION only changes the default; a saved region still wins
    this.defaults = {
      ...DEFAULT_SETTINGS,
      region: parseRegion(process.env.MARKET_REGION) ?? DEFAULT_SETTINGS.region,
    };
    this.settings = this.loadSettings();
  }

  /**
   * Get current user settings
   */
  getSettings(): UserSettings {
    return { ...this.settings };
  }

  getScanParameters(): ScanParameters {
    return toScanParameters(this.settings);
  }

  /**
   * Update user settings
   */
  updateSettings(updates: Partial<UserSettings>): void {
    this.settings = sanitizeSettings({ ...this.settings, ...updates }, this.defaults);
    this.saveSettings();
  }

  /**
   * Reset to default settings
   */
  resetToDefaults(): void {
    this.settings = { ...this.defaults };
    this.saveSettings();
  }

  get<K extends keyof UserSettings>(key: K): UserSettings[K] {
    return this.settings[key];
  }

  set<K extends keyof UserSettings>(key: K, value: UserSettings[K]): void {
    const updates: Partial<UserSettings> = {};
    updates[key] = value;
    this.updateSettings(updates);
  }

  private loadSettings(): UserSettings {
    try {
      if (fs.existsSync(this.settingsPath)) {
        const data: unknown = JSON.parse(fs.readFileSync(this.settingsPath, 'utf8'));
        return sanitizeSettings(data, this.defaults);
      }
    } catch (e) {
      console.warn('⚠️  Could not load user settings, using defaults:', e instanceof Error ? e.message : e);
    }

    return { ...this.defaults };
  }

  private saveSettings(): void {
    try {
      fs.writeFileSync(this.settingsPath, JSON.stringify(this.settings, null, 2));
    } catch (e) {
      console.error('❌ Failed to save user settings:', e);
    }
  }

  /**
   * Display current settings in a readable format
   */
  displaySettings(): string {
    const s = this.settings;
    const lines = [
      'SCAN SETTINGS',
      `├─ Region: ${s.region}`,
      `├─ Mastery: ${s.mastery}`,
      `├─ Tax kept: ${(s.taxRate * 100).toFixed(1)}%`,
      `├─ Min stock: ${s.minStock}`,
      `├─ Require all ingredients in stock: ${s.requireStock ? 'Yes' : 'No'}`,
      `├─ Count craftable sub-ingredients: ${s.recursive ? `Yes (depth ${s.maxDepth})` : 'No'}`,
      `├─ Offline snapshot max age: ${s.offlineMaxAgeMinutes} min`,
      `└─ Max results: ${s.maxResults}`,
    ];
    return lines.join('\n');
  }
}

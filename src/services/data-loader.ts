// Recipe Catalog Loading Service

import * as fs from 'fs';
import * as path from 'path';
import { remember, forget } from '@epic-web/remember';
import { normalizeCategory } from './catalog-normalizer';
import type { Catalog, CatalogLoadStatus, RawCategoryFile, Recipe } from '../types';

export const CATALOG_FILES = ['recipesCooking.json', 'recipesAlchemy.json', 'recipesProcessing.json'];

export function defaultCatalogDir(): string {
  return path.resolve(process.cwd(), process.env.CATALOG_DIR || path.join('data', 'recipes'));
}

function isRawCategoryFile(value: unknown): value is RawCategoryFile {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  if (!('recipes' in value)) return true;
  return Array.isArray(value.recipes) && value.recipes.every((r: unknown) => typeof r === 'object' && r !== null);
}

export class DataLoader {
  private dataDir: string;
  private files: string[];

  constructor(dataDir: string = defaultCatalogDir(), files: string[] = CATALOG_FILES) {
    this.dataDir = dataDir;
    this.files = files;
  }

  /**
   * Load and normalize one category file.
   * A missing or unreadable file yields an error status instead of throwing.
   */
  loadCategory(file: string): { recipes: Recipe[]; status: CatalogLoadStatus } {
    const filePath = path.join(this.dataDir, file);

    try {
      const data: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
      if (!isRawCategoryFile(data)) {
        throw new Error('expected an object with a "recipes" array');
      }
      return normalizeCategory(file, data);
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      return {
        recipes: [],
        status: { source: file, loaded: 0, skipped: 0, warnings: [], error: message },
      };
    }
  }

  /**
   * Load every category file. Product ids may repeat across files; all copies are kept.
   */
  loadCatalog(): Catalog {
    const recipes: Recipe[] = [];
    const log: CatalogLoadStatus[] = [];

    for (const file of this.files) {
      const result = this.loadCategory(file);
      recipes.push(...result.recipes);
      log.push(result.status);
      for (const warning of result.status.warnings) {
        console.warn(`⚠️  ${file} ${warning}`);
      }
    }

    return { recipes, log };
  }

  /**
   * Check which category files exist
   */
  checkDataFiles(): Record<string, boolean> {
    const status: Record<string, boolean> = {};
    for (const file of this.files) {
      status[file] = fs.existsSync(path.join(this.dataDir, file));
    }
    return status;
  }
}

/**
 * Human readable load status line, e.g. "✅ recipesCooking.json: Loaded 12 recipes"
 */
export function formatLoadStatus(status: CatalogLoadStatus): string {
  if (status.error) {
    return `❌ ${status.source}: Failed - ${status.error}`;
  }
  const skipped = status.skipped > 0 ? ` (${status.skipped} skipped)` : '';
  return `✅ ${status.source}: Loaded ${status.loaded} recipes${skipped}`;
}

function cacheKey(dataDir: string): string {
  return `recipe-catalog:${dataDir}`;
}

/**
 * Catalog for the process lifetime. Loaded on first use; reload with clearCatalogCache().
 */
export function getCatalog(dataDir: string = defaultCatalogDir()): Catalog {
  return remember(cacheKey(dataDir), () => new DataLoader(dataDir).loadCatalog());
}

export function clearCatalogCache(dataDir: string = defaultCatalogDir()): boolean {
  return forget(cacheKey(dataDir));
}

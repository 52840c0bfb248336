#!/usr/bin/env -S npx tsx
// CLI for ranking crafting and processing recipes by hourly profit

import 'dotenv/config';
import { select, number, confirm } from '@inquirer/prompts';
import { DataLoader, getCatalog, clearCatalogCache, formatLoadStatus, defaultCatalogDir } from './services/data-loader';
import { ArshaMarketProvider, writeProgress } from './services/market-data-fetcher';
import { runScan, replayScan, collectItemIds, type ScanReport } from './services/scanner';
import { UserSettingsManager, TAX_PRESETS, MAX_RECURSION_DEPTH, type UserSettings } from './services/user-settings';
import { SnapshotStore } from './services/snapshot-store';
import { REGIONS } from './constants/markets';
import { renderRanking, formatAge } from './ui';
import type { MarketSnapshot, Region } from './types';

type MenuChoice = 'scan' | 'replay' | 'probe' | 'settings' | 'status' | 'reload' | 'exit';

// Snapshot age indicator for the menu
function getSnapshotFreshnessIndicator(store: SnapshotStore, region: Region): string {
  const ageMinutes = store.getAge(region);
  if (ageMinutes === null) return '⚫ Never';
  if (ageMinutes < 60) return `🟢 ${formatAge(ageMinutes)} ago`;
  if (ageMinutes < 24 * 60) return `🟡 ${formatAge(ageMinutes)} ago`;
  return `🔴 ${formatAge(ageMinutes)} ago`;
}

async function showMenu(settings: UserSettingsManager, store: SnapshotStore): Promise<MenuChoice> {
  const region = settings.get('region');

  console.log('\n========================================');
  console.log('CRAFTING PROFIT SCANNER');
  console.log('========================================');

  return select<MenuChoice>({
    message: `Region ${region} · mastery ${settings.get('mastery')} · min stock ${settings.get('minStock')}`,
    choices: [
      { name: '🚀 Run scan', value: 'scan' },
      { name: `💾 Replay last snapshot (offline) ${getSnapshotFreshnessIndicator(store, region)}`, value: 'replay' },
      { name: '🧪 Test connection', value: 'probe' },
      { name: '⚙️  Scan settings', value: 'settings' },
      { name: '📋 Catalog status', value: 'status' },
      { name: '🔄 Reload catalog', value: 'reload' },
      { name: 'Exit', value: 'exit' },
    ],
  });
}

function persistSnapshot(store: SnapshotStore, region: Region, snapshot: MarketSnapshot): void {
  if (snapshot.size === 0) return;
  try {
    const saved = store.save(region, snapshot);
    console.log(`\n💾 Saved ${saved} prices for offline replay`);
  } catch (error) {
    console.warn('\n⚠️  Could not save snapshot:', error instanceof Error ? error.message : error);
  }
}

function printReport(report: ScanReport, maxResults: number): void {
  const { ranking } = report;

  if (ranking.empty) {
    console.error('\n❌ No items found.');
    if (report.pricedIds === 0) {
      console.error('No prices came back. If "Test connection" fails too, the API is refusing this machine.\n');
    } else {
      console.error(`${ranking.excludedUnsellable} recipes had no sell price, ${ranking.excludedUncraftable} were missing ingredients.\n`);
    }
    return;
  }

  console.log(`\n✅ Success! ${ranking.rows.length} items analyzed.`);
  console.log(`   Priced ${report.pricedIds}/${report.requestedIds} items in ${(report.elapsedMs / 1000).toFixed(2)}s\n`);
  console.log(renderRanking(ranking.rows, maxResults));

  if (ranking.rows.length > maxResults) {
    console.log(`   ... and ${ranking.rows.length - maxResults} more`);
  }
  console.log(`\n   Skipped: ${ranking.excludedUnsellable} unsellable, ${ranking.excludedUncraftable} missing ingredients\n`);
}

function loadRecipesOrWarn() {
  const catalog = getCatalog();
  if (catalog.recipes.length === 0) {
    console.error('\n❌ No recipes.');
    catalog.log.forEach((status) => console.error(`   ${formatLoadStatus(status)}`));
    return null;
  }
  return catalog.recipes;
}

async function scanMarket(settings: UserSettingsManager, store: SnapshotStore): Promise<void> {
  const recipes = loadRecipesOrWarn();
  if (!recipes) return;

  const region = settings.get('region');
  console.log(`\n📊 Fetching prices for ${collectItemIds(recipes).length} items on ${region}...\n`);

  const provider = new ArshaMarketProvider(region, { onProgress: writeProgress });
  const report = await runScan(recipes, provider, settings.getScanParameters(), {
    region,
    persist: (scanRegion, snapshot) => persistSnapshot(store, scanRegion, snapshot),
  });

  printReport(report, settings.get('maxResults'));
}

function replayLastSnapshot(settings: UserSettingsManager, store: SnapshotStore): void {
  const recipes = loadRecipesOrWarn();
  if (!recipes) return;

  const region = settings.get('region');
  const stored = store.load(region, { maxAgeMinutes: settings.get('offlineMaxAgeMinutes') });

  if (stored.snapshot.size === 0) {
    console.error(`\n❌ No stored prices for ${region} newer than ${formatAge(settings.get('offlineMaxAgeMinutes'))}.`);
    console.error('Run a scan first.\n');
    return;
  }

  const fetchedAt = stored.fetchedAt ? stored.fetchedAt.toLocaleString() : 'unknown';
  console.log(`\n💾 Using ${stored.snapshot.size} stored prices for ${region} (fetched ${fetchedAt})`);

  printReport(replayScan(recipes, stored.snapshot, settings.getScanParameters()), settings.get('maxResults'));
}

async function testConnection(settings: UserSettingsManager): Promise<void> {
  console.log('\nRequesting a single price...');
  const result = await new ArshaMarketProvider(settings.get('region')).probe();

  if (result.ok) {
    console.log(`✅ CONNECTION ESTABLISHED! Status: ${result.statusCode}`);
    console.log(result.body);
  } else {
    console.error(`❌ Blocked. Status: ${result.statusCode ?? 'no response'}`);
    console.error(`   ${result.url}`);
    console.error(result.body);
  }
}

async function askNumber(message: string, current: number, min: number, max?: number, step: number | 'any' = 1): Promise<number> {
  const value = await number({ message, default: current, min, max, step });
  return value ?? current;
}

async function editSettings(settings: UserSettingsManager): Promise<void> {
  for (;;) {
    console.log('\n' + settings.displaySettings() + '\n');

    const field = await select<keyof UserSettings | 'reset' | 'back'>({
      message: 'Change a setting',
      choices: [
        { name: 'Region', value: 'region' },
        { name: 'Mastery', value: 'mastery' },
        { name: 'Tax', value: 'taxRate' },
        { name: 'Min stock', value: 'minStock' },
        { name: 'Require all ingredients in stock', value: 'requireStock' },
        { name: 'Count craftable sub-ingredients', value: 'recursive' },
        { name: 'Recursion depth', value: 'maxDepth' },
        { name: 'Offline snapshot max age', value: 'offlineMaxAgeMinutes' },
        { name: 'Max results', value: 'maxResults' },
        { name: 'Reset to defaults', value: 'reset' },
        { name: 'Back', value: 'back' },
      ],
    });

    switch (field) {
      case 'back':
        return;
      case 'reset':
        if (await confirm({ message: 'Reset all settings?', default: false })) {
          settings.resetToDefaults();
        }
        break;
      case 'region':
        settings.set('region', await select<Region>({
          message: 'Region',
          choices: REGIONS.map((region) => ({ name: region, value: region })),
          default: settings.get('region'),
        }));
        break;
      case 'taxRate': {
        const preset = await select<number | 'custom'>({
          message: 'Tax',
          choices: [
            { name: `Value pack (keep ${TAX_PRESETS.valuePack * 100}%)`, value: TAX_PRESETS.valuePack },
            { name: `No value pack (keep ${TAX_PRESETS.noValuePack * 100}%)`, value: TAX_PRESETS.noValuePack },
            { name: 'Custom', value: 'custom' },
          ],
        });
        settings.set(
          'taxRate',
          preset === 'custom'
            ? await askNumber('Fraction kept after tax (0-1)', settings.get('taxRate'), 0.01, 1, 'any')
            : preset
        );
        break;
      }
      case 'requireStock':
      case 'recursive':
        settings.set(field, await confirm({ message: 'Enable?', default: settings.get(field) }));
        break;
      case 'maxDepth':
        settings.set(field, await askNumber('Recursion depth', settings.get(field), 1, MAX_RECURSION_DEPTH));
        break;
      case 'mastery':
      case 'minStock':
      case 'offlineMaxAgeMinutes':
      case 'maxResults':
        settings.set(field, await askNumber('New value', settings.get(field), 0));
        break;
    }
  }
}

function showCatalogStatus(settings: UserSettingsManager, store: SnapshotStore): void {
  const catalogDir = defaultCatalogDir();
  const catalog = getCatalog(catalogDir);

  console.log('\n--- CATALOG STATUS ---\n');
  console.log(`Directory: ${catalogDir}`);
  Object.entries(new DataLoader(catalogDir).checkDataFiles()).forEach(([file, exists]) => {
    if (!exists) console.log(`⚫ ${file}: not found`);
  });
  catalog.log.forEach((status) => {
    console.log(formatLoadStatus(status));
    status.warnings.slice(0, 5).forEach((warning) => console.log(`   ⚠️  ${warning}`));
    if (status.warnings.length > 5) console.log(`   ... and ${status.warnings.length - 5} more`);
  });
  console.log(`\nRecipes: ${catalog.recipes.length} · Items referenced: ${collectItemIds(catalog.recipes).length}`);
  console.log(`Stored snapshot (${settings.get('region')}): ${getSnapshotFreshnessIndicator(store, settings.get('region'))}`);
  console.log(`Stored snapshots: ${(store.getSize() / 1024).toFixed(1)} KB\n`);
}

function reloadCatalog(): void {
  clearCatalogCache();
  const catalog = getCatalog();
  console.log(`\n🔄 Reloaded ${catalog.recipes.length} recipes`);
  catalog.log.forEach((status) => console.log(`   ${formatLoadStatus(status)}`));
}

async function main() {
  console.log('Welcome to the Crafting Profit Scanner!');

  const settings = new UserSettingsManager();
  const store = new SnapshotStore();
  let running = true;

  while (running) {
    const choice = await showMenu(settings, store);

    try {
      switch (choice) {
        case 'scan':
          await scanMarket(settings, store);
          break;
        case 'replay':
          replayLastSnapshot(settings, store);
          break;
        case 'probe':
          await testConnection(settings);
          break;
        case 'settings':
          await editSettings(settings);
          break;
        case 'status':
          showCatalogStatus(settings, store);
          break;
        case 'reload':
          reloadCatalog();
          break;
        case 'exit':
          console.log('\nGoodbye!\n');
          running = false;
          break;
      }
    } catch (error) {
      if (error instanceof Error && error.name === 'ExitPromptError') throw error;
      console.error('\n❌ Error:', error instanceof Error ? error.message : error);
    }
  }
}

// Run CLI
main().catch((err: unknown) => {
  if (err instanceof Error && err.name === 'ExitPromptError') {
    console.log('\nGoodbye!\n');
    return;
  }
  console.error('\n❌ Fatal error:', err instanceof Error ? err.message : err);
  if (err instanceof Error) console.error(err.stack);
  process.exit(1);
});

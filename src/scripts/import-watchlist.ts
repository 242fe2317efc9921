import { parseArgs } from 'node:util';
import { loadConfig } from '../config.js';
import { openDatabase } from '../runtime.js';
import { importWatchlist, loadWatchlistFile } from '../services/watchlist.js';
import { loadChannelsConfig } from '../workers/channel-config.js';

async function run(): Promise<void> {
  const config = loadConfig();
  const { values } = parseArgs({
    options: { file: { type: 'string', short: 'f' } },
  });

  const file = values.file ?? config.watchlistPath;
  if (!file) {
    throw new Error('Pass --file <path> or set WATCHLIST_PATH');
  }

  const channels = await loadChannelsConfig(config.channelsConfigPath);
  const rows = await loadWatchlistFile(file);
  const db = openDatabase(config.databasePath);
  try {
    const result = await importWatchlist(db, rows, channel => channels[channel] ?? {});
    console.log(`Imported ${rows.length} rows: ${result.inserted} new, ${result.updated} updated`);
    for (const rejected of result.rejected) {
      console.warn(`Row ${rejected.row} skipped: ${rejected.reason}`);
    }
  } finally {
    db.close();
  }
}

run().catch((error) => {
  console.error('Import failed:', error);
  process.exit(1);
});

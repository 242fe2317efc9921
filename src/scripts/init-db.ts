import { loadConfig } from '../config.js';
import { openDatabase } from '../runtime.js';

function initDatabase(): void {
  const { databasePath } = loadConfig();
  console.log('Initializing database...');

  const db = openDatabase(databasePath);
  console.log(`Database ready at: ${databasePath}`);

  db.close();
  console.log('Database initialization complete.');
}

initDatabase();

/**
 * View and edit per-session settings.
 *
 * Usage:
 *   npx tsx bot/session-config.ts                       interactive shell
 *   npx tsx bot/session-config.ts show <session>
 *   npx tsx bot/session-config.ts set <session> farm.gold=off
 */
import { loadConfig } from "./src/config.js";
import { errorMessage } from "./src/errors.js";
import { handleCommand, runSettingsShell } from "./src/settings-shell.js";
import { openDatabase } from "./src/store/db.js";
import { SqliteSessionStore } from "./src/store/sessions.js";

async function main() {
  const config = loadConfig();
  const { db, close } = openDatabase(config.dbPath);
  const repo = new SqliteSessionStore(db);

  try {
    const args = process.argv.slice(2);
    if (args.length > 0) {
      await handleCommand(repo, args.join(" "), console.log);
    } else {
      await runSettingsShell(repo);
    }
  } finally {
    close();
  }
}

main().catch((error) => {
  console.error(`Fatal error: ${errorMessage(error)}`);
  process.exit(1);
});

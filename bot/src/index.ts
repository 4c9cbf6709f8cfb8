import * as readline from "readline";
import { loadConfig, type BotConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { runBot } from "./game/launcher.js";
import { runSettingsShell } from "./settings-shell.js";
import { openDatabase } from "./store/db.js";
import { SqliteSessionStore } from "./store/sessions.js";
import { log, setLogLevel, setStructuredMode } from "./utils/logger.js";

const MENU = [
  "Select an action:",
  "  1. Run bot",
  "  2. Session settings",
];

function usage(): void {
  log.error("Usage: npx tsx bot/src/index.ts [--action <1|2>]");
  log.error("  1  run every session in SESSIONS_PATH");
  log.error("  2  view and edit session settings");
}

function parseAction(args: string[]): string | null {
  for (let i = 0; i < args.length; i++) {
    if ((args[i] === "--action" || args[i] === "-a") && args[i + 1]) {
      return args[i + 1];
    }
  }
  return null;
}

function ask(question: string): Promise<string> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

async function editSettings(config: BotConfig): Promise<void> {
  const { db, close } = openDatabase(config.dbPath);
  try {
    await runSettingsShell(new SqliteSessionStore(db));
  } finally {
    close();
  }
}

async function main() {
  const config = loadConfig();
  setLogLevel(config.debugLogging ? "debug" : "info");
  setStructuredMode(config.logFormat === "json");

  let action = parseAction(process.argv.slice(2));
  while (action !== "1" && action !== "2") {
    if (action !== null) {
      usage();
      process.exit(1);
    }
    MENU.forEach((line) => console.log(line));
    const answer = await ask("> ");
    if (answer === "1" || answer === "2") action = answer;
    else log.warn("Please enter 1 or 2");
  }

  if (action === "2") {
    await editSettings(config);
    return;
  }

  log.info("SleepagotchiLITE farm bot starting...");
  await runBot(config);
  log.info("Bot finished.");
}

main().catch((error) => {
  log.error(`Fatal error: ${errorMessage(error)}`);
  console.error(error);
  process.exit(1);
});

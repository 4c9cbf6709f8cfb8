import * as readline from "readline";
import { errorMessage } from "./errors.js";
import { applySetting, formatSettings } from "./store/settings.js";
import type { SessionConfigRepository } from "./store/sessions.js";

export type Print = (line: string) => void;

const HELP = [
  "Commands:",
  "  list                      list stored sessions",
  "  show <session>            show one session's settings",
  "  set <session> key=value   change a setting, e.g. farm.gold=off, priorities.bonk.gold=1,",
  "                            gemsSafeBalance=50000, constellationLastIndex=none, proxy=none",
  "  remove <session>          delete a session's settings",
  "  help                      show this help",
  "  exit                      quit",
];

/** Run one operator command. Returns false when the shell should exit. */
export async function handleCommand(repo: SessionConfigRepository, line: string, print: Print): Promise<boolean> {
  const [command = "", name = "", ...args] = line.trim().split(/\s+/);

  try {
    switch (command.toLowerCase()) {
      case "":
        return true;
      case "exit":
      case "quit":
        return false;
      case "help":
        HELP.forEach((l) => print(l));
        return true;
      case "list": {
        const sessions = await repo.list();
        if (sessions.length === 0) print("No sessions stored yet. They are created on the first run.");
        for (const s of sessions) {
          const farming = Object.entries(s.farm).filter(([, on]) => on).map(([r]) => r);
          print(`${s.sessionName}  farm=[${farming.join(",")}]  proxy=${s.proxy ?? "-"}`);
        }
        return true;
      }
      case "show": {
        const config = name ? await repo.load(name) : null;
        if (!config) {
          print(`Unknown session "${name}"`);
          return true;
        }
        formatSettings(config).forEach((l) => print(l));
        return true;
      }
      case "set": {
        const config = name ? await repo.load(name) : null;
        if (!config) {
          print(`Unknown session "${name}"`);
          return true;
        }
        const assignment = args.join(" ");
        const eq = assignment.indexOf("=");
        if (eq <= 0) {
          print("Usage: set <session> key=value");
          return true;
        }
        const key = assignment.slice(0, eq).trim();
        const updated = applySetting(config, key, assignment.slice(eq + 1));
        await repo.save(updated);
        print(`${name}: ${key} updated`);
        return true;
      }
      case "remove": {
        print((await repo.remove(name)) ? `${name} removed` : `Unknown session "${name}"`);
        return true;
      }
      default:
        print(`Unknown command "${command}", type "help"`);
        return true;
    }
  } catch (error) {
    print(`Error: ${errorMessage(error)}`);
    return true;
  }
}

/** Interactive loop over stdin until "exit" or EOF. */
export async function runSettingsShell(repo: SessionConfigRepository, print: Print = console.log): Promise<void> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, prompt: "settings> " });
  HELP.forEach((l) => print(l));
  rl.prompt();

  try {
    for await (const line of rl) {
      if (!(await handleCommand(repo, line, print))) break;
      rl.prompt();
    }
  } finally {
    rl.close();
  }
}

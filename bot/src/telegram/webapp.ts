import { readFile } from "fs/promises";
import { Api, TelegramClient, errors, sessions } from "telegram";
import { GAME_APP_SHORT_NAME, GAME_BOT_USERNAME } from "../constants/game.js";
import { AuthError, NetworkError, errorMessage } from "../errors.js";
import { proxyProtocol } from "../proxy/agent.js";
import type { InitData } from "../types.js";
import { log, type Logger } from "../utils/logger.js";
import { parseWebAppUrl } from "./init-data.js";

/** Produces fresh signed init data for the game's mini app. */
export interface Authenticator {
  authenticate(): Promise<InitData>;
}

export interface WebAppAuthOptions {
  apiId: number;
  apiHash: string;
  /** File holding a GramJS string session. */
  sessionFile: string;
  proxy: string | null;
  refId: string;
}

// RPC errors meaning the stored session can never work again
const DEAD_SESSION_ERRORS = /AUTH_KEY_UNREGISTERED|AUTH_KEY_DUPLICATED|SESSION_REVOKED|USER_DEACTIVATED|PHONE_NUMBER_BANNED/;

interface SocksProxy {
  ip: string;
  port: number;
  socksType: 4 | 5;
  username?: string;
  password?: string;
}

/** MTProto only tunnels through SOCKS; http proxies are used for the game API alone. */
function toTelegramProxy(proxy: string | null): SocksProxy | undefined {
  if (!proxy) return undefined;
  const protocol = proxyProtocol(proxy);
  if (protocol !== "socks4" && protocol !== "socks5") return undefined;
  const url = new URL(proxy);
  return {
    ip: url.hostname,
    port: Number(url.port),
    socksType: protocol === "socks4" ? 4 : 5,
    username: url.username ? decodeURIComponent(url.username) : undefined,
    password: url.password ? decodeURIComponent(url.password) : undefined,
  };
}

export class TelegramWebAppAuth implements Authenticator {
  constructor(
    private readonly options: WebAppAuthOptions,
    private readonly logger: Logger = log
  ) {}

  async authenticate(): Promise<InitData> {
    const sessionString = (await readFile(this.options.sessionFile, "utf-8")).trim();
    if (!sessionString) {
      throw new AuthError("telegram", `session file ${this.options.sessionFile} is empty`);
    }

    const client = new TelegramClient(
      new sessions.StringSession(sessionString),
      this.options.apiId,
      this.options.apiHash,
      { connectionRetries: 5, proxy: toTelegramProxy(this.options.proxy) }
    );

    try {
      await client.connect();
      if (!(await client.checkAuthorization())) {
        throw new AuthError("telegram", "session is not authorized");
      }

      const bot = await client.getInputEntity(GAME_BOT_USERNAME);
      const result = await client.invoke(
        new Api.messages.RequestAppWebView({
          peer: bot,
          app: new Api.InputBotAppShortName({ botId: bot, shortName: GAME_APP_SHORT_NAME }),
          platform: "android",
          writeAllowed: true,
          startParam: this.options.refId,
        })
      );
      this.logger.debug("Received mini app URL");
      return parseWebAppUrl(result.url);
    } catch (error) {
      if (error instanceof AuthError) throw error;
      if (error instanceof errors.RPCError && DEAD_SESSION_ERRORS.test(error.errorMessage)) {
        throw new AuthError("telegram", error.errorMessage);
      }
      throw new NetworkError("telegram", errorMessage(error));
    } finally {
      await client.destroy();
    }
  }
}

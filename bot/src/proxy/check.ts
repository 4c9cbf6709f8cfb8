import axios from "axios";
import { errorMessage } from "../errors.js";
import { log } from "../utils/logger.js";
import { createProxyAgent, isSupportedProxy } from "./agent.js";

const CHECK_URL = "https://api.ipify.org";
const CHECK_TIMEOUT_MS = 15000;

export type ProxyChecker = (proxy: string) => Promise<boolean>;

/** True when the proxy answers with a plausible IPv4 address. */
export const checkProxy: ProxyChecker = async (proxy) => {
  if (!isSupportedProxy(proxy)) {
    log.warn(`Unsupported proxy: ${proxy}`);
    return false;
  }

  try {
    const agent = createProxyAgent(proxy);
    const response = await axios.get<string>(CHECK_URL, {
      httpAgent: agent,
      httpsAgent: agent,
      proxy: false,
      timeout: CHECK_TIMEOUT_MS,
      responseType: "text",
      validateStatus: () => true,
    });
    const ip = String(response.data).trim();
    if (response.status === 200 && /^\d{1,3}(\.\d{1,3}){3}$/.test(ip)) {
      log.proxy(`Proxy ${proxy} is alive, IP ${ip}`);
      return true;
    }
    log.warn(`Proxy ${proxy} gave an invalid answer (status ${response.status})`);
    return false;
  } catch (error) {
    log.warn(`Proxy ${proxy} didn't respond: ${errorMessage(error)}`);
    return false;
  }
};

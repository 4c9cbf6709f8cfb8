import { AuthError } from "../errors.js";
import type { InitData } from "../types.js";

/**
 * Extract the signed WebApp parameters from a mini app URL of the form
 * `https://...#tgWebAppData=<urlencoded>&tgWebAppVersion=...`.
 */
export function parseWebAppUrl(webviewUrl: string): InitData {
  const parts = webviewUrl.split("#tgWebAppData=");
  if (parts.length !== 2) {
    throw new AuthError("webview", "invalid URL format: missing tgWebAppData");
  }

  const encoded = parts[1].split("&tgWebAppVersion")[0];
  const decoded = decodeURIComponent(encoded);

  const params: InitData = {};
  for (const pair of decoded.split("&")) {
    const eq = pair.indexOf("=");
    if (eq === -1) continue;
    const key = pair.slice(0, eq);
    const value = pair.slice(eq + 1);
    // The user JSON is encoded twice
    params[key] = key === "user" ? decodeURIComponent(value) : value;
  }

  if (Object.keys(params).length === 0) {
    throw new AuthError("webview", "no parameters extracted from URL");
  }
  return params;
}

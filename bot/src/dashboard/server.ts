import { createServer, type Server } from "http";
import { readFileSync } from "fs";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import { WebSocketServer, WebSocket } from "ws";
import { dashboard as defaultEvents, type DashboardEvent, type DashboardEvents } from "./events.js";
import { errorMessage } from "../errors.js";
import { log } from "../utils/logger.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const HTML_PATH = join(__dirname, "../../dashboard/public/index.html");

export interface DashboardServer {
  close(): Promise<void>;
}

/**
 * Serve the status page and stream runner events over WebSocket. Returns
 * null when the page is missing or the port can't be bound; the bot keeps
 * running either way.
 */
export async function startDashboard(
  port: number,
  events: DashboardEvents = defaultEvents
): Promise<DashboardServer | null> {
  let html: string;
  try {
    html = readFileSync(HTML_PATH, "utf-8");
  } catch (error) {
    log.warn(`Dashboard HTML not found at ${HTML_PATH} (${errorMessage(error)}), dashboard disabled`);
    return null;
  }

  const server = createServer((req, res) => {
    if (req.url === "/" || req.url === "/index.html") {
      res.writeHead(200, { "Content-Type": "text/html" });
      res.end(html);
    } else if (req.url === "/api/sessions") {
      res.writeHead(200, { "Content-Type": "application/json" });
      res.end(JSON.stringify(events.getSessions()));
    } else {
      res.writeHead(404);
      res.end("Not found");
    }
  });

  const wss = new WebSocketServer({ server });

  wss.on("connection", (ws) => {
    // Init payload: per-session status and recent events
    const init = {
      type: "init",
      sessions: events.getSessions(),
      recentEvents: events.getRecentEvents(),
    };
    ws.send(JSON.stringify(init));
  });

  // Broadcast all events to connected clients
  const broadcast = (event: DashboardEvent) => {
    const msg = JSON.stringify(event);
    for (const client of wss.clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(msg);
      }
    }
  };
  events.on("event", broadcast);

  const listening = await new Promise<boolean>((resolve) => {
    server.on("error", (err: NodeJS.ErrnoException) => {
      if (err.code === "EADDRINUSE") {
        log.warn(`Dashboard port ${port} is busy, dashboard disabled`);
      } else {
        log.warn(`Dashboard server error: ${err.message}`);
      }
      resolve(false);
    });

    server.listen(port, () => {
      log.success(`Dashboard running at http://localhost:${port}`);
      resolve(true);
    });
  });

  if (!listening) {
    events.off("event", broadcast);
    wss.close();
    return null;
  }

  return { close: () => closeServer(server, wss, () => events.off("event", broadcast)) };
}

function closeServer(server: Server, wss: WebSocketServer, detach: () => void): Promise<void> {
  detach();
  for (const client of wss.clients) client.terminate();
  wss.close();
  return new Promise((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
}

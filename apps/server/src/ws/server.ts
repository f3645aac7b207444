import http from "http";
import { parse as parseUrl } from "url";
import express from "express";
import { WebSocketServer, WebSocket } from "ws";
import { EventStreamMessage, toWireEvent } from "@rps-arena/core";
import { MatchService } from "../services/MatchService";
import { bindRoutes } from "../routes/index";
import { errorHandler } from "../routes/errors";
import log from "../logger";

const HEARTBEAT_INTERVAL_MS = 30_000;
const PONG_TIMEOUT_MS = 10_000;
const BACKLOG_LIMIT = 1000;

export interface HttpWsServer {
  app: express.Express;
  httpServer: http.Server;
  eventsWss: WebSocketServer;
  /** Stop forwarding engine events and close every socket. */
  close(): Promise<void>;
}

export function createHttpWsServer(matchService: MatchService): HttpWsServer {
  const app = express();

  // CORS — allow cross-origin requests from any origin
  app.use((_req, res, next) => {
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");
    if (_req.method === "OPTIONS") {
      res.sendStatus(204);
      return;
    }
    next();
  });

  app.use(express.json());

  bindRoutes(app, matchService);
  app.use(errorHandler);

  const httpServer = http.createServer(app);
  const eventsWss = new WebSocketServer({ noServer: true });

  httpServer.on("upgrade", (request, socket, head) => {
    const { pathname } = parseUrl(request.url || "");
    if (pathname !== "/ws/events") {
      socket.destroy();
      return;
    }
    eventsWss.handleUpgrade(request, socket, head, (ws) => {
      eventsWss.emit("connection", ws, request);
    });
  });

  eventsWss.on("connection", (ws: WebSocket, request: http.IncomingMessage) => {
    const after = parseAfter(request.url);
    log.info({ after }, "Event stream connection");
    setupHeartbeat(ws);

    // replay what the client missed since `after`
    if (after !== null) {
      for (const record of matchService.engine.getEvents(after, BACKLOG_LIMIT)) {
        send(ws, { type: "EVENT", event: toWireEvent(record) });
      }
    }
  });

  const unsubscribe = matchService.engine.subscribe((record) => {
    const message: EventStreamMessage = { type: "EVENT", event: toWireEvent(record) };
    for (const client of eventsWss.clients) {
      send(client, message);
    }
  });

  const close = () =>
    new Promise<void>((resolve, reject) => {
      unsubscribe();
      for (const client of eventsWss.clients) {
        client.terminate();
      }
      eventsWss.close();
      httpServer.close((err) => (err ? reject(err) : resolve()));
    });

  return { app, httpServer, eventsWss, close };
}

function parseAfter(url: string | undefined): number | null {
  const { query } = parseUrl(url || "", true);
  const raw = query.after;
  if (typeof raw !== "string" || !/^-?\d+$/.test(raw)) {
    return null;
  }
  return parseInt(raw, 10);
}

function send(ws: WebSocket, message: EventStreamMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

function setupHeartbeat(ws: WebSocket): void {
  let alive = true;
  let pongTimer: ReturnType<typeof setTimeout> | null = null;

  const interval = setInterval(() => {
    if (!alive) {
      clearInterval(interval);
      ws.terminate();
      return;
    }
    alive = false;
    ws.ping();
    pongTimer = setTimeout(() => {
      if (!alive) {
        clearInterval(interval);
        ws.terminate();
      }
    }, PONG_TIMEOUT_MS);
  }, HEARTBEAT_INTERVAL_MS);

  ws.on("pong", () => {
    alive = true;
    if (pongTimer) {
      clearTimeout(pongTimer);
      pongTimer = null;
    }
  });

  ws.on("close", () => {
    clearInterval(interval);
    if (pongTimer) clearTimeout(pongTimer);
  });
}

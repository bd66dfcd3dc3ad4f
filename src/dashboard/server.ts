import express from "express";
import { createServer, type IncomingMessage } from "http";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import { WebSocketManager } from "./websocket.js";
import type { AlertEvent } from "../alerts/types.js";
import type { SensorDescriptor } from "../collector/types.js";
import type { MetricsSnapshot } from "./snapshot.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const PUBLIC_DIR = resolve(__dirname, "../../public");

export interface DashboardDependencies {
  getSnapshot: () => MetricsSnapshot;
  getLastTick: () => number | null;
  getSensors: () => SensorDescriptor[];
  getActiveAlerts: () => string[];
  getRecentAlerts: () => AlertEvent[];
}

export interface DashboardOptions {
  port: number;
  /** Home Assistant ingress prefix; routes are served there as well as at "/". */
  ingressPath?: string;
  host?: string;
}

/**
 * Drops the ingress prefix from a request URL so that one set of routes, and
 * the socket.io endpoint, answer under both "/" and the prefix.
 */
export function stripIngressPrefix(url: string, prefix: string): string {
  if (!prefix || !url.startsWith(prefix)) return url;
  const rest = url.slice(prefix.length);
  if (rest === "") return "/";
  if (rest.startsWith("/")) return rest;
  if (rest.startsWith("?")) return `/${rest}`;
  return url;
}

export class DashboardServer {
  private app: express.Application;
  private httpServer: ReturnType<typeof createServer>;
  private wsManager: WebSocketManager;
  private port: number;
  private host: string | undefined;
  private ingressPath: string;
  private deps: DashboardDependencies;

  constructor(options: DashboardOptions, deps: DashboardDependencies) {
    this.port = options.port;
    this.host = options.host;
    this.ingressPath = (options.ingressPath ?? "").replace(/\/+$/, "");
    this.deps = deps;
    this.app = express();
    this.httpServer = createServer(this.app);
    this.wsManager = new WebSocketManager(this.httpServer);

    if (this.ingressPath) {
      // Prepended so the rewrite runs ahead of socket.io's own listeners
      const rewrite = (req: IncomingMessage) => {
        if (req.url) req.url = stripIngressPrefix(req.url, this.ingressPath);
      };
      this.httpServer.prependListener("request", rewrite);
      this.httpServer.prependListener("upgrade", rewrite);
    }

    this.wsManager.on("state-requested", (socketId: string) => {
      this.wsManager.sendToSocket(socketId, "metrics", this.deps.getSnapshot());
    });

    this.setupRoutes();
  }

  private createRouter(): express.Router {
    const router = express.Router();

    router.get("/api/metrics", (req, res) => {
      res.json(this.deps.getSnapshot());
    });

    router.get("/api/sensors", (req, res) => {
      res.json(this.deps.getSensors());
    });

    router.get("/api/alerts", (req, res) => {
      res.json({
        active: this.deps.getActiveAlerts(),
        recent: this.deps.getRecentAlerts(),
      });
    });

    router.get("/api/health", (req, res) => {
      res.json({ status: "healthy", lastTick: this.deps.getLastTick() });
    });

    router.use(express.static(PUBLIC_DIR));

    return router;
  }

  private setupRoutes(): void {
    this.app.use("/", this.createRouter());

    this.app.use((req, res) => {
      if (req.path.startsWith("/api/")) {
        res.status(404).json({ error: "Not found" });
        return;
      }
      res.sendFile(resolve(PUBLIC_DIR, "index.html"));
    });
  }

  broadcastMetrics(snapshot: MetricsSnapshot): void {
    this.wsManager.broadcastMetrics(snapshot);
  }

  broadcastAlert(event: AlertEvent): void {
    this.wsManager.broadcastAlert(event);
  }

  /** Bound port; differs from the configured one when that was 0. */
  getPort(): number {
    const address = this.httpServer.address();
    return address !== null && typeof address === "object" ? address.port : this.port;
  }

  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.httpServer.once("error", reject);
      this.httpServer.listen(this.port, this.host, () => {
        this.httpServer.removeListener("error", reject);
        console.log(`[Dashboard] Running at http://localhost:${this.getPort()}${this.ingressPath}`);
        resolve();
      });
    });
  }

  stop(): Promise<void> {
    if (!this.httpServer.listening) return Promise.resolve();
    return new Promise((resolve, reject) => {
      this.wsManager.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }
}

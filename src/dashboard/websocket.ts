import { Server as SocketIOServer } from "socket.io";
import { EventEmitter } from "events";
import type { Server as HTTPServer } from "http";
import type { AlertEvent } from "../alerts/types.js";
import type { MetricsSnapshot } from "./snapshot.js";

export class WebSocketManager extends EventEmitter {
  private io: SocketIOServer;

  constructor(httpServer: HTTPServer, path: string = "/socket.io") {
    super();
    this.io = new SocketIOServer(httpServer, {
      path,
      cors: {
        origin: "*",
        methods: ["GET"],
      },
    });

    this.io.on("connection", (socket) => {
      console.log(`[WebSocket] Client connected: ${socket.id}`);

      socket.on("disconnect", () => {
        console.log(`[WebSocket] Client disconnected: ${socket.id}`);
      });

      socket.on("request-state", () => {
        super.emit("state-requested", socket.id);
      });
    });
  }

  broadcastMetrics(metrics: MetricsSnapshot): void {
    this.io.emit("metrics", metrics);
  }

  broadcastAlert(event: AlertEvent): void {
    this.io.emit("alert", event);
  }

  sendToSocket(socketId: string, event: string, data: unknown): void {
    this.io.to(socketId).emit(event, data);
  }

  /** Disconnects every client and closes the underlying HTTP server. */
  close(callback: (err?: Error) => void): void {
    void this.io.close(callback);
  }
}

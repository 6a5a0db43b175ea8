import express from "express";
import type { Server } from "http";
import { createLogger } from "./logger.js";
import { closeDatabase } from "./db/client.js";
import { createOrganizationsRouter, type OrganizationRouteDeps } from "./routes/organizations.js";

const logger = createLogger("http-server");

/**
 * Dashboard API server
 */
export class HTTPServer {
  private app: express.Application;
  private server: Server | null = null;
  private shutdownHandlersInstalled = false;

  constructor(private readonly deps: OrganizationRouteDeps) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  /** Express app, for mounting or for supertest */
  get application(): express.Application {
    return this.app;
  }

  private setupMiddleware(): void {
    this.app.use(express.json({ limit: "100kb" }));

    this.app.use((req, res, next) => {
      const startedAt = Date.now();
      res.on("finish", () => {
        logger.debug(
          { method: req.method, path: req.path, status: res.statusCode, durationMs: Date.now() - startedAt },
          "Request completed"
        );
      });
      next();
    });
  }

  private setupRoutes(): void {
    this.app.get("/health", (_req, res) => {
      const stats = this.deps.registry.stats();
      res.json({ status: "ok", organizations: stats.total });
    });

    this.app.use("/api", createOrganizationsRouter(this.deps));

    this.app.use((_req, res) => {
      res.status(404).json({ error: "Not found" });
    });
  }

  async start(port: number = 3000): Promise<void> {
    await new Promise<void>((resolve) => {
      this.server = this.app.listen(port, () => {
        logger.info({ port, api: `http://localhost:${port}/api/organizations` }, "Dashboard API running");
        resolve();
      });
    });
    this.setupShutdownHandlers();
  }

  /**
   * Setup graceful shutdown handlers for SIGTERM and SIGINT
   */
  private setupShutdownHandlers(): void {
    if (this.shutdownHandlersInstalled) return;
    this.shutdownHandlersInstalled = true;

    const gracefulShutdown = async (signal: string) => {
      logger.info({ signal }, "Received shutdown signal, starting graceful shutdown");
      try {
        await this.stop();
        process.exit(0);
      } catch (error) {
        logger.error({ err: error }, "Graceful shutdown failed");
        process.exit(1);
      }
    };

    process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
    process.on("SIGINT", () => void gracefulShutdown("SIGINT"));
  }

  /**
   * Stop the server gracefully
   */
  async stop(): Promise<void> {
    logger.info("Stopping HTTP server");

    const server = this.server;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
      this.server = null;
    }

    await closeDatabase();
    logger.info("HTTP server stopped");
  }
}

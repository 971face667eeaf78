import express, { type NextFunction, type Request, type Response } from "express";
import { createServer } from "http";
import { loadConfig } from "./config";
import { log } from "./log";
import { registerRoutes } from "./routes";

const app = express();
const httpServer = createServer(app);

app.use(express.json());
app.use(express.urlencoded({ extended: false }));

app.use((req, res, next) => {
  const start = Date.now();
  const path = req.path;

  res.on("finish", () => {
    const duration = Date.now() - start;
    if (path.startsWith("/api")) {
      log(`${req.method} ${path} ${res.statusCode} in ${duration}ms`);
    }
  });

  next();
});

async function main(): Promise<void> {
  const config = loadConfig();
  await registerRoutes(httpServer, app, { assumptions: config.assumptions });

  app.use((err: Error & { status?: number; statusCode?: number }, _req: Request, res: Response, _next: NextFunction) => {
    const status = err.status || err.statusCode || 500;
    console.error("Unhandled request error:", err);
    res.status(status).json({ error: status === 500 ? "Internal Server Error" : err.message });
  });

  httpServer.listen(config.port, config.host, () => {
    log(`serving on ${config.host}:${config.port}`);
  });
}

main().catch((err) => {
  console.error("Failed to start server:", err);
  process.exit(1);
});

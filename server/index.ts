import express, { type NextFunction, type Request, type Response } from "express";
import { config } from "./config";
import { log } from "./log";
import { registerRoutes } from "./routes";
import { services } from "./storage";

const app = express();
app.use(express.json({ limit: "10mb" }));
app.use(express.urlencoded({ extended: false }));

app.use((req: Request, res: Response, next: NextFunction) => {
  const start = Date.now();
  const path = req.path;

  res.on("finish", () => {
    if (path.startsWith("/api")) {
      const duration = Date.now() - start;
      log(`${req.method} ${path} ${res.statusCode} in ${duration}ms`);
    }
  });

  next();
});

registerRoutes(app, services);

async function main() {
  await services.settings.seedDefaults();
  app.listen(config.PORT, "0.0.0.0", () => {
    log(`serving on port ${config.PORT}`);
  });
}

main().catch((error: unknown) => {
  console.error("Failed to start server:", error);
  process.exit(1);
});

import express from "express";
import { resolveRoutes } from "./routes/resolve-routes";
import { ResolutionService } from "./services/resolution-service";

export function createApp(service: ResolutionService): express.Express {
  const app = express();

  // Middleware
  app.use(express.json());

  // Routes
  app.use("/api/resolve", resolveRoutes(service));

  // Health check endpoint
  app.get("/health", (req, res) => {
    res.status(200).json({ status: "UP" });
  });

  // Error handling middleware
  app.use(
    (
      err: Error,
      req: express.Request,
      res: express.Response,
      next: express.NextFunction
    ) => {
      console.error(err.stack);
      res.status(500).json({ error: "Internal Server Error" });
    }
  );

  return app;
}

export default createApp;

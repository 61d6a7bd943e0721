import { Router } from "express";
import { ResolveController } from "../controllers/resolve-controller";
import { ResolutionService } from "../services/resolution-service";

export function resolveRoutes(service: ResolutionService): Router {
  const router = Router();
  const controller = new ResolveController(service);

  router.get("/", controller.lookup);

  return router;
}

import { NextFunction, Request, Response } from "express";
import { InvalidIpAddressError } from "../models/errors";
import { ResolutionService } from "../services/resolution-service";

/**
 * HTTP handlers for address resolution
 */
export class ResolveController {
  constructor(private readonly service: ResolutionService) {}

  // GET /api/resolve?ip=x.x.x.x
  lookup = async (
    req: Request,
    res: Response,
    next: NextFunction
  ): Promise<void> => {
    const ip = req.query.ip;

    if (typeof ip !== "string" || ip === "") {
      res.status(400).json({ error: "Missing required query parameter: ip" });
      return;
    }

    try {
      console.log(`Resolving ownership for IP: ${ip}`);
      res.status(200).json(await this.service.resolve(ip));
    } catch (error) {
      if (error instanceof InvalidIpAddressError) {
        res.status(400).json({ error: "Invalid IP address format", ip });
        return;
      }
      next(error);
    }
  };
}

import { NextFunction, Request, Response } from "express";
import { AppError } from "../middleware/error.middleware";
import { extensionsQuerySchema } from "../schemas/request.schemas";
import { ShDataSchemaCache } from "../services/schemaCache.service";
import { ShDataService } from "../services/shData.service";

const readExtensions = (req: Request): readonly string[] | undefined => {
  const result = extensionsQuerySchema.safeParse(req.query);
  if (!result.success) {
    throw new AppError(400, "Query parameter 'extensions' must be a comma-separated list");
  }
  return result.data.extensions;
};

export class ShDataController {
  constructor(
    private readonly shDataService: ShDataService = ShDataService.getInstance(),
    private readonly schemaCache: ShDataSchemaCache = ShDataSchemaCache.getInstance(),
  ) {}

  /**
   * POST /api/v1/sh-data/render
   * Renders the Sh-Data document for the subscriber record in the body
   */
  public render = (req: Request, res: Response, next: NextFunction): void => {
    try {
      const xml = this.shDataService.render(req.body, readExtensions(req));
      res.status(200).type("application/xml").send(xml);
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/v1/sh-data/schema/fields
   * Presence policy table for the selected schema
   */
  public fieldPolicies = (req: Request, res: Response, next: NextFunction): void => {
    try {
      const fields = this.shDataService.getFieldPolicies(readExtensions(req));
      res.status(200).json({ success: true, count: fields.length, data: fields });
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/v1/sh-data/schema/cache
   */
  public cacheStats = (_req: Request, res: Response): void => {
    res.status(200).json({ success: true, data: this.schemaCache.getCacheStats() });
  };

  /**
   * DELETE /api/v1/sh-data/schema/cache
   */
  public clearCache = (_req: Request, res: Response): void => {
    const invalidated = this.schemaCache.invalidateAll();
    res.status(200).json({ success: true, invalidated });
  };
}

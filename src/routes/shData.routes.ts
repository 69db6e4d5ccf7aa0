import { Router } from "express";
import { ShDataController } from "../controllers/shData.controller";
import { validate } from "../middleware/validation.middleware";
import { subscriberProfileInputSchema } from "../schemas/request.schemas";

const router = Router();
const controller = new ShDataController();

router.post("/render", validate(subscriberProfileInputSchema), controller.render);
router.get("/schema/fields", controller.fieldPolicies);
router.get("/schema/cache", controller.cacheStats);
router.delete("/schema/cache", controller.clearCache);

export default router;

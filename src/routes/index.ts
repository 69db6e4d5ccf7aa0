import { Router } from "express";
import shDataRoutes from "./shData.routes";

const router = Router();

router.use("/sh-data", shDataRoutes);

export default router;

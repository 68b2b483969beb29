import { Router } from "express";

import { analysisController } from "../controllers/analysis.controller";

export const exportRouter = Router();

exportRouter.get("/levels/:level/:group", (req, res, next) => {
  analysisController.exportEncounters(req, res).catch(next);
});

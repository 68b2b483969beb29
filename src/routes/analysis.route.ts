import { Router } from "express";

import { analysisController } from "../controllers/analysis.controller";

export const analysisRouter = Router();

analysisRouter.get("/summary", (req, res, next) => {
  analysisController.getSummary(req, res).catch(next);
});

analysisRouter.get("/levels/:level/items", (req, res, next) => {
  analysisController.getItems(req, res).catch(next);
});

analysisRouter.get("/levels/:level/encounters/:group", (req, res, next) => {
  analysisController.getEncounters(req, res).catch(next);
});

analysisRouter.post("/run", (req, res, next) => {
  analysisController.runAnalysis(req, res).catch(next);
});

analysisRouter.put("/dataset", (req, res, next) => {
  analysisController.replaceDataset(req, res).catch(next);
});

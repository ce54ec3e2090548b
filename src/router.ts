import express, { Router } from "express";
import {
  HitIngestionService,
  hitPostHandler,
} from "./scoreboard-service/hitIngestion";
import {
  ScoreboardQueryService,
  scoreboardGetHandler,
} from "./scoreboard-service/scoreboardQuery";

export interface ScoreServices {
  hitIngestion: HitIngestionService;
  scoreboardQuery: ScoreboardQueryService;
}

//hit bodies are decoded as json whatever the content type says
const hitBodyParser = express.json({
  type: () => true,
  strict: false,
  verify: (_req, _res, buf) => {
    if (buf.length === 0) {
      throw new Error("Request body is empty");
    }
  },
});

export const createScoreRouter = (services: ScoreServices): [string, Router] => {
  const router = Router();

  router.post("/hit", hitBodyParser, hitPostHandler(services.hitIngestion));
  router.get("/scoreboard", scoreboardGetHandler(services.scoreboardQuery));

  return ["/", router];
};

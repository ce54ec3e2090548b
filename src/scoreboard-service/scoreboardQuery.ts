import type { NextFunction, Request, Response } from "express";
import type { IParticipant, IParticipantStore } from "../types";
import { ScoreboardCache } from "../utils/memory";
import {
  FETCH_FAILED_MESSAGE,
  StoreFault,
  withTimeout,
} from "../utils/data-helpers";

export class ScoreboardQueryService {
  constructor(
    private readonly store: IParticipantStore,
    private readonly cache: ScoreboardCache,
    private readonly storeTimeoutMs: number
  ) {}

  /**
   * Participants by score, highest first. Order among equal scores is
   * whatever the store yields and is not stable across reads.
   */
  async getScoreboard(): Promise<IParticipant[]> {
    const cached = this.cache.get();
    if (cached) {
      return cached;
    }

    let participants: IParticipant[];
    try {
      participants = await withTimeout(
        this.store.listByScore(),
        this.storeTimeoutMs,
        "listByScore"
      );
    } catch (error) {
      throw new StoreFault(FETCH_FAILED_MESSAGE, error);
    }

    this.cache.put(participants);
    return participants;
  }
}

export const scoreboardGetHandler =
  (service: ScoreboardQueryService) =>
  async (_req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      res.status(200).json(await service.getScoreboard());
    } catch (error) {
      next(error);
    }
  };

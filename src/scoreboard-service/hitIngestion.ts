import type { NextFunction, Request, Response } from "express";
import type { IParticipantStore } from "../types";
import { RateLimiter } from "../utils/memory";
import {
  ClientInputFault,
  HIT_RECORDED_MESSAGE,
  INVALID_INPUT_MESSAGE,
  RateLimitFault,
  StoreFault,
  UPDATE_FAILED_MESSAGE,
  withTimeout,
} from "../utils/data-helpers";
import {
  hitPayloadSchema,
  nameSchema,
  rollNumberSchema,
  type HitPayload,
} from "../utils/validations";

//malformed body, then roll number, then name; the first failure wins
export const parseHit = (body: unknown): HitPayload => {
  if (typeof body !== "object" || Array.isArray(body)) {
    throw new ClientInputFault(INVALID_INPUT_MESSAGE, "text");
  }

  //a json null decodes like an empty object
  const payload = hitPayloadSchema.safeParse(body ?? {});
  if (!payload.success) {
    throw new ClientInputFault(INVALID_INPUT_MESSAGE, "text");
  }

  const rollNumber = rollNumberSchema.safeParse(payload.data.rollNumber);
  if (!rollNumber.success) {
    throw new ClientInputFault(rollNumber.error.issues[0].message);
  }

  const name = nameSchema.safeParse(payload.data.name);
  if (!name.success) {
    throw new ClientInputFault(name.error.issues[0].message);
  }

  return payload.data;
};

export class HitIngestionService {
  constructor(
    private readonly store: IParticipantStore,
    private readonly rateLimiter: RateLimiter,
    private readonly storeTimeoutMs: number
  ) {}

  async recordHit(body: unknown): Promise<void> {
    const hit = parseHit(body);

    if (this.rateLimiter.check(hit.rollNumber)) {
      throw new RateLimitFault(hit.rollNumber);
    }
    //recorded before the write so a concurrent resubmission is throttled
    this.rateLimiter.record(hit.rollNumber);

    try {
      await withTimeout(
        this.store.incrementScore({ ...hit, playedAt: new Date() }),
        this.storeTimeoutMs,
        "incrementScore"
      );
    } catch (error) {
      throw new StoreFault(UPDATE_FAILED_MESSAGE, error);
    }
  }
}

export const hitPostHandler =
  (service: HitIngestionService) =>
  async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      await service.recordHit(req.body);
      res.status(200).json({ message: HIT_RECORDED_MESSAGE });
    } catch (error) {
      next(error);
    }
  };

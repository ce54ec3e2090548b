import z from "zod";
import {
  INVALID_ROLL_NUMBER_MESSAGE,
  NAME_REQUIRED_MESSAGE,
  ROLL_NUMBER_PATTERN,
} from "./data-helpers";

//shape of the /hit body, absent or null fields fall back to empty values
export const hitPayloadSchema = z.object({
  rollNumber: z
    .string({ invalid_type_error: "Roll number must be a string" })
    .nullish()
    .transform((value) => value ?? ""),
  name: z
    .string({ invalid_type_error: "Name must be a string" })
    .nullish()
    .transform((value) => value ?? ""),
  shot: z
    .number({ invalid_type_error: "Shot must be a number" })
    .int("Shot must be an integer")
    .nullish()
    .transform((value) => value ?? 0),
});

export type HitPayload = z.infer<typeof hitPayloadSchema>;

export const rollNumberSchema = z
  .string()
  .regex(ROLL_NUMBER_PATTERN, INVALID_ROLL_NUMBER_MESSAGE);

export const nameSchema = z.string().min(1, NAME_REQUIRED_MESSAGE);

const optionalNumber = (fallback: number) =>
  z.preprocess(
    (value) => (value === "" ? undefined : value),
    z.coerce.number().int().nonnegative().default(fallback)
  );

//environment, read once at startup
export const configSchema = z.object({
  MONGODB_URI: z
    .string({ required_error: "environment variable is required" })
    .min(1, "environment variable is required"),
  MONGODB_DB: z
    .string()
    .optional()
    .transform((value) => (value ? value : undefined)),
  PORT: optionalNumber(9000),
  RATE_LIMIT_MS: optionalNumber(2000),
  CACHE_TTL_MS: optionalNumber(2000),
  STORE_TIMEOUT_MS: optionalNumber(5000),
  RATE_LIMIT_SWEEP_MS: optionalNumber(0),
});

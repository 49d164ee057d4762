/**
 * Input validation for dealing requests.
 */

import { z } from "zod";
import { InvalidRequestError } from "./errors.js";
import type { ClosePositionRequest, OpenPositionRequest } from "../types/position.js";

/** Validate an instrument epic, e.g. CS.D.EURUSD.MINI.IP */
export const EpicSchema = z
  .string()
  .min(1)
  .max(64)
  .regex(/^[A-Za-z0-9._-]+$/, "Epic may only contain letters, digits, '.', '_' and '-'");

/** Deal identifiers are used as a URL path segment */
export const DealIdSchema = z
  .string()
  .min(1, "Deal ID must not be empty")
  .regex(/^[A-Za-z0-9_-]+$/, "Deal ID may only contain letters, digits, '_' and '-'");

export const CurrencyCodeSchema = z
  .string()
  .regex(/^[A-Z]{3}$/, "Currency code must be 3 uppercase letters");

/** Validate OTC open-position parameters */
export const OpenPositionParamsSchema = z
  .object({
    epic: EpicSchema,
    direction: z.enum(["BUY", "SELL"]),
    size: z.number().positive(),
    currencyCode: CurrencyCodeSchema,
    expiry: z.string().min(1).default("-"),
    orderType: z.enum(["MARKET", "LIMIT"]).default("MARKET"),
    level: z.number().positive().optional(),
    stopDistance: z.number().positive().optional(),
    limitDistance: z.number().positive().optional(),
    guaranteedStop: z.boolean().default(false),
    forceOpen: z.boolean().default(true),
  })
  .refine((p) => p.orderType !== "LIMIT" || p.level !== undefined, {
    message: "A LIMIT order needs a level",
    path: ["level"],
  })
  .refine((p) => p.orderType !== "MARKET" || p.level === undefined, {
    message: "A MARKET order must not set a level",
    path: ["level"],
  })
  .refine((p) => !p.guaranteedStop || p.stopDistance !== undefined, {
    message: "A guaranteed stop needs a stop distance",
    path: ["stopDistance"],
  });

export type OpenPositionParams = z.output<typeof OpenPositionParamsSchema>;

export const ClosePositionParamsSchema = z.object({
  dealId: DealIdSchema,
  size: z.number().positive().optional(),
});

function validate<T extends z.ZodTypeAny>(schema: T, input: unknown, what: string): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.join(".") || what;
    throw new InvalidRequestError(`Invalid ${what}: ${field}: ${issue.message}`, result.error.issues);
  }
  return result.data;
}

export function validateOpenPosition(request: OpenPositionRequest): OpenPositionParams {
  return validate(OpenPositionParamsSchema, request, "open position request");
}

export function validateClosePosition(request: ClosePositionRequest): ClosePositionRequest {
  return validate(ClosePositionParamsSchema, request, "close position request");
}

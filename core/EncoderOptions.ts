import { z } from "zod";
import { FIRST_LABEL_OFFSET } from "../schema/Label";
import { MAX_ENCODABLE_OFFSET } from "../utils/OffsetCodec";
import { logger as defaultLogger, Logger } from "../utils/logger";

export const DEFAULT_GROWTH_STEP = 2048;

const optionsSchema = z.object({
  growthStep: z.number().int().positive().default(DEFAULT_GROWTH_STEP),
  // room for at least one single-byte label after the reserved prefix
  maxCapacity: z
    .number()
    .int()
    .min(FIRST_LABEL_OFFSET + 2)
    .max(MAX_ENCODABLE_OFFSET)
    .default(MAX_ENCODABLE_OFFSET),
});

export interface HostnameEncoderOptions {
  /** Bytes added to the label buffer each time it runs out of room. */
  growthStep?: number;
  /** Hard ceiling on the label buffer; appends past it fail. */
  maxCapacity?: number;
  logger?: Logger;
}

export interface ResolvedEncoderOptions {
  growthStep: number;
  maxCapacity: number;
  logger: Logger;
}

export function resolveEncoderOptions(
  options: HostnameEncoderOptions = {}
): ResolvedEncoderOptions {
  const { growthStep, maxCapacity } = optionsSchema.parse({
    growthStep: options.growthStep,
    maxCapacity: options.maxCapacity,
  });

  return {
    growthStep,
    maxCapacity,
    logger: options.logger ?? defaultLogger,
  };
}

/**
 * Funding Schemas
 * Terms a proposal's crowdfunding campaign is initialized with
 *
 * @version 1.0.0
 */

import { z } from "zod";
import {
  accountIdSchema,
  epochWindowSchema,
  positiveAmountSchema,
} from "./common.js";

export const fundingTermsSchema = z
  .object({
    fundable: z.boolean(),
    window: epochWindowSchema,
    minGoal: positiveAmountSchema,
    targetGoal: positiveAmountSchema,
    beneficiary: accountIdSchema,
  })
  .refine((terms) => terms.targetGoal >= terms.minGoal, {
    message: "Target goal must be at least the minimum goal",
    path: ["targetGoal"],
  });

export type FundingTerms = z.infer<typeof fundingTermsSchema>;

export const fundingPhaseSchema = z.enum([
  "CLOSED", // not fundable
  "NOT_STARTED",
  "OPEN",
  "SUCCEEDED",
  "FAILED",
]);

export type FundingPhase = z.infer<typeof fundingPhaseSchema>;

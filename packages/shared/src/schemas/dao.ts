/**
 * DAO Registry Schemas
 */

import { z } from "zod";
import { accountIdSchema } from "./common.js";

export const daoRegistrationSchema = z.object({
  id: accountIdSchema,
  name: z.string().trim().min(1, "Name is required").max(64),
  description: z.string().trim().max(1024).default(""),
  url: z.string().url().optional(),
});

export type DaoRegistrationInput = z.input<typeof daoRegistrationSchema>;
export type DaoRegistration = z.output<typeof daoRegistrationSchema>;

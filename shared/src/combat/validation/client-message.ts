/**
 * Combat - Client envelope & connection parameters
 */

import { z } from "zod";
import { CLIENT_MESSAGE_TYPES } from "../types/events";

export const clientMessageSchema = z.object({
  type: z.enum(CLIENT_MESSAGE_TYPES),
  payload: z.record(z.string(), z.unknown()).default({}),
  requestId: z.string().optional(),
});

export const connectionParamsSchema = z.object({
  campaignId: z.string().trim().min(1),
  userId: z.string().trim().min(1),
  characterId: z
    .string()
    .trim()
    .optional()
    .transform((value) => (value ? value : null)),
  isDm: z
    .enum(["true", "false"])
    .default("false")
    .transform((value) => value === "true"),
});

export type ConnectionParams = z.infer<typeof connectionParamsSchema>;

export const submitChoiceSchema = z.object({
  choice: z.string().trim().min(1),
});

import { z } from "zod";
import { FROZEN_FIELDS } from "../analytics/reconcile.js";

/* ---------- Main config schema ---------- */

export const ConfigSchema = z.object({
  /** Asset every balance and trade figure is valued in. */
  quoteAsset: z.string().min(1).default("USDT"),

  /* ---- Aging palette ---- */
  freshWindowSeconds: z.number().positive().default(300),
  visualDegradations: z.number().int().min(2).default(12),

  /* ---- Reconciliation ---- */
  reconcileFields: z.array(z.string().min(1)).min(1).default([...FROZEN_FIELDS]),
});

export type Config = z.infer<typeof ConfigSchema>;

/* ---------- Environment schema ---------- */

const optionalNumber = z
  .string()
  .trim()
  .min(1)
  .transform((v) => Number(v))
  .pipe(z.number().finite())
  .optional();

export const EnvSchema = z.object({
  QUOTE_ASSET: z.string().trim().min(1).optional(),
  FRESH_WINDOW_S: optionalNumber,
  N_VISUAL_DEGRADATIONS: optionalNumber,
});

export type Env = z.infer<typeof EnvSchema>;

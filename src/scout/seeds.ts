import { readFileSync } from "fs";

import { z } from "zod";

import { ValidationError } from "../lib/errors.js";
import { AttackCategorySchema, SeveritySchema } from "../store/schema.js";

import type { NewTechnique } from "../store/schema.js";

const SeedFileSchema = z.array(
  z.object({
    name: z.string().min(1),
    category: AttackCategorySchema,
    source: z.string(),
    rawPayload: z.string().min(1),
    severity: SeveritySchema,
  })
);

export const DEFAULT_SEED_FILE = new URL("../../data/seed-techniques.json", import.meta.url);

/**
 * Real-world technique templates inserted on the first scout run
 */
export function loadSeedTechniques(file: URL | string = DEFAULT_SEED_FILE): NewTechnique[] {
  const parsed = SeedFileSchema.safeParse(JSON.parse(readFileSync(file, "utf-8")));
  if (!parsed.success) {
    throw new ValidationError("Invalid seed technique file", { issues: parsed.error.issues });
  }
  return parsed.data;
}

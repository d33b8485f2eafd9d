/**
 * Reconnaissance: a situational brief built from the catalog alone.
 */

import { ATTACK_CATEGORIES } from "../store/schema.js";

import type { ActivityLog } from "../store/activity-log.js";
import type { Technique } from "../store/schema.js";
import type { TechniqueStore } from "../store/technique-store.js";

/** Categories with fewer techniques than this count as under-explored */
export const UNEXPLORED_THRESHOLD = 3;
export const WEAK_CATEGORY_LIMIT = 5;
export const RECENT_BYPASS_LIMIT = 5;

export interface WeakCategory {
  category: string;
  total: number;
  tested: number;
  blocked: number;
  /** blocked / tested */
  blockRate: number;
}

export interface ReconBrief {
  weakCategories: WeakCategory[];
  unexploredCategories: string[];
  recentBypasses: Technique[];
  totalTechniques: number;
  /** Count of prior scout scans */
  generation: number;
}

export async function buildRecon(techniques: TechniqueStore, activity: ActivityLog): Promise<ReconBrief> {
  const [stats, recentBypasses, totalTechniques, generation] = await Promise.all([
    techniques.categoryStats(),
    techniques.recentBypasses(RECENT_BYPASS_LIMIT),
    techniques.count(),
    activity.count("scout", "scan"),
  ]);

  const weakCategories = stats
    .filter((s) => s.tested > 0)
    .map((s) => ({ ...s, blockRate: s.blocked / s.tested }))
    .sort((a, b) => a.blockRate - b.blockRate)
    .slice(0, WEAK_CATEGORY_LIMIT);

  const totals = new Map(stats.map((s) => [s.category, s.total]));
  const unexploredCategories = ATTACK_CATEGORIES.filter(
    (category) => (totals.get(category) ?? 0) < UNEXPLORED_THRESHOLD
  );

  return { weakCategories, unexploredCategories, recentBypasses, totalTechniques, generation };
}

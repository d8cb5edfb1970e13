/**
 * Stages of the event series and their vlr.gg category ids.
 */

export const STAGE_KEYS = ["kickoff", "masters", "stage1", "stage2", "champions"] as const;

export type StageKey = (typeof STAGE_KEYS)[number];

export interface StageDefinition {
  /** Category id used by the site's `?stage=` filter. */
  readonly categoryId: number;

  /** Display name, also the keyword looked for in calendar summaries. */
  readonly name: string;

  /** Whether the stage is currently being played. */
  readonly active: boolean;
}

export const STAGES: Readonly<Record<StageKey, StageDefinition>> = {
  kickoff: { categoryId: 45, name: "Kickoff", active: true },
  masters: { categoryId: 46, name: "Masters", active: false },
  stage1: { categoryId: 1, name: "Stage 1", active: false },
  stage2: { categoryId: 16, name: "Stage 2", active: false },
  champions: { categoryId: 47, name: "Champions", active: false },
};

export function isStageKey(value: unknown): value is StageKey {
  return STAGE_KEYS.some((key) => key === value);
}

/** Infer the stage of a calendar entry from its summary text. */
export function stageFromSummary(summary: string): StageKey | null {
  return STAGE_KEYS.find((key) => summary.includes(STAGES[key].name)) ?? null;
}

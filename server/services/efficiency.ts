import type { Task } from "@db/schema";

export interface EfficiencyPolicy {
  /** Dampens the time ratio so trivially fast completions do not explode the score. */
  stabilizingCoefficient: number;
  /** Number of difficulty levels; difficulty is rated 1..difficultyLevels. */
  difficultyLevels: number;
}

export const DEFAULT_EFFICIENCY_POLICY: EfficiencyPolicy = {
  stabilizingCoefficient: 0.8,
  difficultyLevels: 5,
};

export interface EfficiencyInput {
  expectedDurationSeconds: number;
  startedAt: Date;
  completedAt: Date;
  difficulty: number;
}

/**
 * Scores how well a task was executed:
 *
 *   timeEfficiency       = (expected / actual) * stabilizingCoefficient
 *   difficultyEfficiency = difficulty / difficultyLevels
 *   efficiency           = timeEfficiency * (1 + difficultyEfficiency)
 *
 * Returns 0 when the actual duration is not positive. The score is not capped;
 * the reward stage applies the cap.
 */
export function calculateEfficiency(
  input: EfficiencyInput,
  policy: EfficiencyPolicy = DEFAULT_EFFICIENCY_POLICY
): number {
  const actualSeconds = (input.completedAt.getTime() - input.startedAt.getTime()) / 1000;
  if (actualSeconds <= 0) {
    return 0;
  }

  const timeEfficiency = (input.expectedDurationSeconds / actualSeconds) * policy.stabilizingCoefficient;
  const difficultyEfficiency = input.difficulty / policy.difficultyLevels;

  return timeEfficiency * (1 + difficultyEfficiency);
}

/** Efficiency of a completed task from its stored timestamps, or null while it is still open. */
export function taskEfficiency(
  task: Pick<Task, "expectedDurationSeconds" | "startedAt" | "completedAt" | "difficulty">,
  policy: EfficiencyPolicy = DEFAULT_EFFICIENCY_POLICY
): number | null {
  if (!task.startedAt || !task.completedAt) {
    return null;
  }

  return calculateEfficiency(
    {
      expectedDurationSeconds: task.expectedDurationSeconds,
      startedAt: task.startedAt,
      completedAt: task.completedAt,
      difficulty: task.difficulty,
    },
    policy
  );
}

/**
 * Convergence Check — Decides whether the optimisation loop stops.
 *
 * Three stopping criteria, checked in order after every iteration:
 *   1. Iteration cap — a hard stop, regardless of the cost trend
 *   2. Relative cost improvement below the threshold
 *   3. Reviewer approvals at or above the threshold
 * Criteria 2 and 3 only apply once `min_iterations` have completed.
 *
 * Pure: everything it needs is passed in.
 */
import type { OptimizerConfig } from "../schemas/config.js";
import type { AssessmentRating } from "../schemas/agents.js";

export type StopReason =
    | "max_iterations_reached"
    | "cost_improvement_below_threshold"
    | "approval_threshold_reached";

export type ContinueReason = "minimum_iterations" | "continue_optimization";

export type ConvergenceDecision =
    | { converged: true; reason: StopReason; improvement?: number }
    | { converged: false; reason: ContinueReason; improvement?: number };

export interface ConvergenceInput {
    /** Completed iterations, 1-based. */
    iteration: number;
    /** Cost of each completed iteration, oldest first. */
    costHistory: readonly number[];
    /** Reviewers that approved the latest allocation. */
    approvals: number;
}

export type ConvergenceCriteria = Pick<
    OptimizerConfig,
    "max_iterations" | "min_iterations" | "cost_improvement_threshold" | "approval_threshold"
>;

const APPROVING_RATINGS: ReadonlySet<AssessmentRating> = new Set(["good", "optimal"]);

/** Reviewers whose rating counts as approval. */
export function countApprovals(feedback: ReadonlyArray<{ assessment_rating: AssessmentRating; failed?: boolean }>): number {
    return feedback.filter((entry) => !entry.failed && APPROVING_RATINGS.has(entry.assessment_rating)).length;
}

/**
 * Relative improvement of the latest cost over the one before it,
 * or null when there is nothing to compare (fewer than two costs, or a non-positive previous cost).
 */
export function relativeImprovement(costHistory: readonly number[]): number | null {
    if (costHistory.length < 2) return null;
    const previous = costHistory[costHistory.length - 2];
    const current = costHistory[costHistory.length - 1];
    if (previous <= 0) return null;
    return (previous - current) / previous;
}

export function checkConvergence(input: ConvergenceInput, criteria: ConvergenceCriteria): ConvergenceDecision {
    const improvement = relativeImprovement(input.costHistory) ?? undefined;

    if (input.iteration >= criteria.max_iterations) {
        return { converged: true, reason: "max_iterations_reached", improvement };
    }

    if (input.iteration < criteria.min_iterations) {
        return { converged: false, reason: "minimum_iterations", improvement };
    }

    if (improvement !== undefined && improvement < criteria.cost_improvement_threshold) {
        return { converged: true, reason: "cost_improvement_below_threshold", improvement };
    }

    if (input.approvals >= criteria.approval_threshold) {
        return { converged: true, reason: "approval_threshold_reached", improvement };
    }

    return { converged: false, reason: "continue_optimization", improvement };
}

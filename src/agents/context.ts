/**
 * Prompt Context — How the problem and the run so far are shown to the model.
 */
import type { Allocation, Problem } from "../schemas/machine.js";
import type { ExpertFeedback } from "../schemas/agents.js";
import { formatAllocation, formatCurrency } from "../core/format.js";

/** Feedback from one reviewer, tagged with who gave it. */
export interface ReviewerFeedback extends ExpertFeedback {
    reviewer: string;
    /** True when the reviewer's call failed and this is the neutral stand-in. */
    failed: boolean;
}

/** The slice of an iteration the allocator sees when it tries again. */
export interface AttemptSummary {
    allocation: Allocation;
    totalCost: number;
}

/** Machine data in the snake_case shape the prompts use. */
export function describeProblem(problem: Problem) {
    return {
        product_demand: problem.demand,
        machines: problem.machines.map((machine) => ({
            machine_id: machine.id,
            capacity: machine.capacity,
            variable_cost: machine.variableCost,
            fixed_cost: machine.fixedCost,
        })),
    };
}

export function formatPreviousAttempts(attempts: readonly AttemptSummary[]): string {
    if (attempts.length === 0) return "No previous attempts";
    return attempts
        .map((attempt, i) => `Attempt ${i + 1}: ${formatAllocation(attempt.allocation)} -> Cost: ${formatCurrency(attempt.totalCost)}`)
        .join("; ");
}

/** One line per reviewer: rating, up to three recommendations and two concerns. */
export function formatFeedback(feedback: readonly ReviewerFeedback[]): string {
    if (feedback.length === 0) return "No reviewer feedback available yet.";

    return feedback
        .map((entry) => {
            const parts = [`${entry.reviewer} says: ${entry.assessment_rating}`];
            if (entry.key_recommendations.length > 0) {
                parts.push(`RECOMMENDS: ${entry.key_recommendations.slice(0, 3).join(" | ")}`);
            }
            if (entry.concerns.length > 0) {
                parts.push(`CONCERNS: ${entry.concerns.slice(0, 2).join(" | ")}`);
            }
            if (entry.applied_strategies.length > 0) {
                parts.push(`STRATEGIES USED: ${entry.applied_strategies.slice(0, 3).join(", ")}`);
            }
            return parts.join(" - ");
        })
        .join("\n");
}

/**
 * Agent Output Schemas — The structured replies requested from the model.
 *
 * Allocations cross the model boundary as arrays of `{ machine_id, units }`
 * rather than free-form objects so the schema stays valid under providers'
 * strict JSON-schema modes. `toAllocation()` folds them back into a record.
 */
import { z } from "zod/v4";
import type { Allocation } from "./machine.js";

export const AllocationEntry = z.object({
    machine_id: z.string().describe("Machine identifier, e.g. Tool_6."),
    units: z.number().int().min(0).describe("Units assigned to this machine."),
});
export type AllocationEntry = z.infer<typeof AllocationEntry>;

/**
 * The allocator's proposal for one iteration of the optimisation loop.
 */
export const AllocationProposal = z.object({
    allocations: z.array(AllocationEntry).describe("Units allocated to each machine."),
    total_cost: z.number().describe("Total cost as calculated by the allocator."),
    reasoning: z.string().describe("Step-by-step reasoning behind the allocation."),
});
export type AllocationProposal = z.infer<typeof AllocationProposal>;

export const AssessmentRating = z.enum(["poor", "acceptable", "good", "optimal"]);
export type AssessmentRating = z.infer<typeof AssessmentRating>;

/**
 * Structured critique from a panel expert or the optimisation strategist.
 */
export const ExpertFeedback = z.object({
    assessment_rating: AssessmentRating.describe("Overall rating of the allocation."),
    key_recommendations: z.array(z.string()).describe("Specific, actionable recommendations."),
    concerns: z.array(z.string()).describe("Identified concerns or issues."),
    applied_strategies: z.array(z.string()).describe("Optimisation strategies used in the analysis."),
});
export type ExpertFeedback = z.infer<typeof ExpertFeedback>;

/**
 * Single-shot solution returned by the tool-enforced allocator.
 */
export const AllocationSolution = z.object({
    strategy_name: z.string().describe("Name of the strategy used."),
    machine_allocations: z.array(AllocationEntry).describe("Units allocated to each machine."),
    total_variable_cost: z.number().describe("Total variable cost."),
    total_fixed_cost: z.number().describe("Total fixed cost."),
    total_cost: z.number().describe("Total cost."),
    reasoning: z.string().describe("Explanation of the allocation."),
});
export type AllocationSolution = z.infer<typeof AllocationSolution>;

/** Fold model-facing entries into an allocation, summing repeated machine ids. */
export function toAllocation(entries: AllocationEntry[]): Allocation {
    const totals = new Map<string, number>();
    for (const entry of entries) {
        totals.set(entry.machine_id, (totals.get(entry.machine_id) ?? 0) + entry.units);
    }
    return Object.fromEntries(totals);
}

/** Inverse of `toAllocation()`, used when showing an allocation back to the model. */
export function toAllocationEntries(allocation: Allocation): AllocationEntry[] {
    return Object.entries(allocation).map(([machine_id, units]) => ({ machine_id, units }));
}

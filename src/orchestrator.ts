/**
 * Orchestrator — The iterative optimisation loop.
 *
 * Each iteration runs three phases:
 *   1. Allocation — the allocator proposes; the proposal is repaired and priced
 *   2. Review — every panel member rates the priced allocation
 *   3. Convergence — stop on the iteration cap, a cost plateau or enough approvals
 *
 * A feasibility gate runs before the loop: an infeasible problem throws, and a
 * problem whose capacity exactly matches demand is answered without any model call.
 */
import pLimit from "p-limit";
import { v4 as uuidv4 } from "uuid";
import type { AllocatorAgent } from "./agents/allocator.js";
import type { ExpertReviewer } from "./agents/reviewer.js";
import { formatFeedback, formatPreviousAttempts } from "./agents/context.js";
import type { ReviewerFeedback } from "./agents/context.js";
import { checkFeasibility } from "./core/feasibility.js";
import { checkConvergence, countApprovals } from "./core/convergence.js";
import type { ConvergenceDecision, StopReason } from "./core/convergence.js";
import { costBreakdown, evaluateCost } from "./core/cost.js";
import type { CostBreakdown } from "./core/cost.js";
import { repairAllocation } from "./core/repair.js";
import { greedyByVariableCost } from "./core/solvers.js";
import { InfeasibleProblemError } from "./errors/index.js";
import { OptimizerConfig } from "./schemas/config.js";
import type { Allocation, Problem } from "./schemas/machine.js";

export type AllocationSource = "allocator" | "fallback";

export interface IterationRecord {
    /** 1-based. */
    iteration: number;
    source: AllocationSource;
    /** What the allocator asked for, before repair. Null on fallback. */
    proposedAllocation: Allocation | null;
    /** The cost the allocator claimed. Null on fallback. */
    reportedCost: number | null;
    allocation: Allocation;
    adjustments: string[];
    cost: CostBreakdown;
    reasoning: string;
    feedback: ReviewerFeedback[];
    approvals: number;
    decision: ConvergenceDecision;
    timestamp: string;
}

export type ConvergenceReason = StopReason | "exact_capacity_match";

export interface OptimizationResult {
    runId: string;
    finalAllocation: Allocation;
    finalCost: CostBreakdown;
    /** Iteration the final allocation came from; 0 when no iteration ran. */
    bestIteration: number;
    totalIterations: number;
    /** (first − best) / first × 100. */
    improvementPercent: number;
    convergenceReason: ConvergenceReason;
    history: IterationRecord[];
    tokenUsage: number;
    startedAt: string;
    finishedAt: string;
    durationMs: number;
}

export interface OptimizationOptions {
    problem: Problem;
    allocator: AllocatorAgent;
    reviewers: readonly ExpertReviewer[];
    config?: Partial<OptimizerConfig>;
    /** Clock for timestamps. Default: `() => new Date()` */
    now?: () => Date;
    /** Callback for phase changes. */
    onPhaseChange?: (phase: string) => void;
    /** Callback after each iteration's record is final. */
    onIterationComplete?: (record: IterationRecord) => void;
    /** Callback when repair changed a proposal. */
    onAdjustment?: (iteration: number, adjustments: string[]) => void;
    /** Callback when an agent call failed and a fallback was used. */
    onAgentError?: (agent: string, error: unknown) => void;
}

export const FALLBACK_REASONING = "Fallback: greedy allocation by variable cost";

/** Stand-in for a reviewer whose call failed; never counts as approval. */
export function neutralFeedback(reviewer: string): ReviewerFeedback {
    return {
        reviewer,
        assessment_rating: "acceptable",
        key_recommendations: ["Review allocation"],
        concerns: ["Expert evaluation failed"],
        applied_strategies: [],
        failed: true,
    };
}

/** Lowest-cost record; the earliest wins a tie. */
export function bestRecord(history: readonly IterationRecord[]): IterationRecord | undefined {
    let best: IterationRecord | undefined;
    for (const record of history) {
        if (!best || record.cost.totalCost < best.cost.totalCost) best = record;
    }
    return best;
}

export function improvementPercent(firstCost: number, bestCost: number): number {
    if (firstCost <= 0) return 0;
    return ((firstCost - bestCost) / firstCost) * 100;
}

/**
 * Run the optimisation loop to convergence.
 *
 * @throws InfeasibleProblemError when total capacity is below demand.
 */
export async function runOptimization(options: OptimizationOptions): Promise<OptimizationResult> {
    const {
        problem,
        allocator,
        reviewers,
        now = () => new Date(),
        onPhaseChange,
        onIterationComplete,
        onAdjustment,
        onAgentError,
    } = options;
    const config = OptimizerConfig.parse(options.config ?? {});
    const started = now();
    const runId = uuidv4();

    const finish = (
        partial: Omit<OptimizationResult, "runId" | "startedAt" | "finishedAt" | "durationMs">,
    ): OptimizationResult => {
        const finished = now();
        return {
            runId,
            ...partial,
            startedAt: started.toISOString(),
            finishedAt: finished.toISOString(),
            durationMs: finished.getTime() - started.getTime(),
        };
    };

    // --- Feasibility gate ---
    onPhaseChange?.("Feasibility check");
    const feasibility = checkFeasibility(problem);
    if (feasibility.status === "infeasible") {
        throw new InfeasibleProblemError(feasibility.totalCapacity, feasibility.demand);
    }
    if (feasibility.status === "trivial") {
        onPhaseChange?.("Capacity exactly matches demand: every machine runs at capacity");
        return finish({
            finalAllocation: feasibility.forcedAllocation,
            finalCost: costBreakdown(problem.machines, feasibility.forcedAllocation),
            bestIteration: 0,
            totalIterations: 0,
            improvementPercent: 0,
            convergenceReason: "exact_capacity_match",
            history: [],
            tokenUsage: 0,
        });
    }

    // A single strategist approves alone; a panel needs the configured count.
    const criteria = {
        ...config,
        approval_threshold: reviewers.length > 0
            ? Math.min(config.approval_threshold, reviewers.length)
            : Number.POSITIVE_INFINITY,
    };
    const limit = pLimit(config.max_concurrency);
    const history: IterationRecord[] = [];
    let tokenUsage = 0;
    let latestFeedback: ReviewerFeedback[] = [];
    let stopReason: StopReason | undefined;

    for (let iteration = 1; stopReason === undefined; iteration++) {
        // --- Phase 1: Allocation ---
        onPhaseChange?.(`Iteration ${iteration}: Allocation`);
        let source: AllocationSource = "allocator";
        let proposedAllocation: Allocation | null = null;
        let reportedCost: number | null = null;
        let reasoning = FALLBACK_REASONING;
        let allocation: Allocation;
        let adjustments: string[] = [];

        try {
            const proposal = await allocator.propose(problem, {
                iteration,
                previousAttempts: formatPreviousAttempts(history.map((record) => ({
                    allocation: record.allocation,
                    totalCost: record.cost.totalCost,
                }))),
                reviewerFeedback: formatFeedback(latestFeedback),
            });
            tokenUsage += proposal.tokenUsage;
            proposedAllocation = proposal.allocation;
            reportedCost = proposal.proposal.total_cost;
            reasoning = proposal.proposal.reasoning;

            const repaired = repairAllocation(problem, proposal.allocation);
            allocation = repaired.allocation;
            adjustments = repaired.adjustments;
        } catch (err) {
            onAgentError?.("allocator", err);
            source = "fallback";
            allocation = greedyByVariableCost(problem).allocation;
        }
        if (adjustments.length > 0) onAdjustment?.(iteration, adjustments);

        const cost = evaluateCost(problem, allocation);

        // --- Phase 2: Review ---
        onPhaseChange?.(`Iteration ${iteration}: Review`);
        const feedback = await Promise.all(
            reviewers.map((reviewer) =>
                limit(async (): Promise<ReviewerFeedback> => {
                    try {
                        const review = await reviewer.review(problem, {
                            allocation,
                            totalCost: cost.totalCost,
                            reasoning,
                        });
                        tokenUsage += review.tokenUsage;
                        return { ...review.feedback, reviewer: reviewer.name, failed: false };
                    } catch (err) {
                        onAgentError?.(reviewer.name, err);
                        return neutralFeedback(reviewer.name);
                    }
                })
            )
        );
        latestFeedback = feedback;

        // --- Phase 3: Convergence ---
        const approvals = countApprovals(feedback);
        const decision = checkConvergence(
            {
                iteration,
                costHistory: [...history.map((record) => record.cost.totalCost), cost.totalCost],
                approvals,
            },
            criteria,
        );

        const record: IterationRecord = {
            iteration,
            source,
            proposedAllocation,
            reportedCost,
            allocation,
            adjustments,
            cost,
            reasoning,
            feedback,
            approvals,
            decision,
            timestamp: now().toISOString(),
        };
        history.push(record);
        onIterationComplete?.(record);

        if (decision.converged) stopReason = decision.reason;
    }

    onPhaseChange?.(`Converged: ${stopReason}`);

    const best = bestRecord(history);
    if (!best || stopReason === undefined) {
        throw new Error("Optimisation loop finished without running an iteration.");
    }

    return finish({
        finalAllocation: best.allocation,
        finalCost: best.cost,
        bestIteration: best.iteration,
        totalIterations: history.length,
        improvementPercent: improvementPercent(history[0].cost.totalCost, best.cost.totalCost),
        convergenceReason: stopReason,
        history,
        tokenUsage,
    });
}

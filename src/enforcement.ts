/**
 * Tool Enforcement — Single-shot allocation flows that do not trust the model
 * to use its tools.
 *
 * The structured allocator is told to price its allocation with the
 * calculator. When it does not (or its reply fails validation) the flow
 * enforces the rule itself: the allocation is repaired and priced by the
 * cost evaluator, and the result says so. The evaluated flow adds the
 * evaluator agent and, when it skips the exact optimiser, writes the
 * comparison from the exhaustive optimum instead.
 */
import { StructuredAllocatorAgent } from "./agents/structured-allocator.js";
import { EvaluatorAgent } from "./agents/evaluator.js";
import { CALCULATOR_TOOL, ORACLE_TOOL } from "./agents/tools.js";
import type { ModelClient } from "./llm/client.js";
import { evaluateCost, roundCurrency } from "./core/cost.js";
import type { CostBreakdown } from "./core/cost.js";
import { repairAllocation } from "./core/repair.js";
import { checkFeasibility } from "./core/feasibility.js";
import type { TrivialReport } from "./core/feasibility.js";
import { greedyByVariableCost, solveExact } from "./core/solvers.js";
import type { SolverResult } from "./core/solvers.js";
import { formatAllocation, formatCurrency } from "./core/format.js";
import { InfeasibleProblemError, SearchSpaceTooLargeError } from "./errors/index.js";
import { FALLBACK_REASONING } from "./orchestrator.js";
import { OptimizerConfig } from "./schemas/config.js";
import type { Allocation, Problem } from "./schemas/machine.js";

export interface EnforcementOptions {
    problem: Problem;
    client: ModelClient;
    config?: Partial<OptimizerConfig>;
    onPhaseChange?: (phase: string) => void;
    onAgentError?: (agent: string, error: unknown) => void;
}

export interface ToolEnforcedResult {
    allocation: Allocation;
    /** Authoritative cost, from the cost evaluator. */
    cost: CostBreakdown;
    /** The total the agent reported. Null when its reply was unusable. */
    reportedCost: number | null;
    costsMatch: boolean;
    /** The agent called the calculator at least once. */
    toolUsed: boolean;
    /** The flow computed the result itself instead of trusting the agent. */
    enforced: boolean;
    adjustments: string[];
    strategyName: string | null;
    reasoning: string;
    toolCalls: string[];
    /** Why the agent's reply was unusable, when it was. */
    error?: string;
    tokenUsage: number;
}

export interface EvaluatedResult extends ToolEnforcedResult {
    evaluation: string;
    /** The evaluator called the exact optimiser. */
    oracleUsed: boolean;
    /** The evaluation text was written from the exhaustive optimum, not by the agent. */
    evaluationEnforced: boolean;
    /** Null when the machine count exceeded the exact search limit. */
    optimum: SolverResult | null;
}

const COST_EPSILON = 0.005;

export const FORCED_REASONING = "Total capacity exactly matches demand: every machine runs at capacity";

function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/** Throws on an infeasible problem; returns the forced report when there is no choice to make. */
function gate(problem: Problem): TrivialReport | null {
    const feasibility = checkFeasibility(problem);
    if (feasibility.status === "infeasible") {
        throw new InfeasibleProblemError(feasibility.totalCapacity, feasibility.demand);
    }
    return feasibility.status === "trivial" ? feasibility : null;
}

function forcedResult(problem: Problem, report: TrivialReport): ToolEnforcedResult {
    return {
        allocation: report.forcedAllocation,
        cost: evaluateCost(problem, report.forcedAllocation),
        reportedCost: null,
        costsMatch: false,
        toolUsed: false,
        enforced: true,
        adjustments: [],
        strategyName: null,
        reasoning: FORCED_REASONING,
        toolCalls: [],
        tokenUsage: 0,
    };
}

/**
 * Ask the structured allocator for one allocation and verify its cost.
 */
export async function runToolEnforcedAllocation(options: EnforcementOptions): Promise<ToolEnforcedResult> {
    const { problem, client, onPhaseChange, onAgentError } = options;
    const config = OptimizerConfig.parse(options.config ?? {});

    onPhaseChange?.("Feasibility check");
    const forced = gate(problem);
    if (forced) return forcedResult(problem, forced);

    const agent = new StructuredAllocatorAgent(client);

    onPhaseChange?.("Structured allocation");
    try {
        const result = await agent.solve(problem, { maxSteps: config.tool_max_steps });
        const toolUsed = result.toolCalls.includes(CALCULATOR_TOOL);
        const repaired = repairAllocation(problem, result.allocation);
        const cost = evaluateCost(problem, repaired.allocation);
        const reportedCost = result.solution.total_cost;

        return {
            allocation: repaired.allocation,
            cost,
            reportedCost,
            costsMatch: Math.abs(reportedCost - cost.totalCost) < COST_EPSILON,
            toolUsed,
            enforced: !toolUsed,
            adjustments: repaired.adjustments,
            strategyName: result.solution.strategy_name,
            reasoning: result.solution.reasoning,
            toolCalls: result.toolCalls,
            tokenUsage: result.tokenUsage,
        };
    } catch (err) {
        onAgentError?.("structured_allocator", err);
        const fallback = greedyByVariableCost(problem);

        return {
            allocation: fallback.allocation,
            cost: evaluateCost(problem, fallback.allocation),
            reportedCost: null,
            costsMatch: false,
            toolUsed: false,
            enforced: true,
            adjustments: [],
            strategyName: null,
            reasoning: FALLBACK_REASONING,
            toolCalls: [],
            error: errorMessage(err),
            tokenUsage: 0,
        };
    }
}

/** The comparison written when the evaluator did not consult the optimiser. */
export function buildEnforcedEvaluation(
    allocation: Allocation,
    cost: CostBreakdown,
    optimum: SolverResult | null,
): string {
    const lines = [
        `Enforced evaluation: the ${ORACLE_TOOL} tool was not called, so the optimum was computed directly.`,
        `Proposed allocation: ${formatAllocation(allocation)} -> ${formatCurrency(cost.totalCost)}`,
    ];

    if (!optimum) {
        lines.push("Optimal allocation: unknown (too many machines for exhaustive search)");
        return lines.join("\n");
    }

    const gap = roundCurrency(cost.totalCost - optimum.totalCost);
    lines.push(`Optimal allocation: ${formatAllocation(optimum.allocation)} -> ${formatCurrency(optimum.totalCost)}`);
    if (gap <= COST_EPSILON) {
        lines.push("Gap: none, the proposed allocation is optimal");
    } else {
        const percent = optimum.totalCost > 0 ? (gap / optimum.totalCost) * 100 : 0;
        lines.push(`Gap: ${formatCurrency(gap)} (${percent.toFixed(2)}% above optimal)`);
    }
    return lines.join("\n");
}

/**
 * Structured allocation followed by an evaluation against the exhaustive optimum.
 */
export async function runEvaluatedAllocation(options: EnforcementOptions): Promise<EvaluatedResult> {
    const { problem, client, onPhaseChange, onAgentError } = options;
    const config = OptimizerConfig.parse(options.config ?? {});

    const forced = gate(problem);
    if (forced) {
        const allocated = forcedResult(problem, forced);
        const optimum = { allocation: forced.forcedAllocation, totalCost: allocated.cost.totalCost };
        return {
            ...allocated,
            evaluation: buildEnforcedEvaluation(allocated.allocation, allocated.cost, optimum),
            oracleUsed: false,
            evaluationEnforced: true,
            optimum,
        };
    }

    const allocated = await runToolEnforcedAllocation(options);

    let optimum: SolverResult | null = null;
    try {
        optimum = solveExact(problem, { maxMachines: config.exact_search_max_machines });
    } catch (err) {
        if (!(err instanceof SearchSpaceTooLargeError)) throw err;
    }

    onPhaseChange?.("Evaluation");
    const evaluator = new EvaluatorAgent(client);
    let tokenUsage = allocated.tokenUsage;
    try {
        const evaluation = await evaluator.evaluate(problem, allocated.allocation, {
            maxSteps: config.tool_max_steps,
            maxMachines: config.exact_search_max_machines,
        });
        tokenUsage += evaluation.tokenUsage;

        if (evaluation.toolCalls.includes(ORACLE_TOOL)) {
            return {
                ...allocated,
                toolCalls: [...allocated.toolCalls, ...evaluation.toolCalls],
                tokenUsage,
                evaluation: evaluation.text,
                oracleUsed: true,
                evaluationEnforced: false,
                optimum,
            };
        }

        return {
            ...allocated,
            toolCalls: [...allocated.toolCalls, ...evaluation.toolCalls],
            tokenUsage,
            evaluation: buildEnforcedEvaluation(allocated.allocation, allocated.cost, optimum),
            oracleUsed: false,
            evaluationEnforced: true,
            optimum,
        };
    } catch (err) {
        onAgentError?.("evaluator", err);
        return {
            ...allocated,
            tokenUsage,
            evaluation: buildEnforcedEvaluation(allocated.allocation, allocated.cost, optimum),
            oracleUsed: false,
            evaluationEnforced: true,
            optimum,
        };
    }
}

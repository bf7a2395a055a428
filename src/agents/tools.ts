/**
 * Agent Tools — Deterministic functions the model may call.
 *
 * Tools are built per call and bound to one problem, so two runs (or two
 * agents in one run) never share state. Whether a tool was used is read from
 * the call's own result (`ToolUsage.toolCalls`).
 */
import { tool } from "ai";
import { z } from "zod/v4";
import type { Problem } from "../schemas/machine.js";
import { AllocationEntry, toAllocation, toAllocationEntries } from "../schemas/agents.js";
import { evaluateCost } from "../core/cost.js";
import { solveExact } from "../core/solvers.js";
import { InvalidAllocationError, SearchSpaceTooLargeError } from "../errors/index.js";

export const CALCULATOR_TOOL = "manufacturing_cost_calculator";
export const ORACLE_TOOL = "exact_optimizer";

/** Cost calculator for allocations of this problem. */
export function createCalculatorTool(problem: Problem) {
    return tool({
        description:
            "Calculate total manufacturing costs for a machine allocation. "
            + "Input: the units allocated to each machine. "
            + "Returns: variable, fixed and total cost, or the constraint the allocation breaks. "
            + "Use this for all cost calculations.",
        inputSchema: z.object({
            allocations: z.array(AllocationEntry).describe("Units allocated to each machine."),
        }),
        execute: async ({ allocations }) => {
            try {
                const breakdown = evaluateCost(problem, toAllocation(allocations));
                return {
                    valid: true,
                    total_variable_cost: breakdown.totalVariableCost,
                    total_fixed_cost: breakdown.totalFixedCost,
                    total_cost: breakdown.totalCost,
                };
            } catch (err) {
                if (err instanceof InvalidAllocationError) {
                    return { valid: false, error: err.message };
                }
                throw err;
            }
        },
    });
}

/** Exhaustive optimiser for this problem. */
export function createOracleTool(problem: Problem, maxMachines?: number) {
    return tool({
        description:
            "Find the mathematically optimal machine allocation by exhaustive search. "
            + "Takes no input. Returns the optimal allocation and its cost.",
        inputSchema: z.object({}),
        execute: async () => {
            try {
                const optimum = solveExact(problem, { maxMachines });
                return {
                    found: true,
                    optimal_allocation: toAllocationEntries(optimum.allocation),
                    optimal_cost: optimum.totalCost,
                };
            } catch (err) {
                if (err instanceof SearchSpaceTooLargeError) {
                    return { found: false, error: err.message };
                }
                throw err;
            }
        },
    });
}

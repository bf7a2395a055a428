/**
 * Benchmark Verification — How good is a proposed allocation, really?
 *
 * Compares a proposal against both greedy heuristics and the exhaustive
 * optimum. Matching or beating greedy is reported as exactly that and
 * nothing more; `optimal` is only true when the proposal's cost equals the
 * exhaustive optimum, and null when that search was refused.
 */
import type { Allocation, Problem } from "../schemas/machine.js";
import { SearchSpaceTooLargeError } from "../errors/index.js";
import { computeCost, findViolation, roundCurrency } from "./cost.js";
import { greedyByUnitCost, greedyByVariableCost, solveExact } from "./solvers.js";
import type { SolverResult } from "./solvers.js";

/** Costs within half a cent are the same cost. */
const COST_EPSILON = 0.005;

export interface VerificationReport {
    proposal: {
        allocation: Allocation;
        totalCost: number;
        valid: boolean;
        violation?: string;
    };
    greedyByVariableCost: SolverResult;
    greedyByUnitCost: SolverResult;
    /** Null when the machine count exceeded the exact search limit. */
    optimum: SolverResult | null;
    noWorseThanGreedy: boolean;
    optimal: boolean | null;
    /** Proposal cost minus the optimum, when the optimum is known. */
    savingsAvailable: number | null;
}

export function verifyAllocation(
    problem: Problem,
    allocation: Allocation,
    options: { maxMachines?: number } = {},
): VerificationReport {
    const violation = findViolation(problem, allocation);
    const totalCost = computeCost(problem.machines, allocation);
    const byVariable = greedyByVariableCost(problem);
    const byUnit = greedyByUnitCost(problem);

    let optimum: SolverResult | null = null;
    try {
        optimum = solveExact(problem, options);
    } catch (err) {
        if (!(err instanceof SearchSpaceTooLargeError)) throw err;
    }

    const valid = violation === null;
    const bestGreedy = Math.min(byVariable.totalCost, byUnit.totalCost);

    return {
        proposal: {
            allocation: { ...allocation },
            totalCost,
            valid,
            ...(violation ? { violation: violation.message } : {}),
        },
        greedyByVariableCost: byVariable,
        greedyByUnitCost: byUnit,
        optimum,
        noWorseThanGreedy: valid && totalCost <= bestGreedy + COST_EPSILON,
        optimal: optimum === null ? null : valid && Math.abs(totalCost - optimum.totalCost) < COST_EPSILON,
        savingsAvailable: optimum === null ? null : roundCurrency(totalCost - optimum.totalCost),
    };
}

/**
 * Solvers — Deterministic allocations used as fallbacks and benchmarks.
 *
 * The greedy heuristics are what the loop falls back to when the allocator
 * fails. Neither is optimal in general: a fixed activation cost can make a
 * machine with a worse per-unit figure part of the cheapest plan. `solveExact()`
 * enumerates every subset of active machines and is the only benchmark whose
 * cost is a true lower bound.
 */
import type { Allocation, Machine, Problem } from "../schemas/machine.js";
import { InfeasibleProblemError, SearchSpaceTooLargeError } from "../errors/index.js";
import { computeCost, totalCapacity } from "./cost.js";

export interface SolverResult {
    allocation: Allocation;
    totalCost: number;
}

export const DEFAULT_EXACT_SEARCH_MAX_MACHINES = 16;
/** Subsets are 32-bit masks, so the search never goes past this many machines. */
export const EXACT_SEARCH_HARD_LIMIT = 30;

/** Unit cost with the fixed cost spread over the full capacity. */
export function fullLoadUnitCost(machine: Machine): number {
    if (machine.capacity <= 0) return Number.POSITIVE_INFINITY;
    return machine.variableCost + machine.fixedCost / machine.capacity;
}

function assertFeasible(problem: Problem): void {
    const capacity = totalCapacity(problem.machines);
    if (capacity < problem.demand) throw new InfeasibleProblemError(capacity, problem.demand);
}

/** Fill machines to capacity in the given order until the demand is met. */
function fillInOrder(problem: Problem, ordered: readonly Machine[]): SolverResult {
    assertFeasible(problem);
    const allocation: Allocation = Object.fromEntries(problem.machines.map((machine) => [machine.id, 0]));
    let remaining = problem.demand;

    for (const machine of ordered) {
        if (remaining <= 0) break;
        const units = Math.min(remaining, machine.capacity);
        allocation[machine.id] = units;
        remaining -= units;
    }

    return { allocation, totalCost: computeCost(problem.machines, allocation) };
}

/** Cheapest variable cost first. The loop's fallback allocation. */
export function greedyByVariableCost(problem: Problem): SolverResult {
    const ordered = [...problem.machines].sort((a, b) => a.variableCost - b.variableCost);
    return fillInOrder(problem, ordered);
}

/** Cheapest full-capacity unit cost first. */
export function greedyByUnitCost(problem: Problem): SolverResult {
    const ordered = [...problem.machines].sort((a, b) => fullLoadUnitCost(a) - fullLoadUnitCost(b));
    return fillInOrder(problem, ordered);
}

/**
 * Globally optimal allocation by exhaustive search over active-machine subsets.
 *
 * For a fixed set of active machines the fixed costs are constant, so the
 * cheapest way to cover the demand is to fill by ascending variable cost.
 * Trying every subset therefore covers every candidate optimum. O(2^n · n).
 *
 * @throws SearchSpaceTooLargeError above `maxMachines` machines, or above
 *   {@link EXACT_SEARCH_HARD_LIMIT} whatever `maxMachines` says.
 */
export function solveExact(
    problem: Problem,
    options: { maxMachines?: number } = {},
): SolverResult {
    const maxMachines = Math.min(
        options.maxMachines ?? DEFAULT_EXACT_SEARCH_MAX_MACHINES,
        EXACT_SEARCH_HARD_LIMIT,
    );
    const { machines, demand } = problem;
    if (machines.length > maxMachines) {
        throw new SearchSpaceTooLargeError(machines.length, maxMachines);
    }
    assertFeasible(problem);

    const byVariableCost = [...machines].sort((a, b) => a.variableCost - b.variableCost);
    const subsetCount = 1 << byVariableCost.length;

    let bestCost = Number.POSITIVE_INFINITY;
    let bestMask = 0;

    for (let mask = 1; mask < subsetCount; mask++) {
        let capacity = 0;
        for (let i = 0; i < byVariableCost.length; i++) {
            if (mask & (1 << i)) capacity += byVariableCost[i].capacity;
        }
        if (capacity < demand) continue;

        let remaining = demand;
        let cost = 0;
        for (let i = 0; i < byVariableCost.length && remaining > 0; i++) {
            if (!(mask & (1 << i))) continue;
            const machine = byVariableCost[i];
            const units = Math.min(remaining, machine.capacity);
            if (units <= 0) continue;
            cost += machine.variableCost * units + machine.fixedCost;
            remaining -= units;
        }

        if (cost < bestCost) {
            bestCost = cost;
            bestMask = mask;
        }
    }

    const allocation: Allocation = Object.fromEntries(machines.map((machine) => [machine.id, 0]));
    let remaining = demand;
    for (let i = 0; i < byVariableCost.length && remaining > 0; i++) {
        if (!(bestMask & (1 << i))) continue;
        const machine = byVariableCost[i];
        const units = Math.min(remaining, machine.capacity);
        allocation[machine.id] = units;
        remaining -= units;
    }

    return { allocation, totalCost: computeCost(machines, allocation) };
}

/**
 * Cost Evaluator — The closed-form cost model.
 *
 *   cost = Σ over machines with units > 0 of (variableCost × units + fixedCost)
 *
 * Pure and O(machines). `evaluateCost()` also enforces the allocation
 * invariant; `computeCost()` is the unchecked formula used when a figure is
 * needed for an allocation that may still be broken (history, fallbacks).
 */
import type { Allocation, Machine, Problem } from "../schemas/machine.js";
import { InvalidAllocationError } from "../errors/index.js";

/** One active machine's share of the total. */
export interface CostLine {
    machineId: string;
    units: number;
    variableCost: number;
    fixedCost: number;
    total: number;
}

export interface CostBreakdown {
    allocation: Allocation;
    lines: CostLine[];
    totalVariableCost: number;
    totalFixedCost: number;
    totalCost: number;
}

/** Round a currency amount to cents. */
export function roundCurrency(value: number): number {
    return Math.round(value * 100) / 100;
}

export function totalCapacity(machines: readonly Machine[]): number {
    return machines.reduce((sum, machine) => sum + machine.capacity, 0);
}

export function totalUnits(allocation: Allocation): number {
    return Object.values(allocation).reduce((sum, units) => sum + units, 0);
}

export function indexMachines(machines: readonly Machine[]): Map<string, Machine> {
    return new Map(machines.map((machine) => [machine.id, machine]));
}

/**
 * Itemised cost without constraint checks. Machines the set does not know,
 * and machines at zero units, contribute nothing.
 */
export function costBreakdown(machines: readonly Machine[], allocation: Allocation): CostBreakdown {
    const byId = indexMachines(machines);
    const lines: CostLine[] = [];
    let totalVariableCost = 0;
    let totalFixedCost = 0;

    for (const [machineId, units] of Object.entries(allocation)) {
        const machine = byId.get(machineId);
        if (!machine || units <= 0) continue;

        const variableCost = machine.variableCost * units;
        lines.push({
            machineId,
            units,
            variableCost: roundCurrency(variableCost),
            fixedCost: machine.fixedCost,
            total: roundCurrency(variableCost + machine.fixedCost),
        });
        totalVariableCost += variableCost;
        totalFixedCost += machine.fixedCost;
    }

    return {
        allocation: { ...allocation },
        lines,
        totalVariableCost: roundCurrency(totalVariableCost),
        totalFixedCost: roundCurrency(totalFixedCost),
        totalCost: roundCurrency(totalVariableCost + totalFixedCost),
    };
}

export function computeCost(machines: readonly Machine[], allocation: Allocation): number {
    return costBreakdown(machines, allocation).totalCost;
}

/**
 * Check an allocation against the problem. Returns the first violation found,
 * or null when the allocation is valid.
 */
export function findViolation(problem: Problem, allocation: Allocation): InvalidAllocationError | null {
    const byId = indexMachines(problem.machines);

    for (const [machineId, units] of Object.entries(allocation)) {
        const machine = byId.get(machineId);
        if (!machine) {
            return new InvalidAllocationError(`unknown machine "${machineId}"`, machineId);
        }
        if (!Number.isInteger(units) || units < 0) {
            return new InvalidAllocationError(`machine ${machineId} has ${units} units; units must be a non-negative integer`, machineId);
        }
        if (units > machine.capacity) {
            return new InvalidAllocationError(`machine ${machineId} allocated ${units} units but capacity is only ${machine.capacity}`, machineId);
        }
    }

    const allocated = totalUnits(allocation);
    if (allocated !== problem.demand) {
        return new InvalidAllocationError(`allocation supplies ${allocated} units but demand is ${problem.demand}`);
    }
    return null;
}

/**
 * Total cost of a valid allocation.
 * @throws InvalidAllocationError when a machine is unknown or over capacity, or the units do not sum to demand.
 */
export function evaluateCost(problem: Problem, allocation: Allocation): CostBreakdown {
    const violation = findViolation(problem, allocation);
    if (violation) throw violation;
    return costBreakdown(problem.machines, allocation);
}

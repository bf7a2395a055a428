/**
 * Allocation Repair — Brings a proposed allocation back inside the constraints.
 *
 * Model proposals routinely overshoot a capacity or miss the demand. Rather
 * than discard them, the orchestrator repairs them in three passes:
 *   1. drop unknown machines and clamp each machine to [0, capacity]
 *   2. fill any shortfall on the machines with the best half-load unit cost
 *   3. trim any excess from the machines with the highest variable cost
 * Every change is reported in `adjustments` so callers can surface it.
 */
import type { Allocation, Machine, Problem } from "../schemas/machine.js";
import { totalUnits } from "./cost.js";

export interface RepairResult {
    allocation: Allocation;
    adjustments: string[];
}

/**
 * Unit cost with the fixed cost spread over half the capacity; a rough
 * efficiency measure for choosing where extra units go.
 */
export function halfLoadUnitCost(machine: Machine): number {
    if (machine.capacity <= 0) return Number.POSITIVE_INFINITY;
    return machine.variableCost + machine.fixedCost / (machine.capacity * 0.5);
}

function normalizeUnits(machineId: string, units: number, adjustments: string[]): number {
    if (!Number.isFinite(units) || units < 0) {
        adjustments.push(`${machineId}: ${units} units is not a valid quantity, set to 0`);
        return 0;
    }
    if (!Number.isInteger(units)) {
        const floored = Math.floor(units);
        adjustments.push(`${machineId}: ${units} units rounded down to ${floored}`);
        return floored;
    }
    return units;
}

export function repairAllocation(problem: Problem, proposed: Allocation): RepairResult {
    const adjustments: string[] = [];
    const known = new Map(problem.machines.map((machine) => [machine.id, machine]));
    const repaired: Allocation = Object.fromEntries(problem.machines.map((machine) => [machine.id, 0]));

    // Pass 1: unknown machines and capacity violations
    for (const [machineId, rawUnits] of Object.entries(proposed)) {
        const machine = known.get(machineId);
        if (!machine) {
            adjustments.push(`${machineId}: unknown machine, ${rawUnits} units dropped`);
            continue;
        }
        let units = normalizeUnits(machineId, rawUnits, adjustments);
        if (units > machine.capacity) {
            adjustments.push(`${machineId}: ${units} > ${machine.capacity} (capacity), clamped`);
            units = machine.capacity;
        }
        repaired[machineId] = units;
    }

    // Pass 2: demand shortfall
    let allocated = totalUnits(repaired);
    if (allocated < problem.demand) {
        let remaining = problem.demand - allocated;
        adjustments.push(`Demand shortfall: ${remaining} units not allocated`);

        const byEfficiency = [...problem.machines].sort((a, b) => halfLoadUnitCost(a) - halfLoadUnitCost(b));
        for (const machine of byEfficiency) {
            if (remaining <= 0) break;
            const headroom = machine.capacity - (repaired[machine.id] ?? 0);
            const added = Math.min(remaining, headroom);
            if (added > 0) {
                repaired[machine.id] = (repaired[machine.id] ?? 0) + added;
                remaining -= added;
                adjustments.push(`${machine.id}: added ${added} units`);
            }
        }
        if (remaining > 0) {
            adjustments.push(`Capacity exhausted: ${remaining} units still unallocated`);
        }
    }

    // Pass 3: demand excess
    allocated = totalUnits(repaired);
    if (allocated > problem.demand) {
        let excess = allocated - problem.demand;
        adjustments.push(`Demand excess: ${excess} units over demand`);

        const byVariableCost = [...problem.machines].sort((a, b) => b.variableCost - a.variableCost);
        for (const machine of byVariableCost) {
            if (excess <= 0) break;
            const removed = Math.min(excess, repaired[machine.id] ?? 0);
            if (removed > 0) {
                repaired[machine.id] = (repaired[machine.id] ?? 0) - removed;
                excess -= removed;
                adjustments.push(`${machine.id}: removed ${removed} units`);
            }
        }
    }

    return { allocation: repaired, adjustments };
}

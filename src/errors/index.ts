/**
 * Custom Error Classes — Domain errors for deterministic error handling.
 *
 * Library code throws these; the orchestrator and the tool enforcement flows
 * recover from them locally with a fallback value. Only the CLI turns them
 * into exit codes.
 */

/**
 * Thrown when the selected machines cannot cover the demand at all.
 * The only failure that ends a run before any optimisation attempt.
 */
export class InfeasibleProblemError extends Error {
    public readonly totalCapacity: number;
    public readonly demand: number;

    constructor(totalCapacity: number, demand: number) {
        super(`Infeasible problem: total capacity ${totalCapacity} cannot meet demand ${demand} (shortfall ${demand - totalCapacity}).`);
        this.name = "InfeasibleProblemError";
        this.totalCapacity = totalCapacity;
        this.demand = demand;
    }

    get shortfall(): number {
        return this.demand - this.totalCapacity;
    }
}

/**
 * Thrown by the cost evaluator when an allocation breaks a capacity or demand constraint.
 */
export class InvalidAllocationError extends Error {
    /** The offending machine, when the violation is tied to one. */
    public readonly machineId?: string;

    constructor(reason: string, machineId?: string) {
        super(`Invalid allocation: ${reason}`);
        this.name = "InvalidAllocationError";
        this.machineId = machineId;
    }
}

/**
 * Thrown when a machine catalog row is missing a column or holds a bad value.
 */
export class CatalogFormatError extends Error {
    public readonly line: number;

    constructor(line: number, reason: string) {
        super(`Machine catalog line ${line}: ${reason}`);
        this.name = "CatalogFormatError";
        this.line = line;
    }
}

/**
 * Thrown when a machine selection cannot be satisfied by the catalog.
 */
export class MachineSelectionError extends Error {
    constructor(reason: string) {
        super(`Machine selection failed: ${reason}`);
        this.name = "MachineSelectionError";
    }
}

/**
 * Thrown when exhaustive search would have to visit too many machine subsets.
 */
export class SearchSpaceTooLargeError extends Error {
    public readonly machineCount: number;
    public readonly maxMachines: number;

    constructor(machineCount: number, maxMachines: number) {
        super(`Exact search refused: ${machineCount} machines exceeds the limit of ${maxMachines}.`);
        this.name = "SearchSpaceTooLargeError";
        this.machineCount = machineCount;
        this.maxMachines = maxMachines;
    }
}

/**
 * Thrown when a model reply does not conform to the schema it was asked for.
 * Callers treat it like any other failed call and take the fallback path.
 */
export class StructuredOutputError extends Error {
    public readonly agent: string;

    constructor(agent: string, detail: string) {
        super(`Agent "${agent}" returned output that failed validation: ${detail}`);
        this.name = "StructuredOutputError";
        this.agent = agent;
    }
}

export {
    roundCurrency,
    totalCapacity,
    totalUnits,
    indexMachines,
    costBreakdown,
    computeCost,
    findViolation,
    evaluateCost,
} from "./cost.js";
export type { CostLine, CostBreakdown } from "./cost.js";

export { checkFeasibility } from "./feasibility.js";
export type { FeasibilityReport, InfeasibleReport, TrivialReport, SolvableReport } from "./feasibility.js";

export { checkConvergence, countApprovals, relativeImprovement } from "./convergence.js";
export type {
    ConvergenceDecision,
    ConvergenceInput,
    ConvergenceCriteria,
    StopReason,
    ContinueReason,
} from "./convergence.js";

export { repairAllocation, halfLoadUnitCost } from "./repair.js";
export type { RepairResult } from "./repair.js";

export {
    greedyByVariableCost,
    greedyByUnitCost,
    solveExact,
    fullLoadUnitCost,
    DEFAULT_EXACT_SEARCH_MAX_MACHINES,
    EXACT_SEARCH_HARD_LIMIT,
} from "./solvers.js";
export type { SolverResult } from "./solvers.js";

export { verifyAllocation } from "./verification.js";
export type { VerificationReport } from "./verification.js";

export {
    formatCurrency,
    formatUnits,
    formatAllocation,
    fileTimestamp,
    displayTimestamp,
} from "./format.js";

/**
 * Allocation Lab — Public API
 *
 * LLM agents propose machine allocations; deterministic code repairs, prices
 * and verifies them.
 *
 * @see README.md for the cost model and the command line
 */

// Core
export * from "./core/index.js";

// Catalog
export * from "./catalog/index.js";

// Schemas
export * from "./schemas/index.js";

// Agents
export * from "./agents/index.js";

// LLM
export * from "./llm/index.js";

// Errors
export {
    InfeasibleProblemError,
    InvalidAllocationError,
    CatalogFormatError,
    MachineSelectionError,
    SearchSpaceTooLargeError,
    StructuredOutputError,
} from "./errors/index.js";

// Orchestration
export {
    runOptimization,
    neutralFeedback,
    bestRecord,
    improvementPercent,
    FALLBACK_REASONING,
} from "./orchestrator.js";
export type {
    AllocationSource,
    ConvergenceReason,
    IterationRecord,
    OptimizationOptions,
    OptimizationResult,
} from "./orchestrator.js";

// Tool enforcement
export {
    runToolEnforcedAllocation,
    runEvaluatedAllocation,
    buildEnforcedEvaluation,
    FORCED_REASONING,
} from "./enforcement.js";
export type { EnforcementOptions, ToolEnforcedResult, EvaluatedResult } from "./enforcement.js";

// Reports
export * from "./reports/index.js";

/**
 * Schema barrel export — all Zod schemas and inferred types.
 */

// Problem
export { Machine, Allocation, Problem } from "./machine.js";

// Agent replies
export {
    AllocationEntry,
    AllocationProposal,
    AssessmentRating,
    ExpertFeedback,
    AllocationSolution,
    toAllocation,
    toAllocationEntries,
} from "./agents.js";

// Configuration
export { OptimizerConfig, PanelMode } from "./config.js";

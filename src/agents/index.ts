/**
 * Agents barrel export.
 */
export { AllocatorAgent } from "./allocator.js";
export type { AllocatorContext, ProposalResult } from "./allocator.js";

export { ExpertReviewer, buildReviewPanel } from "./reviewer.js";
export type { ReviewSubject } from "./reviewer.js";

export { StructuredAllocatorAgent } from "./structured-allocator.js";
export type { SolutionResult } from "./structured-allocator.js";

export { EvaluatorAgent } from "./evaluator.js";
export type { EvaluationResult } from "./evaluator.js";

export { ReporterAgent } from "./reporter.js";

export {
    AGENT_PROFILES,
    PANEL_EXPERTS,
    DEFAULT_KNOWLEDGE_BASE_PATH,
    loadKnowledgeBase,
    systemPromptFor,
} from "./profiles.js";
export type { AgentId, AgentProfile, ExpertId } from "./profiles.js";

export { CALCULATOR_TOOL, ORACLE_TOOL, createCalculatorTool, createOracleTool } from "./tools.js";

export { describeProblem, formatFeedback, formatPreviousAttempts } from "./context.js";
export type { AttemptSummary, ReviewerFeedback } from "./context.js";

/**
 * AllocatorAgent — Proposes an allocation each iteration of the loop.
 *
 * The proposal is only a suggestion: the orchestrator repairs it and prices
 * it with the cost evaluator, so the model's own `total_cost` is kept for
 * comparison and never trusted.
 */
import type { ModelClient } from "../llm/client.js";
import type { Allocation, Problem } from "../schemas/machine.js";
import { AllocationProposal, toAllocation } from "../schemas/agents.js";
import { AGENT_PROFILES, systemPromptFor } from "./profiles.js";
import type { AgentProfile } from "./profiles.js";
import { describeProblem } from "./context.js";

export interface AllocatorContext {
    /** 1-based iteration about to run. */
    iteration: number;
    previousAttempts: string;
    reviewerFeedback: string;
}

export interface ProposalResult {
    proposal: AllocationProposal;
    allocation: Allocation;
    tokenUsage: number;
}

export class AllocatorAgent {
    private llmClient: ModelClient;
    private profile: AgentProfile;

    constructor(llmClient: ModelClient, profile: AgentProfile = AGENT_PROFILES.allocator) {
        this.llmClient = llmClient;
        this.profile = profile;
    }

    async propose(problem: Problem, context: AllocatorContext): Promise<ProposalResult> {
        const prompt = JSON.stringify({
            task: `Allocate exactly ${problem.demand} units across the machines below at minimum total cost.`,
            ...describeProblem(problem),
            iteration: context.iteration,
            previous_attempts: context.previousAttempts,
            reviewer_feedback: context.reviewerFeedback,
        });

        const result = await this.llmClient.generateObject(
            AllocationProposal,
            systemPromptFor(this.profile),
            prompt,
            { temperature: this.profile.temperature, agent: this.profile.role },
        );

        return {
            proposal: result.object,
            allocation: toAllocation(result.object.allocations),
            tokenUsage: result.tokenUsage,
        };
    }
}

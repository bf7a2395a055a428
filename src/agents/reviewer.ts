/**
 * ExpertReviewer — One member of the review panel.
 *
 * A reviewer sees the problem and the priced allocation and answers with a
 * structured `ExpertFeedback`. The panel is either the five specialist
 * experts or a single strategist that carries a knowledge base in its prompt.
 */
import type { ModelClient } from "../llm/client.js";
import type { Allocation, Problem } from "../schemas/machine.js";
import type { PanelMode } from "../schemas/config.js";
import { ExpertFeedback, toAllocationEntries } from "../schemas/agents.js";
import { AGENT_PROFILES, PANEL_EXPERTS, systemPromptFor } from "./profiles.js";
import type { AgentProfile } from "./profiles.js";
import { describeProblem } from "./context.js";

/** What a reviewer is shown: the repaired allocation and its evaluated cost. */
export interface ReviewSubject {
    allocation: Allocation;
    totalCost: number;
    reasoning: string;
}

export class ExpertReviewer {
    public readonly id: string;
    public readonly name: string;

    private llmClient: ModelClient;
    private systemPrompt: string;
    private temperature: number;

    constructor(profile: AgentProfile, llmClient: ModelClient, knowledgeBase?: string) {
        this.id = profile.id;
        this.name = profile.role;
        this.llmClient = llmClient;
        this.temperature = profile.temperature;
        this.systemPrompt = knowledgeBase
            ? systemPromptFor(profile, `Your knowledge base:\n\n${knowledgeBase}`)
            : systemPromptFor(profile);
    }

    async review(problem: Problem, subject: ReviewSubject): Promise<{ feedback: ExpertFeedback; tokenUsage: number }> {
        const prompt = JSON.stringify({
            ...describeProblem(problem),
            allocation: toAllocationEntries(subject.allocation),
            total_cost: subject.totalCost,
            allocator_reasoning: subject.reasoning,
        });

        const result = await this.llmClient.generateObject(
            ExpertFeedback,
            this.systemPrompt,
            prompt,
            // Low temperature for consistent ratings
            { temperature: this.temperature, agent: this.name },
        );

        return { feedback: result.object, tokenUsage: result.tokenUsage };
    }
}

/**
 * Build the reviewers for a panel mode. Strategist mode needs the knowledge base text.
 */
export function buildReviewPanel(mode: PanelMode, llmClient: ModelClient, knowledgeBase?: string): ExpertReviewer[] {
    if (mode === "strategist") {
        return [new ExpertReviewer(AGENT_PROFILES.optimization_strategist, llmClient, knowledgeBase)];
    }
    return PANEL_EXPERTS.map((id) => new ExpertReviewer(AGENT_PROFILES[id], llmClient));
}

/**
 * EvaluatorAgent — Compares an allocation against the exhaustive optimum,
 * with the optimiser and the calculator available as tools.
 */
import type { ModelClient } from "../llm/client.js";
import type { Allocation, Problem } from "../schemas/machine.js";
import { toAllocationEntries } from "../schemas/agents.js";
import { AGENT_PROFILES, systemPromptFor } from "./profiles.js";
import type { AgentProfile } from "./profiles.js";
import { describeProblem } from "./context.js";
import { CALCULATOR_TOOL, ORACLE_TOOL, createCalculatorTool, createOracleTool } from "./tools.js";

export interface EvaluationResult {
    text: string;
    toolCalls: string[];
    tokenUsage: number;
}

export class EvaluatorAgent {
    private llmClient: ModelClient;
    private profile: AgentProfile;

    constructor(llmClient: ModelClient, profile: AgentProfile = AGENT_PROFILES.evaluator) {
        this.llmClient = llmClient;
        this.profile = profile;
    }

    async evaluate(
        problem: Problem,
        allocation: Allocation,
        options: { maxSteps?: number; maxMachines?: number } = {},
    ): Promise<EvaluationResult> {
        const prompt = JSON.stringify({
            task: "Evaluate the proposed allocation against the optimal allocation.",
            ...describeProblem(problem),
            proposed_allocation: toAllocationEntries(allocation),
        });

        const result = await this.llmClient.generateTextWithTools(
            systemPromptFor(this.profile),
            prompt,
            {
                [ORACLE_TOOL]: createOracleTool(problem, options.maxMachines),
                [CALCULATOR_TOOL]: createCalculatorTool(problem),
            },
            { temperature: this.profile.temperature, maxSteps: options.maxSteps, agent: this.profile.role },
        );

        return { text: result.text, toolCalls: result.toolCalls, tokenUsage: result.tokenUsage };
    }
}

/**
 * StructuredAllocatorAgent — A single-shot allocator that is told to price
 * every allocation with the calculator tool.
 *
 * Models often skip the tool and do the arithmetic themselves. The reply
 * says whether the tool was called; enforcing its use is the caller's job
 * (see `runToolEnforcedAllocation()`).
 */
import type { ModelClient } from "../llm/client.js";
import type { Allocation, Problem } from "../schemas/machine.js";
import { AllocationSolution, toAllocation } from "../schemas/agents.js";
import { AGENT_PROFILES, systemPromptFor } from "./profiles.js";
import type { AgentProfile } from "./profiles.js";
import { describeProblem } from "./context.js";
import { CALCULATOR_TOOL, createCalculatorTool } from "./tools.js";

export interface SolutionResult {
    solution: AllocationSolution;
    allocation: Allocation;
    toolCalls: string[];
    tokenUsage: number;
}

export class StructuredAllocatorAgent {
    private llmClient: ModelClient;
    private profile: AgentProfile;

    constructor(llmClient: ModelClient, profile: AgentProfile = AGENT_PROFILES.structured_allocator) {
        this.llmClient = llmClient;
        this.profile = profile;
    }

    async solve(problem: Problem, options: { maxSteps?: number } = {}): Promise<SolutionResult> {
        const prompt = JSON.stringify({
            task: `Allocate exactly ${problem.demand} units across the machines below at minimum total cost, `
                + `then price the allocation with the ${CALCULATOR_TOOL} tool.`,
            ...describeProblem(problem),
        });

        const result = await this.llmClient.generateObjectWithTools(
            AllocationSolution,
            systemPromptFor(this.profile),
            prompt,
            { [CALCULATOR_TOOL]: createCalculatorTool(problem) },
            { temperature: this.profile.temperature, maxSteps: options.maxSteps, agent: this.profile.role },
        );

        return {
            solution: result.object,
            allocation: toAllocation(result.object.machine_allocations),
            toolCalls: result.toolCalls,
            tokenUsage: result.tokenUsage,
        };
    }
}

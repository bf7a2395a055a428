/**
 * ReporterAgent — Writes the narrative report for a finished run.
 */
import type { ModelClient } from "../llm/client.js";
import { AGENT_PROFILES, systemPromptFor } from "./profiles.js";
import type { AgentProfile } from "./profiles.js";

export class ReporterAgent {
    private llmClient: ModelClient;
    private profile: AgentProfile;

    constructor(llmClient: ModelClient, profile: AgentProfile = AGENT_PROFILES.reporter) {
        this.llmClient = llmClient;
        this.profile = profile;
    }

    /**
     * @param context JSON-serialisable run data: problem, result, history.
     * @returns The report body as markdown.
     */
    async write(context: object): Promise<{ markdown: string; tokenUsage: number }> {
        const result = await this.llmClient.generateText(
            systemPromptFor(this.profile),
            JSON.stringify(context),
            { temperature: this.profile.temperature, agent: this.profile.role },
        );
        return { markdown: result.text, tokenUsage: result.tokenUsage };
    }
}

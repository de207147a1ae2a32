import { Agent, Runner, setDefaultOpenAIKey } from "@openai/agents";
import type { GenerationRequest, TextGenerationProvider } from "./provider.js";

const DEFAULT_INSTRUCTIONS =
  "You write structured product content. Answer with a single JSON document and nothing else unless asked.";

export type OpenAIAgentsProviderOptions = {
  apiKey: string;
  model: string;
  temperature?: number;
};

/** Plain-text generation through one single-turn agent run per request. */
export class OpenAIAgentsProvider implements TextGenerationProvider {
  readonly name = "openai-agents";
  private readonly runner: Runner;
  private readonly model: string;
  private readonly temperature: number;

  constructor(options: OpenAIAgentsProviderOptions) {
    setDefaultOpenAIKey(options.apiKey);
    this.model = options.model;
    this.temperature = options.temperature ?? 0.2;
    this.runner = new Runner({ modelSettings: { temperature: this.temperature } });
  }

  async generate(request: GenerationRequest, options: { signal: AbortSignal }): Promise<string> {
    const hint = request.shapeHint
      ? `\n\nThe JSON document is a "${request.shapeHint.kind}"${request.shapeHint.description ? `: ${request.shapeHint.description}` : "."}`
      : "";
    const agent = new Agent({
      name: request.shapeHint ? `Writer (${request.shapeHint.kind})` : "Writer",
      model: this.model,
      instructions: (request.system ?? DEFAULT_INSTRUCTIONS) + hint
    });

    const result = await this.runner.run(agent, request.prompt, { maxTurns: 1, signal: options.signal });
    const text = result.finalOutput;
    if (typeof text !== "string" || text.trim().length === 0) {
      throw new Error(`${agent.name} produced no final output`);
    }
    return text;
  }
}

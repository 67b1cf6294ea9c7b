import { AzureOpenAI } from 'openai';
import { RemoteDependencyError } from '../errors';
import { EngineConfig } from '../config';

export interface TextGenerator {
    generate(prompt: string): Promise<string>;
}

export const prompts = {
    workload: (index: number) =>
        `Write a two-sentence bug report for a fictional web application. Variant ${index + 1}. Reply with the report only.`,
    enrichment: (payload: string) =>
        `Summarize the following bug report in one sentence and suggest a severity (low, medium, high):\n\n${payload}`,
};

/**
 * Calls the generator and normalizes every failure to RemoteDependencyError,
 * keeping the original as `cause`.
 */
export async function generateText(generator: TextGenerator, prompt: string, purpose: string): Promise<string> {
    try {
        return await generator.generate(prompt);
    } catch (err) {
        if (err instanceof RemoteDependencyError) throw err;
        throw new RemoteDependencyError(
            `${purpose}: text generation failed: ${err instanceof Error ? err.message : String(err)}`,
            { cause: err },
        );
    }
}

export class AzureOpenAITextGenerator implements TextGenerator {
    private readonly client: AzureOpenAI;
    private readonly deployment: string;

    constructor(config: EngineConfig['openai'], private readonly maxTokens: number = 256) {
        this.deployment = config.deployment;
        this.client = new AzureOpenAI({
            endpoint: config.endpoint,
            apiKey: config.apiKey,
            apiVersion: config.apiVersion,
            deployment: config.deployment,
        });
    }

    async generate(prompt: string): Promise<string> {
        let text: string | null | undefined;
        try {
            const completion = await this.client.chat.completions.create({
                model: this.deployment,
                messages: [{ role: 'user', content: prompt }],
                max_tokens: this.maxTokens,
            });
            text = completion.choices[0]?.message?.content;
        } catch (err) {
            throw new RemoteDependencyError(
                `chat completion on "${this.deployment}" failed: ${err instanceof Error ? err.message : String(err)}`,
                { cause: err },
            );
        }

        const trimmed = text?.trim();
        if (!trimmed) {
            throw new RemoteDependencyError(`chat completion on "${this.deployment}" returned no content`);
        }
        return trimmed;
    }
}

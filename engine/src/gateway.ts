import { OrchestratorEvent } from '@forgeloop/shared';
import { LLMProvider } from './llm-providers';

export type StructuredResponse = Record<string, unknown>;

/**
 * Structured-output boundary to the model. Returns null on any failure
 * (timeout, provider error, malformed JSON); call sites supply fallbacks.
 */
export interface LLMGateway {
  extractStructured(
    systemPrompt: string,
    userPrompt: string,
    caller?: string
  ): Promise<StructuredResponse | null>;
}

const isRecord = (value: unknown): value is StructuredResponse =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

// Pull the JSON object out of a reply that may be fenced or wrapped in prose
export function extractJSON(text: string): StructuredResponse | null {
  let jsonText = text.trim();
  const fenceMatch = jsonText.match(/```(?:json)?\s*([\s\S]*?)\s*```/);
  if (fenceMatch) {
    jsonText = fenceMatch[1];
  }

  const start = jsonText.indexOf('{');
  const end = jsonText.lastIndexOf('}');
  if (start === -1 || end <= start) {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(jsonText.slice(start, end + 1));
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

export class ProviderGateway implements LLMGateway {
  constructor(
    private provider: LLMProvider,
    private timeoutMs: number,
    private eventCallback: (event: OrchestratorEvent) => void = () => undefined
  ) {}

  async extractStructured(
    systemPrompt: string,
    userPrompt: string,
    caller = 'llm'
  ): Promise<StructuredResponse | null> {
    let text: string;
    try {
      text = await this.completeWithTimeout(systemPrompt, userPrompt);
    } catch (err) {
      this.eventCallback({
        type: 'llm_fallback',
        caller,
        error: err instanceof Error ? err.message : String(err),
      });
      return null;
    }

    const parsed = extractJSON(text);
    if (!parsed) {
      this.eventCallback({ type: 'llm_fallback', caller, error: 'response was not a JSON object' });
    }
    return parsed;
  }

  // A timeout also aborts the in-flight request
  private completeWithTimeout(systemPrompt: string, userPrompt: string): Promise<string> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new Error(`LLM call timed out after ${this.timeoutMs}ms`));
        controller.abort();
      }, this.timeoutMs);
    });

    return Promise.race([this.provider.complete(systemPrompt, userPrompt, controller.signal), timeout]).finally(
      () => clearTimeout(timer)
    );
  }
}

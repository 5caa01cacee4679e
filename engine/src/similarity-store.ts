import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { SimilarProject, TechChoice, TechChoiceSchema } from '@forgeloop/shared';

/**
 * Hint source of past runs. Absence or failure must degrade to "no hints".
 */
export interface SimilarityStore {
  findSimilar(prompt: string, topK: number): Promise<SimilarProject[]>;
  recordOutcome(prompt: string, techStack: TechChoice[], successScore: number): Promise<void>;
}

const StoredOutcomeSchema = z.object({
  prompt: z.string(),
  tech_stack: z.array(TechChoiceSchema).default([]),
  success_score: z.number().default(5),
  recorded_at: z.string().default(''),
});

type StoredOutcome = z.infer<typeof StoredOutcomeSchema>;

const MIN_SIMILARITY = 0.1;
const MAX_ENTRIES = 100;

const words = (text: string): Set<string> =>
  new Set(text.toLowerCase().split(/\s+/).filter(Boolean));

/** Jaccard overlap of the two prompts' word sets. */
export function promptSimilarity(a: string, b: string): number {
  const left = words(a);
  const right = words(b);
  const union = new Set([...left, ...right]);
  if (union.size === 0) return 0;
  const shared = [...left].filter((w) => right.has(w)).length;
  return shared / union.size;
}

/**
 * Outcomes kept in a JSON array on disk, newest last, capped at 100.
 */
export class JsonSimilarityStore implements SimilarityStore {
  constructor(private filePath: string) {}

  private async load(): Promise<StoredOutcome[]> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
      throw err;
    }

    const parsed = z.array(StoredOutcomeSchema).safeParse(JSON.parse(text));
    if (!parsed.success) {
      throw new Error(`Similarity store ${this.filePath} is malformed: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  async findSimilar(prompt: string, topK: number): Promise<SimilarProject[]> {
    const entries = await this.load();
    return entries
      .map((entry) => ({
        prompt: entry.prompt,
        tech_stack: entry.tech_stack,
        success_score: entry.success_score,
        similarity: promptSimilarity(prompt, entry.prompt),
      }))
      .filter((match) => match.similarity > MIN_SIMILARITY)
      .sort((a, b) => b.similarity - a.similarity)
      .slice(0, topK);
  }

  async recordOutcome(prompt: string, techStack: TechChoice[], successScore: number): Promise<void> {
    const entries = await this.load();
    entries.push({
      prompt,
      tech_stack: techStack,
      success_score: successScore,
      recorded_at: new Date().toISOString(),
    });

    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, JSON.stringify(entries.slice(-MAX_ENTRIES), null, 2), 'utf-8');
  }
}

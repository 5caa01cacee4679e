import { DomainAnalysis } from '@forgeloop/shared';
import domainPatterns from './data/domain-patterns.json';

const KEYWORD_WEIGHT = 3;

// Light keyword analysis of the prompt; guidance only
export function analyzeProject(prompt: string): DomainAnalysis {
  const p = prompt.toLowerCase();

  let domain = 'general';
  let bestScore = 0;
  for (const [name, words] of Object.entries(domainPatterns)) {
    const score = words.filter((w) => p.includes(w)).length * KEYWORD_WEIGHT;
    if (score > bestScore) {
      domain = name;
      bestScore = score;
    }
  }

  let complexity: DomainAnalysis['complexity'] = ['simple', 'basic'].some((w) => p.includes(w))
    ? 'simple'
    : 'moderate';
  if (['enterprise', 'complex', 'advanced'].some((w) => p.includes(w))) {
    complexity = 'complex';
  }

  let performance: DomainAnalysis['performance_needs'] = p.includes('simple') ? 'low' : 'medium';
  if (['high-performance', 'fast', 'real-time'].some((w) => p.includes(w))) {
    performance = 'high';
  }

  return {
    domain,
    complexity,
    performance_needs: performance,
    confidence: Math.min(1, bestScore / 10),
  };
}

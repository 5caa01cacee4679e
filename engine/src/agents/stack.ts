import { StackDecision, TechChoice } from '@forgeloop/shared';

export const STACK_ROLES = ['backend', 'frontend', 'database', 'deployment'] as const;

// Markers of an undecided choice such as "Django or Flask"
const AMBIGUITY_MARKERS = [' or ', '/', 'either', '|'];

export function isAmbiguous(name: string): boolean {
  const n = name.toLowerCase();
  return AMBIGUITY_MARKERS.some((marker) => n.includes(marker));
}

export function hasAmbiguousChoice(stack: readonly TechChoice[] = []): boolean {
  return stack.some((choice) => isAmbiguous(choice.name));
}

export function stackFromDecision(decision: StackDecision): TechChoice[] {
  return STACK_ROLES.map((role) => ({
    role,
    name: decision[role].name,
    reasoning: decision[role].reasoning || 'Team decision',
  }));
}

type BackendFamily = 'node' | 'python' | 'go' | 'other';

export function backendFamily(name = ''): BackendFamily {
  const n = name.toLowerCase();
  if (['node', 'express', 'nest', 'koa', 'fastify'].some((k) => n.includes(k))) return 'node';
  if (['python', 'django', 'flask', 'fastapi'].some((k) => n.includes(k))) return 'python';
  if (/\bgo\b|golang|\bgin\b/.test(n)) return 'go';
  return 'other';
}

export function backendExtension(name = ''): string {
  switch (backendFamily(name)) {
    case 'python':
      return 'py';
    case 'go':
      return 'go';
    default:
      return 'js';
  }
}

/**
 * Backend files written in a different language than the chosen backend,
 * e.g. Python modules under backend/ for an Express stack.
 */
export function detectStackMismatch(backendName: string, paths: readonly string[]): string | null {
  const backendFiles = paths.filter((p) => p.startsWith('backend/'));
  const family = backendFamily(backendName);
  if (family === 'node' && backendFiles.some((p) => p.endsWith('.py'))) {
    return 'Node chosen but Python files in backend';
  }
  if (family === 'python' && backendFiles.some((p) => p.endsWith('.js') || p.endsWith('.ts'))) {
    return 'Python chosen but Node files in backend';
  }
  return null;
}

import { Contract, Endpoint, Table } from '@forgeloop/shared';
import { matchesPattern } from './glob';

// Minimum deliverable shape, injected into every merged contract
export const BASELINE_FILES: readonly string[] = [
  '.env.example',
  'Makefile',
  'README.md',
  'backend/app.*',
  'docker-compose.yml',
  'frontend/src/App.*',
  'scripts/build.sh',
  'scripts/dev.sh',
  'scripts/test.sh',
];

export const BASELINE_ENDPOINTS: readonly Endpoint[] = [
  { method: 'GET', path: '/api/health' },
  { method: 'GET', path: '/docs' },
];

export function emptyContract(): Contract {
  return { files: [], endpoints: [], tables: [] };
}

export function isContractEmpty(contract?: Contract): boolean {
  if (!contract) return true;
  return contract.files.length === 0 || contract.endpoints.length === 0;
}

export const endpointKey = (endpoint: Endpoint): string =>
  `${endpoint.method.toUpperCase()} ${endpoint.path}`;

const compareText = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

const compareEndpoints = (a: Endpoint, b: Endpoint): number =>
  a.method === b.method ? compareText(a.path, b.path) : compareText(a.method, b.method);

function unionEndpoints(...lists: ReadonlyArray<readonly Endpoint[]>): Endpoint[] {
  const byKey = new Map<string, Endpoint>();
  for (const list of lists) {
    for (const endpoint of list) {
      const normalized = { method: endpoint.method.toUpperCase(), path: endpoint.path };
      byKey.set(endpointKey(normalized), normalized);
    }
  }
  return [...byKey.values()].sort(compareEndpoints);
}

function unionTables(...lists: ReadonlyArray<readonly Table[]>): Table[] {
  const names = new Set<string>();
  for (const list of lists) {
    for (const table of list) {
      if (table.name) names.add(table.name);
    }
  }
  return [...names].sort().map((name) => ({ name }));
}

/**
 * Union of two contracts plus the baseline. Commutative and idempotent:
 * mergeContract(mergeContract(a, b), b) equals mergeContract(a, b).
 */
export function mergeContract(base?: Contract, add?: Contract): Contract {
  const left = base ?? emptyContract();
  const right = add ?? emptyContract();

  const files = [...new Set([...left.files, ...right.files, ...BASELINE_FILES])].sort();
  const merged: Contract = {
    files,
    endpoints: unionEndpoints(left.endpoints, right.endpoints, BASELINE_ENDPOINTS),
    tables: unionTables(left.tables, right.tables),
  };

  const source = left.source === right.source ? left.source : 'merge';
  if (source) {
    merged.source = source;
  }
  return merged;
}

export function withBaseline(contract: Contract): Contract {
  return mergeContract(contract, contract);
}

/**
 * Required paths (literal or glob) with no match in the manifest.
 */
export function missingFiles(required: readonly string[], manifest: readonly string[]): string[] {
  return required.filter((pattern) => !manifest.some((file) => matchesPattern(pattern, file)));
}

export function missingBaseline(manifest: readonly string[]): string[] {
  return missingFiles(BASELINE_FILES, manifest);
}

/**
 * Endpoints whose path never appears in any generated file.
 */
export function missingEndpoints(
  required: readonly Endpoint[],
  files: Record<string, string>
): string[] {
  const contents = Object.values(files);
  return required
    .filter((endpoint) => !contents.some((content) => content.includes(endpoint.path)))
    .map(endpointKey);
}

/**
 * Share of contract files present in the manifest, with the ones missing.
 */
export function coverage(
  contract: Contract | undefined,
  manifest: readonly string[]
): { missing: string[]; ratio: number } {
  const required = contract?.files ?? [];
  const missing = missingFiles(required, manifest);
  const ratio = required.length === 0 ? 1 : (required.length - missing.length) / required.length;
  return { missing, ratio };
}

import { Contract, Endpoint, GeneratedCode, SharedState } from '@forgeloop/shared';
import { isGlob } from '../glob';
import { techFor } from '../state';
import { backendExtension, backendFamily } from './stack';

/**
 * Concrete file name for a contract entry. `backend/app.*` takes the
 * backend's extension; any other wildcard segment becomes `index`.
 */
export function resolveContractPath(pattern: string, backendName = ''): string {
  if (!isGlob(pattern)) {
    return pattern;
  }

  let resolved = pattern;
  if (resolved.endsWith('.*')) {
    const ext = resolved.startsWith('frontend/') ? 'js' : backendExtension(backendName);
    resolved = `${resolved.slice(0, -2)}.${ext}`;
  }
  return resolved
    .replace(/\*\*\//g, '')
    .replace(/\*/g, 'index')
    .replace(/\?/g, 'x');
}

const title = (prompt: string): string => prompt.trim().split(/\s+/).slice(0, 6).join(' ') || 'App';

function backendApp(family: ReturnType<typeof backendFamily>, endpoints: readonly Endpoint[]): string {
  if (family === 'python') {
    const routes = endpoints.map(
      (e, i) =>
        `@app.route('${e.path}', methods=['${e.method}'])\ndef route_${i}():\n    return jsonify({'status': 'ok'})\n`
    );
    return ['from flask import Flask, jsonify', '', 'app = Flask(__name__)', '', ...routes].join('\n');
  }

  if (family === 'go') {
    const routes = endpoints.map(
      (e) => `\thttp.HandleFunc("${e.path}", func(w http.ResponseWriter, r *http.Request) { w.Write([]byte("ok")) })`
    );
    return ['package main', '', 'import "net/http"', '', 'func main() {', ...routes, '\thttp.ListenAndServe(":5000", nil)', '}', ''].join('\n');
  }

  const routes = endpoints.map(
    (e) => `app.${e.method.toLowerCase()}('${e.path}', (req, res) => res.json({ status: 'ok' }));`
  );
  return [
    "const express = require('express');",
    '',
    'const app = express();',
    'app.use(express.json());',
    '',
    ...routes,
    '',
    'app.listen(process.env.PORT || 5000);',
    '',
  ].join('\n');
}

function commentFor(filePath: string, text: string): string {
  if (/\.(js|jsx|ts|tsx|go|java|kt|cs)$/.test(filePath)) return `// ${text}\n`;
  if (filePath.endsWith('.sql')) return `-- ${text}\n`;
  if (filePath.endsWith('.md')) return `<!-- ${text} -->\n`;
  if (filePath.endsWith('.json')) return '{}\n';
  return `# ${text}\n`;
}

function stubFor(filePath: string, state: SharedState, contract: Contract): string {
  const backendName = techFor(state, 'backend')?.name;
  const name = filePath.split('/').pop() ?? filePath;

  if (/^backend\/app\.[a-z]+$/.test(filePath)) {
    return backendApp(backendFamily(backendName), contract.endpoints);
  }
  if (/^frontend\/src\/App\.[a-z]+$/.test(filePath)) {
    return `export default function App() {\n  return <h1>${title(state.prompt)}</h1>;\n}\n`;
  }

  switch (name) {
    case 'README.md':
      return [
        `# ${title(state.prompt)}`,
        '',
        state.prompt,
        '',
        '## Quickstart',
        '',
        '```',
        'cp .env.example .env',
        'docker compose up --build',
        '```',
        '',
        'Health check: http://localhost:5000/api/health',
        '',
      ].join('\n');
    case 'docker-compose.yml':
      return "services:\n  backend:\n    build: ./backend\n    ports:\n      - '5000:5000'\n  frontend:\n    build: ./frontend\n  db:\n    image: postgres:16\n";
    case '.env.example':
      return 'PORT=5000\nDATABASE_URL=postgres://app:app@db:5432/app\n';
    case 'Makefile':
      return 'dev:\n\t./scripts/dev.sh\n\nbuild:\n\t./scripts/build.sh\n\ntest:\n\t./scripts/test.sh\n';
    default:
      break;
  }

  if (filePath.startsWith('scripts/') && filePath.endsWith('.sh')) {
    const task = name.replace(/\.sh$/, '');
    return `#!/usr/bin/env sh\nset -e\necho "${task}"\n`;
  }
  return commentFor(filePath, `${name}: generated scaffold`);
}

/**
 * Minimal project that covers every contract file and endpoint. Used
 * when no model is available so the loop still has something to validate.
 */
export function scaffoldProject(state: SharedState, contract: Contract): GeneratedCode {
  const backendName = techFor(state, 'backend')?.name;
  const files: Record<string, string> = {};
  for (const pattern of contract.files) {
    const filePath = resolveContractPath(pattern, backendName);
    files[filePath] = stubFor(filePath, state, contract);
  }

  return {
    files,
    setup_instructions: ['cp .env.example .env', 'docker compose build'],
    run_commands: ['make dev'],
    deployment_notes: ['configure environment variables before deploying'],
  };
}

#!/usr/bin/env node
import * as path from 'path';
import * as dotenv from 'dotenv';
import { OrchestratorEvent } from '@forgeloop/shared';
import { parseArgs, USAGE } from './args';
import { loadConfig } from './config';
import { Orchestrator } from './orchestrator';
import { ProjectWriter, saveState } from './workspace';

// Load .env file - try multiple locations
// Priority: repo root > workspace root > current directory
const repoRoot = path.resolve(__dirname, '../..');
const workspaceRoot = process.env.WORKSPACE_ROOT || process.cwd();

dotenv.config({ path: path.join(repoRoot, '.env') });
dotenv.config({ path: path.join(workspaceRoot, '.env') });
dotenv.config();

function logEvent(event: OrchestratorEvent) {
  switch (event.type) {
    case 'status':
      console.log(event.message);
      break;
    case 'agent_started':
      console.log(`[${event.step}] ${event.agent}`);
      break;
    case 'agent_skipped':
      if (event.reason !== 'ineligible') {
        console.warn(`[${event.step}] skipped ${event.agent}: ${event.reason}${event.error ? ` (${event.error})` : ''}`);
      }
      break;
    case 'agent_completed':
      if (event.follow_ups.length > 0) {
        console.log(`    -> ${event.follow_ups.join(', ')}`);
      }
      break;
    case 'agent_failed':
      console.error(`[${event.step}] ${event.agent} failed: ${event.error}`);
      break;
    case 'llm_fallback':
      console.warn(`    ${event.caller}: using fallback (${event.error})`);
      break;
    case 'validation_ready':
      console.log(
        `    validation #${event.iteration}: ${event.validation.score}/10 (${event.validation.status}), best ${event.best_score}/10`
      );
      break;
    case 'route_decision': {
      const d = event.decision;
      console.log(`    route: ${d.kind === 'iterating' ? `iterating (${d.reason})` : d.kind}`);
      break;
    }
    case 'pipeline_complete':
      console.log(`Done after ${event.steps} steps (${event.reason}): score ${event.score}/10, ${event.files} files`);
      break;
    case 'error':
      console.error(`Error: ${event.error}`);
      break;
  }
}

async function main() {
  let args;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    console.error(USAGE);
    process.exit(1);
  }

  if (args.help || !args.prompt) {
    console.log(USAGE);
    process.exit(args.help ? 0 : 1);
  }

  console.log('=== forgeloop ===');
  console.log(`Workspace: ${workspaceRoot}`);

  let config;
  let orchestrator;
  try {
    config = loadConfig(workspaceRoot);
    console.log(`Config loaded: provider=${config.provider}/${config.model}, threshold=${config.validation_threshold}`);
    orchestrator = new Orchestrator(config, workspaceRoot, logEvent);
  } catch (err) {
    console.error('Failed to start:', err instanceof Error ? err.message : String(err));
    process.exit(1);
  }

  const state = await orchestrator.runPipeline(args.prompt);

  const writer = new ProjectWriter(path.resolve(workspaceRoot, args.outDir));
  const result = writer.materialize(state.generated_code?.files ?? {});
  if (!result.success) {
    console.error(result.error);
    process.exit(1);
  }
  console.log(`Wrote ${result.written.length} files to ${writer.targetDir}`);

  if (args.saveState) {
    saveState(path.resolve(workspaceRoot, args.saveState), state);
    console.log(`State saved to ${args.saveState}`);
  }
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});

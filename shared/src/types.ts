import { z } from 'zod';

export const ProviderSchema = z.enum(['openai', 'anthropic', 'offline']);
export type Provider = z.infer<typeof ProviderSchema>;

// 'free' < 'guided' < 'strict'; a run only ever moves right
export const ContractModeSchema = z.enum(['free', 'guided', 'strict']);
export type ContractMode = z.infer<typeof ContractModeSchema>;

// Config schema
export const ConfigSchema = z.object({
  provider: ProviderSchema.default('offline'),
  model: z.string().default('gpt-4o-mini'),

  // Tech-team perspectives may run on a cheaper model
  perspective_provider: ProviderSchema.optional(),
  perspective_model: z.string().optional(),

  // Loop bounds
  max_steps: z.number().int().positive().default(60),
  max_codegen_iters: z.number().int().positive().default(4),

  // Acceptance
  validation_threshold: z.number().min(0).max(10).default(7),
  require_valid_status: z.boolean().default(false),
  file_contract_mode: ContractModeSchema.default('guided'),

  llm_timeout_ms: z.number().int().positive().default(120_000),

  // Similarity store (JSON file, relative to workspace root)
  similarity_store: z.string().optional(),
  similarity_top_k: z.number().int().positive().default(5),
});

export type Config = z.infer<typeof ConfigSchema>;

export const AGENT_IDS = [
  'memory',
  'tech_team',
  'stack_resolver',
  'capabilities',
  'contract',
  'contract_guard',
  'architecture',
  'codegen',
  'database',
  'deployment',
  'validate',
  'validation_router',
  'evaluation',
] as const;

export type AgentId = (typeof AGENT_IDS)[number];

// Endpoints arrive either as {method, path} or as "GET /path"
const EndpointObjectSchema = z.object({
  method: z.string().default('GET'),
  path: z.string(),
});

export const EndpointSchema = z.union([
  EndpointObjectSchema,
  z.string().transform((value) => {
    const [first, ...rest] = value.trim().split(/\s+/);
    return rest.length > 0
      ? { method: first, path: rest.join(' ') }
      : { method: 'GET', path: first };
  }),
]);

export type Endpoint = z.infer<typeof EndpointSchema>;

export const TableSchema = z.object({ name: z.string() });
export type Table = z.infer<typeof TableSchema>;

// Delivery contract: what a generated project must contain
export const ContractSchema = z.object({
  files: z.array(z.string()).default([]),
  endpoints: z.array(EndpointSchema).default([]),
  tables: z.array(TableSchema).default([]),
  source: z.string().optional(),
});

export type Contract = z.infer<typeof ContractSchema>;

export const TechChoiceSchema = z.object({
  role: z.string(),
  name: z.string(),
  reasoning: z.string().default(''),
});

export type TechChoice = z.infer<typeof TechChoiceSchema>;

const NamedChoiceSchema = z.object({
  name: z.string().min(1),
  reasoning: z.string().default(''),
});

// One concrete choice per layer, as produced by the tech team moderator
export const StackDecisionSchema = z.object({
  backend: NamedChoiceSchema,
  frontend: NamedChoiceSchema,
  database: NamedChoiceSchema,
  deployment: NamedChoiceSchema,
  team_discussion: z.string().default(''),
});

export type StackDecision = z.infer<typeof StackDecisionSchema>;

export const CapabilitiesSchema = z.object({
  entities: z.array(z.string()).default([]),
  features: z.array(z.string()).default([]),
  auth: z.boolean().default(false),
  roles: z.array(z.string()).default([]),
  non_functional: z.array(z.string()).default([]),
});

export type Capabilities = z.infer<typeof CapabilitiesSchema>;

export const ArchitectureSchema = z.object({
  project_structure: z.record(z.string()).default({}),
  key_components: z.array(z.string()).default([]),
  data_flow: z.string().default(''),
  scalability_approach: z.string().default(''),
});

export type Architecture = z.infer<typeof ArchitectureSchema>;

export const DatabaseSchemaSchema = z.object({
  tables: z.record(
    z.object({
      columns: z.record(z.string()).default({}),
      indexes: z.array(z.string()).default([]),
      relationships: z.array(z.string()).default([]),
    })
  ),
  optimization_notes: z.string().default(''),
});

export type DatabaseSchema = z.infer<typeof DatabaseSchemaSchema>;

export const DeploymentPlanSchema = z.object({
  strategy: z.string(),
  containers: z.record(z.string()).default({}),
  environment: z.record(z.string()).default({}),
  scaling: z.string().default(''),
});

export type DeploymentPlan = z.infer<typeof DeploymentPlanSchema>;

const LayerListSchema = z.object({
  backend: z.array(z.string()).default([]),
  frontend: z.array(z.string()).default([]),
  database: z.array(z.string()).default([]),
  deployment: z.array(z.string()).default([]),
});

// Memory policy: preferences, a contract seed and acceptance knobs
export const MemoryPolicySchema = z.object({
  prefer: LayerListSchema,
  avoid: LayerListSchema,
  seed_contract: ContractSchema.optional(),
  validation: z.object({
    min_score: z.number().min(0).max(10).default(7),
    require_valid: z.boolean().default(false),
    mode: ContractModeSchema.default('guided'),
  }),
  coach_notes: z.array(z.string()).default([]),
});

export type MemoryPolicy = z.infer<typeof MemoryPolicySchema>;

export const GeneratedCodeSchema = z.object({
  files: z.record(z.string()).default({}),
  setup_instructions: z.array(z.string()).default([]),
  run_commands: z.array(z.string()).default([]),
  deployment_notes: z.array(z.string()).default([]),
});

export type GeneratedCode = z.infer<typeof GeneratedCodeSchema>;

export const ValidationStatusSchema = z.enum(['valid', 'issues', 'invalid', 'no_code']);
export type ValidationStatus = z.infer<typeof ValidationStatusSchema>;

// Validation report (scores are 0-10)
export const ValidationResultSchema = z.object({
  status: ValidationStatusSchema,
  score: z.number().min(0).max(10),
  technical_score: z.number().min(0).max(10).optional(),
  security_score: z.number().min(0).max(10).optional(),
  architecture_score: z.number().min(0).max(10).optional(),
  ux_score: z.number().min(0).max(10).optional(),
  issues: z.array(z.string()).default([]),
  suggestions: z.array(z.string()).default([]),
  missing_files: z.array(z.string()).default([]),
  missing_endpoints: z.array(z.string()).default([]),
  missing_baseline: z.array(z.string()).default([]),
});

export type ValidationResult = z.infer<typeof ValidationResultSchema>;

export const EvaluationSchema = z.object({
  overall_score: z.number().min(0).max(10),
  technology_fit: z.number().min(0).max(10).default(0),
  code_quality: z.number().min(0).max(10).default(0),
  user_satisfaction: z.number().min(0).max(10).default(0),
  feedback: z.string().default(''),
});

export type Evaluation = z.infer<typeof EvaluationSchema>;

// Signals agents leave on the blackboard for each other
export type PipelineEventType =
  | 'validation_completed'
  | 'refinement_triggered'
  | 'expand_contract'
  | 'need_debate';

export interface PipelineEvent {
  type: PipelineEventType;
  meta: Record<string, unknown>;
}

export interface DomainAnalysis {
  domain: string;
  complexity: 'simple' | 'moderate' | 'complex';
  performance_needs: 'low' | 'medium' | 'high';
  confidence: number;
}

export interface SimilarProject {
  prompt: string;
  tech_stack: TechChoice[];
  similarity: number;
  success_score: number;
}

// The blackboard. Every stage output is optional; readers default on missing keys.
export interface SharedState {
  prompt: string;

  // Loop control
  next_agents: AgentId[];
  events: PipelineEvent[];
  event_cursors: Partial<Record<AgentId, number>>;
  goal_reached?: boolean;
  budget_exhausted?: boolean;

  // Acceptance knobs
  validation_threshold: number;
  max_codegen_iters: number;
  require_valid_status: boolean;
  file_contract_mode: ContractMode;

  // Memory
  memory?: boolean;
  analysis?: DomainAnalysis;
  memory_policy?: MemoryPolicy;
  experience_hints?: string[];
  experience_warnings?: string[];
  coach_notes?: string[];
  similar_projects_count?: number;

  // Stack
  tech_stack?: TechChoice[];
  team_decision?: StackDecision;
  perspectives?: Array<{ role: string; proposal: Record<string, unknown> }>;
  stack_resolved?: boolean;
  stack_resolution_rationale?: string;

  // Product
  capabilities?: Capabilities;
  architecture?: Architecture;
  database_schema?: DatabaseSchema;
  deployment?: DeploymentPlan;

  // Contract
  contract?: Contract;
  contract_empty?: boolean;
  contract_missing_files?: string[];
  contract_missing_endpoints?: string[];
  missing_baseline?: string[];
  redo_contract?: boolean;

  // Code generation
  generated_code?: GeneratedCode;
  codegen_iters?: number;
  redo_codegen?: boolean;

  // Validation
  validation?: ValidationResult;
  last_validated_iter?: number;
  routed_after_iter?: number;
  best_generated_code?: GeneratedCode;
  best_validation_score?: number;
  /** Validation of best_generated_code. */
  best_validation?: ValidationResult;

  evaluation?: Evaluation;
}

// What an agent hands back: any subset of keys; next_agents is appended, not assigned
export type StateUpdate = Partial<SharedState>;

export type IterationReason = 'contract_missing' | 'baseline_missing' | 'no_code' | 'quality_improvement';

export type RouteDecision =
  | { kind: 'succeeded'; score: number; iteration: number }
  | {
      kind: 'iterating';
      reason: IterationReason;
      structural: boolean;
      score: number;
      iteration: number;
      mode: ContractMode;
    }
  | { kind: 'budget_exhausted'; score: number; iteration: number };

export type SkipReason = 'unknown_agent' | 'ineligible' | 'eligibility_failed';

export type StopReason = 'queue_empty' | 'step_cap' | 'goal_reached';

// Orchestrator event types
export type OrchestratorEvent =
  | { type: 'status'; message: string }
  | { type: 'agent_started'; agent: AgentId; step: number }
  | { type: 'agent_skipped'; agent: string; step: number; reason: SkipReason; error?: string }
  | { type: 'agent_completed'; agent: AgentId; step: number; keys: string[]; follow_ups: AgentId[] }
  | { type: 'agent_failed'; agent: AgentId; step: number; error: string }
  | { type: 'llm_fallback'; caller: string; error: string }
  | { type: 'validation_ready'; validation: ValidationResult; iteration: number; best_score: number }
  | { type: 'route_decision'; decision: RouteDecision }
  | { type: 'pipeline_complete'; reason: StopReason; steps: number; score: number; files: number }
  | { type: 'error'; error: string };

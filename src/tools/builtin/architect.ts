/**
 * Architect agent tools
 */

import { z } from 'zod';
import type { ToolRegistry } from '../registry.js';

export const ARCHITECT_AGENT = 'architect';

// =============================================================================
// validate_architecture
// =============================================================================

export const ValidateArchitectureArgs = z.object({
  architecture_description: z.string().min(1),
  validation_scope: z.string().min(1),
  check_scalability: z.boolean().default(true),
  check_resilience: z.boolean().default(true),
});

const SCALABILITY_SIGNALS = ['load balancer', 'cache', 'horizontal', 'autoscal', 'shard', 'replica'];
const RESILIENCE_SIGNALS = ['retry', 'circuit breaker', 'failover', 'redundan', 'health check', 'backup'];

function mentionsAny(text: string, signals: string[]): boolean {
  const lower = text.toLowerCase();
  return signals.some((signal) => lower.includes(signal));
}

export function validateArchitecture(args: z.output<typeof ValidateArchitectureArgs>) {
  const issues: string[] = [];
  const recommendations: string[] = [];

  if (args.check_scalability && !mentionsAny(args.architecture_description, SCALABILITY_SIGNALS)) {
    issues.push('No horizontal scaling strategy described');
    recommendations.push('Add a load balancer in front of stateless service replicas');
  }
  if (args.check_resilience && !mentionsAny(args.architecture_description, RESILIENCE_SIGNALS)) {
    issues.push('No failure handling described');
    recommendations.push('Implement retries with a circuit breaker on remote calls');
  }

  return {
    architecture: args.architecture_description,
    scope: args.validation_scope,
    checks: {
      scalability: args.check_scalability,
      resilience: args.check_resilience,
    },
    validation_results: {
      score: 100 - 15 * issues.length,
      issues,
      recommendations,
    },
    status: 'validated',
  };
}

// =============================================================================
// generate_architecture_diagram
// =============================================================================

export const DiagramComponent = z
  .object({
    name: z.string().min(1),
    type: z.string().optional(),
    connects_to: z.array(z.string()).default([]),
  })
  .passthrough();

export const GenerateDiagramArgs = z.object({
  diagram_type: z.enum(['component', 'deployment', 'sequence', 'data_flow']),
  components: z.array(DiagramComponent),
  include_data_flow: z.boolean().default(true),
});

function nodeId(name: string): string {
  return name.replace(/[^a-zA-Z0-9_]/g, '_');
}

/**
 * Mermaid source for the given components. Sequence diagrams become
 * participant/message lists; everything else a left-to-right graph.
 */
export function renderMermaid(
  diagramType: z.output<typeof GenerateDiagramArgs>['diagram_type'],
  components: z.output<typeof DiagramComponent>[],
  includeDataFlow: boolean
): string {
  const lines: string[] = [];
  const known = new Set(components.map((c) => c.name));

  if (diagramType === 'sequence') {
    lines.push('sequenceDiagram');
    for (const component of components) {
      lines.push(`  participant ${nodeId(component.name)} as ${component.name}`);
    }
    if (includeDataFlow) {
      for (const component of components) {
        for (const target of component.connects_to.filter((t) => known.has(t))) {
          lines.push(`  ${nodeId(component.name)}->>${nodeId(target)}: request`);
        }
      }
    }
    return lines.join('\n');
  }

  lines.push('graph LR');
  for (const component of components) {
    const label = component.type ? `${component.name}<br/>${component.type}` : component.name;
    lines.push(`  ${nodeId(component.name)}["${label}"]`);
  }
  if (includeDataFlow) {
    for (const component of components) {
      for (const target of component.connects_to.filter((t) => known.has(t))) {
        lines.push(`  ${nodeId(component.name)} --> ${nodeId(target)}`);
      }
    }
  }
  return lines.join('\n');
}

export function generateArchitectureDiagram(args: z.output<typeof GenerateDiagramArgs>) {
  return {
    diagram_type: args.diagram_type,
    component_count: args.components.length,
    include_data_flow: args.include_data_flow,
    format: 'mermaid',
    diagram: renderMermaid(args.diagram_type, args.components, args.include_data_flow),
    data_flow_defined: args.include_data_flow,
  };
}

// =============================================================================
// analyze_performance_implications
// =============================================================================

export const AnalyzePerformanceArgs = z.object({
  architecture_design: z.string().min(1),
  expected_scale: z
    .object({
      requests_per_second: z.number().nonnegative().optional(),
      concurrent_users: z.number().int().nonnegative().optional(),
      data_volume_gb: z.number().nonnegative().optional(),
    })
    .passthrough()
    .optional(),
  focus_areas: z.array(z.string()).default([]),
});

const BASELINE_THROUGHPUT_RPS = 1000;
const BASELINE_LATENCY_MS = 100;

export function analyzePerformanceImplications(args: z.output<typeof AnalyzePerformanceArgs>) {
  const bottlenecks: string[] = [];
  const opportunities: string[] = [];
  const rps = args.expected_scale?.requests_per_second;

  if (rps !== undefined && rps > BASELINE_THROUGHPUT_RPS) {
    bottlenecks.push(`Expected load of ${rps} rps exceeds single-instance baseline of ${BASELINE_THROUGHPUT_RPS} rps`);
    opportunities.push(`Scale out to at least ${Math.ceil(rps / BASELINE_THROUGHPUT_RPS)} instances`);
  }
  if (!/cache/i.test(args.architecture_design)) {
    opportunities.push('Cache frequently read data');
  }

  return {
    architecture: args.architecture_design,
    scale: args.expected_scale ?? null,
    focus_areas: args.focus_areas,
    performance_analysis: {
      estimated_latency_ms: BASELINE_LATENCY_MS,
      estimated_throughput_rps: BASELINE_THROUGHPUT_RPS,
      bottlenecks,
      optimization_opportunities: opportunities,
    },
  };
}

// =============================================================================
// suggest_technology_stack
// =============================================================================

export const SuggestStackArgs = z.object({
  requirements: z.record(z.unknown()),
  constraints: z.record(z.unknown()).optional(),
});

export function suggestTechnologyStack(args: z.output<typeof SuggestStackArgs>) {
  const recommended: Record<'frontend' | 'backend' | 'database' | 'devops', string[]> = {
    frontend: [],
    backend: [],
    database: [],
    devops: [],
  };
  return {
    requirements: args.requirements,
    constraints: args.constraints ?? null,
    recommended_stack: recommended,
    rationale: 'Technology stack recommendations based on requirements',
  };
}

// =============================================================================
// Registration
// =============================================================================

export function registerArchitectTools(registry: ToolRegistry, agent: string = ARCHITECT_AGENT): void {
  registry.registerTyped(agent, 'validate_architecture', ValidateArchitectureArgs, validateArchitecture);
  registry.registerTyped(agent, 'generate_architecture_diagram', GenerateDiagramArgs, generateArchitectureDiagram);
  registry.registerTyped(
    agent,
    'analyze_performance_implications',
    AnalyzePerformanceArgs,
    analyzePerformanceImplications
  );
  registry.registerTyped(agent, 'suggest_technology_stack', SuggestStackArgs, suggestTechnologyStack);
}

/**
 * Agent endpoints and the known agent presets.
 */

import { z } from 'zod';

export const AgentEndpointSchema = z.object({
  name: z.string().min(1),
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535),
  model: z.string().min(1),
  apiKey: z.string().min(1).optional(),
});

export type AgentEndpointInit = z.input<typeof AgentEndpointSchema>;

/**
 * One model server. Immutable once constructed.
 */
export class AgentEndpoint {
  readonly name: string;
  readonly host: string;
  readonly port: number;
  readonly model: string;
  readonly apiKey: string | undefined;

  constructor(init: AgentEndpointInit) {
    const parsed = AgentEndpointSchema.parse(init);
    this.name = parsed.name;
    this.host = parsed.host;
    this.port = parsed.port;
    this.model = parsed.model;
    this.apiKey = parsed.apiKey;
    Object.freeze(this);
  }

  get baseUrl(): string {
    return `http://${this.host}:${this.port}/v1`;
  }

  /**
   * Copy with some fields replaced
   */
  with(changes: Partial<AgentEndpointInit>): AgentEndpoint {
    const init: AgentEndpointInit = {
      name: changes.name ?? this.name,
      host: changes.host ?? this.host,
      port: changes.port ?? this.port,
      model: changes.model ?? this.model,
    };
    const apiKey = changes.apiKey ?? this.apiKey;
    if (apiKey !== undefined) {
      init.apiKey = apiKey;
    }
    return new AgentEndpoint(init);
  }

  toString(): string {
    return `${this.name} (${this.model} @ ${this.baseUrl})`;
  }
}

// =============================================================================
// Presets
// =============================================================================

export interface AgentPreset {
  port: number;
  model: string;
  description: string;
}

/**
 * The three specialised agents served side by side, one port each.
 * Model names are the served-model aliases the servers are started with.
 */
export const AGENT_PRESETS = {
  architect: {
    port: 8000,
    model: 'architect',
    description: 'System architecture design and validation',
  },
  dev: {
    port: 8001,
    model: 'dev',
    description: 'Code generation and implementation',
  },
  po: {
    port: 8002,
    model: 'po',
    description: 'Requirements, user stories and sprint planning',
  },
} as const satisfies Record<string, AgentPreset>;

export type AgentPresetName = keyof typeof AGENT_PRESETS;

export function isAgentPresetName(name: string): name is AgentPresetName {
  return Object.prototype.hasOwnProperty.call(AGENT_PRESETS, name);
}

/**
 * Endpoint for a preset on the given host
 */
export function presetEndpoint(
  name: AgentPresetName,
  overrides: Partial<Omit<AgentEndpointInit, 'name'>> = {}
): AgentEndpoint {
  const preset = AGENT_PRESETS[name];
  const init: AgentEndpointInit = {
    name,
    host: overrides.host ?? 'localhost',
    port: overrides.port ?? preset.port,
    model: overrides.model ?? preset.model,
  };
  if (overrides.apiKey !== undefined) {
    init.apiKey = overrides.apiKey;
  }
  return new AgentEndpoint(init);
}

export interface EndpointSelection {
  name: string;
  host?: string | undefined;
  port?: number | undefined;
  model?: string | undefined;
  apiKey?: string | undefined;
}

/**
 * Endpoint for a preset or a custom agent. Custom agents need an explicit
 * port; their model defaults to the agent name.
 */
export function resolveEndpoint(selection: EndpointSelection): AgentEndpoint {
  const host = selection.host ?? 'localhost';

  if (isAgentPresetName(selection.name)) {
    const overrides: Partial<Omit<AgentEndpointInit, 'name'>> = { host };
    if (selection.port !== undefined) overrides.port = selection.port;
    if (selection.model !== undefined) overrides.model = selection.model;
    if (selection.apiKey !== undefined) overrides.apiKey = selection.apiKey;
    return presetEndpoint(selection.name, overrides);
  }

  if (selection.port === undefined) {
    throw new Error(
      `Unknown agent '${selection.name}': a port is required for agents other than ${Object.keys(AGENT_PRESETS).join(', ')}`
    );
  }

  const init: AgentEndpointInit = {
    name: selection.name,
    host,
    port: selection.port,
    model: selection.model ?? selection.name,
  };
  if (selection.apiKey !== undefined) {
    init.apiKey = selection.apiKey;
  }
  return new AgentEndpoint(init);
}

/**
 * Tool Registration and Lookup
 *
 * Handlers are keyed by (agent, tool name). Tool descriptors advertised to
 * the model are loaded separately from `{agent}-tools.json` files and are
 * never consulted during dispatch.
 */

import { readFile, readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { ToolDescriptorSchema, ToolNameSchema, type ToolDescriptor } from '../protocol/messages.js';
import { errorMessage } from '../protocol/errors.js';
import { err, ok, type Result } from '../protocol/result.js';
import { createSilentLogger, type StructuredLogger } from '../observability/logger.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Decoded tool call arguments; always a plain JSON object
 */
export type ToolArguments = Record<string, unknown>;

/**
 * Untyped handler: receives the decoded argument object as-is
 */
export type ToolHandler = (args: ToolArguments) => unknown;

/**
 * Handler whose arguments have been validated by a zod schema
 */
export type TypedToolHandler<S extends z.ZodTypeAny> = (args: z.output<S>) => unknown;

/**
 * A registered handler. `prepare` validates the arguments and returns the
 * invocation to run, or the validation failure.
 */
export interface RegisteredTool {
  agent: string;
  name: string;
  typed: boolean;
  prepare(args: ToolArguments): Result<() => Promise<unknown>, string>;
}

export interface RejectedDescriptor {
  index: number;
  name: string | undefined;
  reason: string;
}

/**
 * Outcome of loading one schema file
 */
export type SchemaFileReport =
  | {
      agent: string;
      file: string;
      ok: true;
      loaded: string[];
      rejected: RejectedDescriptor[];
    }
  | {
      agent: string;
      file: string;
      ok: false;
      error: string;
    };

export interface ToolRegistryOptions {
  logger?: StructuredLogger | undefined;
}

export const SCHEMA_FILE_SUFFIX = '-tools.json';

export function schemaFileName(agent: string): string {
  return `${agent}${SCHEMA_FILE_SUFFIX}`;
}

function handlerKey(agent: string, toolName: string): string {
  return `${agent}:${toolName}`;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

// =============================================================================
// Tool Registry
// =============================================================================

/**
 * Handlers and advertised tool descriptors, per agent.
 *
 * @example
 * ```typescript
 * const registry = new ToolRegistry();
 * registry.registerTyped('po', 'plan_sprint', PlanSprintArgs, planSprint);
 * await registry.loadSchemas('tools', ['po']);
 * ```
 */
export class ToolRegistry {
  private readonly handlers = new Map<string, RegisteredTool>();
  private readonly schemas = new Map<string, ToolDescriptor[]>();
  private readonly logger: StructuredLogger;

  constructor(options: ToolRegistryOptions = {}) {
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Register an untyped handler. Re-registering a key replaces the handler.
   */
  register(agent: string, toolName: string, handler: ToolHandler): void {
    this.store({
      agent,
      name: toolName,
      typed: false,
      prepare: (args) => ok(async () => handler(args)),
    });
  }

  /**
   * Register a handler whose arguments are parsed by `schema` first. A parse
   * failure is reported without invoking the handler.
   */
  registerTyped<S extends z.ZodTypeAny>(
    agent: string,
    toolName: string,
    schema: S,
    handler: TypedToolHandler<S>
  ): void {
    this.store({
      agent,
      name: toolName,
      typed: true,
      prepare: (args) => {
        const parsed = schema.safeParse(args);
        if (!parsed.success) {
          return err(`Invalid arguments for ${toolName}: ${formatIssues(parsed.error)}`);
        }
        const value: z.output<S> = parsed.data;
        return ok(async () => handler(value));
      },
    });
  }

  lookup(agent: string, toolName: string): RegisteredTool | undefined {
    return this.handlers.get(handlerKey(agent, toolName));
  }

  hasHandler(agent: string, toolName: string): boolean {
    return this.handlers.has(handlerKey(agent, toolName));
  }

  /**
   * Registered handlers in registration order, optionally for one agent
   */
  listHandlers(agent?: string): RegisteredTool[] {
    const all = [...this.handlers.values()];
    return agent === undefined ? all : all.filter((entry) => entry.agent === agent);
  }

  // ===========================================================================
  // Tool descriptors
  // ===========================================================================

  /**
   * Descriptors advertised to the model for `agent`; empty when none loaded
   */
  getToolsForAgent(agent: string): ToolDescriptor[] {
    return [...(this.schemas.get(agent) ?? [])];
  }

  /**
   * Validate and store descriptors for `agent`, replacing any loaded before.
   * Invalid entries are skipped and reported.
   */
  setSchemas(agent: string, descriptors: unknown): { loaded: string[]; rejected: RejectedDescriptor[] } {
    if (!Array.isArray(descriptors)) {
      throw new Error(`Tool schemas for ${agent} must be an array`);
    }

    const accepted: ToolDescriptor[] = [];
    const rejected: RejectedDescriptor[] = [];

    descriptors.forEach((entry: unknown, index) => {
      const parsed = ToolDescriptorSchema.safeParse(entry);
      if (parsed.success) {
        accepted.push(parsed.data);
        return;
      }
      rejected.push({ index, name: descriptorName(entry), reason: formatIssues(parsed.error) });
    });

    this.schemas.set(agent, accepted);
    return { loaded: accepted.map((d) => d.function.name), rejected };
  }

  /**
   * Load one schema file for `agent`. Never throws; failures are reported.
   */
  async loadSchemaFile(agent: string, file: string): Promise<SchemaFileReport> {
    let json: unknown;
    try {
      json = JSON.parse(await readFile(file, 'utf-8'));
    } catch (error) {
      this.logger.error('Failed to read tool schema file', { agent, file, error: errorMessage(error) });
      return { agent, file, ok: false, error: errorMessage(error) };
    }

    try {
      const { loaded, rejected } = this.setSchemas(agent, json);
      for (const entry of rejected) {
        this.logger.warning('Rejected tool descriptor', { agent, file, ...entry });
      }
      this.logger.info('Loaded tool schemas', { agent, file, count: loaded.length });
      return { agent, file, ok: true, loaded, rejected };
    } catch (error) {
      this.logger.error('Invalid tool schema file', { agent, file, error: errorMessage(error) });
      return { agent, file, ok: false, error: errorMessage(error) };
    }
  }

  /**
   * Load `{agent}-tools.json` from `dir` for each agent, or every
   * `*-tools.json` file in `dir` when `agents` is omitted. A file that fails
   * does not stop the others.
   */
  async loadSchemas(dir: string, agents?: string[]): Promise<SchemaFileReport[]> {
    let targets: string[];
    if (agents !== undefined) {
      targets = agents;
    } else {
      try {
        const entries = await readdir(dir);
        targets = entries
          .filter((entry) => entry.endsWith(SCHEMA_FILE_SUFFIX))
          .sort()
          .map((entry) => entry.slice(0, -SCHEMA_FILE_SUFFIX.length))
          .filter((agent) => agent !== '');
      } catch (error) {
        this.logger.warning('Tool schema directory unavailable', { dir, error: errorMessage(error) });
        return [];
      }
    }

    const reports: SchemaFileReport[] = [];
    for (const agent of targets) {
      reports.push(await this.loadSchemaFile(agent, join(dir, schemaFileName(agent))));
    }
    return reports;
  }

  private store(entry: RegisteredTool): void {
    const name = ToolNameSchema.safeParse(entry.name);
    if (!name.success) {
      throw new Error(`Invalid tool name '${entry.name}': ${formatIssues(name.error)}`);
    }
    if (entry.agent.trim() === '') {
      throw new Error('Agent name must not be empty');
    }

    const key = handlerKey(entry.agent, entry.name);
    if (this.handlers.has(key)) {
      this.logger.debug('Replacing tool handler', { agent: entry.agent, tool: entry.name });
      // Delete first so the replacement moves to the end of the listing
      this.handlers.delete(key);
    }
    this.handlers.set(key, entry);
  }
}

function descriptorName(entry: unknown): string | undefined {
  const parsed = z.object({ function: z.object({ name: z.string() }) }).safeParse(entry);
  return parsed.success ? parsed.data.function.name : undefined;
}

/**
 * Agent client CLI commands
 *
 * Talk to a local agent with tool calling, list and call the built-in
 * handlers, and probe agent endpoints.
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { readFile } from 'node:fs/promises';
import * as readline from 'node:readline/promises';
import { getConfig, type Config } from '../config.js';
import { AGENT_PRESETS, resolveEndpoint, type AgentEndpoint } from '../agent/endpoint.js';
import { ConversationOrchestrator, type ConversationResult } from '../agent/orchestrator.js';
import { ChatClient, type ChatTransport } from '../transport/client.js';
import { ConversationSchema, ToolChoiceSchema, type Message, type ToolChoice } from '../protocol/messages.js';
import { errorMessage, toWireToolResult } from '../protocol/errors.js';
import { ToolRegistry } from '../tools/registry.js';
import { ToolExecutor } from '../tools/executor.js';
import { registerBuiltinTools } from '../tools/builtin/index.js';
import { StructuredLogger } from '../observability/logger.js';
import { createMetricsCollector, type MetricsCollector } from '../observability/metrics.js';

// =============================================================================
// Option parsing
// =============================================================================

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

export function parseDecimal(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

/**
 * `auto`, `none` and `required` are policies; anything else names a tool
 */
export function parseToolChoice(value: string): ToolChoice {
  const candidate = value === 'auto' || value === 'none' || value === 'required' ? value : { name: value };
  const parsed = ToolChoiceSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new InvalidArgumentError(`Invalid tool choice '${value}'.`);
  }
  return parsed.data;
}

/**
 * Decode the JSON argument object given to `call`
 */
export function parseToolArguments(json: string | undefined): string {
  if (json === undefined || json.trim() === '') {
    return '{}';
  }
  try {
    JSON.parse(json);
  } catch (error) {
    throw new InvalidArgumentError(`Arguments are not valid JSON: ${errorMessage(error)}`);
  }
  return json;
}

export async function loadHistory(file: string): Promise<Message[]> {
  const json: unknown = JSON.parse(await readFile(file, 'utf-8'));
  const parsed = ConversationSchema.safeParse(json);
  if (!parsed.success) {
    throw new Error(`History file ${file} is not a message list: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
  }
  return parsed.data;
}

interface EndpointOptions {
  agent?: string;
  host?: string;
  port?: number;
  model?: string;
  apiKey?: string;
}

export function endpointFromOptions(options: EndpointOptions, config: Config): AgentEndpoint {
  return resolveEndpoint({
    name: options.agent ?? config.agentName,
    host: options.host ?? config.host,
    port: options.port ?? config.port,
    model: options.model ?? config.model,
    apiKey: options.apiKey ?? config.apiKey,
  });
}

function addEndpointOptions(command: Command): Command {
  return command
    .option('-a, --agent <name>', `agent preset (${Object.keys(AGENT_PRESETS).join(', ')}) or custom name`)
    .option('--host <host>', 'agent host')
    .option('-p, --port <port>', 'agent port', parseInteger)
    .option('-m, --model <model>', 'served model name')
    .option('--api-key <key>', 'bearer token sent to the agent');
}

// =============================================================================
// Shared setup
// =============================================================================

/**
 * What the commands need from a transport
 */
export type CliTransport = ChatTransport & Pick<ChatClient, 'listModels'>;

export interface CliDependencies {
  config: Config;
  logger: StructuredLogger;
  /** Override the transport, e.g. in tests */
  createClient?: ((endpoint: AgentEndpoint) => CliTransport) | undefined;
}

async function createRegistry(deps: CliDependencies, toolsDir: string | undefined): Promise<ToolRegistry> {
  const registry = new ToolRegistry({ logger: deps.logger.child('registry') });
  registerBuiltinTools(registry);
  const reports = await registry.loadSchemas(toolsDir ?? deps.config.toolsDir);
  for (const report of reports) {
    if (!report.ok) {
      console.error(chalk.yellow(`Skipped ${report.file}: ${report.error}`));
    }
  }
  return registry;
}

/**
 * Run an action, reporting failures and setting a non-zero exit code
 */
async function guarded(action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    console.error(chalk.red(`Error: ${errorMessage(error)}`));
    process.exitCode = 1;
  }
}

function printConversation(result: ConversationResult, verbose: boolean, streamed: boolean): void {
  if (verbose) {
    for (const toolResult of result.toolResults) {
      const label = toolResult.success ? chalk.magenta('[Tool]') : chalk.red('[Tool failed]');
      console.log(`${label} ${toolResult.toolName} (${toolResult.attempts} attempt(s))`);
      console.log(chalk.gray(JSON.stringify(toWireToolResult(toolResult)).slice(0, 200)));
    }
  }
  if (streamed) {
    console.log();
  } else {
    console.log(chalk.green(`\nAssistant: ${result.text}\n`));
  }
  if (verbose || result.stopReason === 'max_iterations') {
    console.log(chalk.gray(`Iterations: ${result.iterations}, stop reason: ${result.stopReason}`));
  }
}

// =============================================================================
// Program
// =============================================================================

interface ChatOptions extends EndpointOptions {
  system?: string;
  history?: string;
  toolChoice?: ToolChoice;
  tools: boolean;
  toolsDir?: string;
  maxIterations?: number;
  maxRetries?: number;
  temperature?: number;
  maxTokens?: number;
  stream?: boolean;
  verbose?: boolean;
}

interface ToolsOptions {
  agent?: string;
  toolsDir?: string;
  verbose?: boolean;
}

interface CallOptions {
  agent?: string;
  maxRetries?: number;
}

export function createProgram(overrides: Partial<CliDependencies> = {}): Command {
  const config = overrides.config ?? getConfig();
  const deps: CliDependencies = {
    config,
    logger: overrides.logger ?? new StructuredLogger({ name: 'agent-client', minLevel: config.logLevel }),
    createClient: overrides.createClient,
  };
  const metrics = createMetricsCollector();

  const program = new Command();
  program
    .name('agent-client')
    .description('Tool-calling client for local OpenAI-compatible agents')
    .version('0.1.0');

  addEndpointOptions(
    program
      .command('chat')
      .description('Chat with an agent; starts a REPL when no message is given')
      .argument('[message...]', 'message to send')
  )
    .option('-s, --system <prompt>', 'system prompt')
    .option('--history <file>', 'JSON file with prior messages')
    .option('--tool-choice <choice>', 'auto, none, required or a tool name', parseToolChoice)
    .option('--no-tools', 'do not offer tools to the agent')
    .option('--tools-dir <dir>', 'directory with {agent}-tools.json files')
    .option('--max-iterations <n>', 'model round trips before giving up', parseInteger)
    .option('--max-retries <n>', 'handler attempts per tool call', parseInteger)
    .option('-t, --temperature <value>', 'sampling temperature', parseDecimal)
    .option('--max-tokens <n>', 'maximum output tokens', parseInteger)
    .option('--stream', 'stream the response')
    .option('-v, --verbose', 'show tool calls and results')
    .action(async (words: string[], options: ChatOptions) => {
      await guarded(() => runChat(words.join(' '), options, deps, metrics));
    });

  program
    .command('tools')
    .description('List tool schemas and registered handlers')
    .option('-a, --agent <name>', 'only this agent')
    .option('--tools-dir <dir>', 'directory with {agent}-tools.json files')
    .option('-v, --verbose', 'show parameter schemas')
    .action(async (options: ToolsOptions) => {
      await guarded(() => listTools(options, deps));
    });

  program
    .command('call')
    .description('Run a built-in tool handler locally with JSON arguments')
    .argument('<tool>', 'tool name')
    .argument('[args]', 'JSON object of arguments', parseToolArguments)
    .option('-a, --agent <name>', 'agent the handler is registered for')
    .option('--max-retries <n>', 'handler attempts', parseInteger)
    .action(async (tool: string, args: string | undefined, options: CallOptions) => {
      await guarded(() => callTool(tool, args ?? '{}', options, deps));
    });

  addEndpointOptions(program.command('ping').description('List the models an agent serves')).action(
    async (options: EndpointOptions) => {
      await guarded(() => ping(options, deps));
    }
  );

  program
    .command('info')
    .description('Show agent presets and configuration variables')
    .action(() => {
      showInfo(deps.config);
    });

  return program;
}

// =============================================================================
// Commands
// =============================================================================

async function runChat(
  message: string,
  options: ChatOptions,
  deps: CliDependencies,
  metrics: MetricsCollector
): Promise<void> {
  const { config, logger } = deps;
  const endpoint = endpointFromOptions(options, config);
  const client: CliTransport = deps.createClient
    ? deps.createClient(endpoint)
    : new ChatClient(endpoint, {
        timeoutMs: config.requestTimeoutMs,
        logger: logger.child('transport'),
        metrics,
      });
  const registry = await createRegistry(deps, options.toolsDir);
  const executor = new ToolExecutor(registry, {
    agent: endpoint.name,
    maxRetries: config.maxRetries,
    backoffBaseMs: config.retryBaseMs,
    logger: logger.child('executor'),
    metrics,
  });
  const orchestrator = new ConversationOrchestrator({
    endpoint,
    client,
    registry,
    executor,
    logger: logger.child('orchestrator'),
    metrics,
  });

  const stream = options.stream ?? config.stream;
  let history = options.history ? await loadHistory(options.history) : [];

  const send = async (text: string): Promise<void> => {
    if (stream) {
      process.stdout.write(chalk.green('\nAssistant: '));
    }
    const result = await orchestrator.chatWithTools(text, {
      systemPrompt: options.system,
      history,
      tools: options.tools ? undefined : [],
      toolChoice: options.toolChoice,
      maxIterations: options.maxIterations ?? config.maxIterations,
      maxRetries: options.maxRetries ?? config.maxRetries,
      temperature: options.temperature ?? config.temperature,
      maxTokens: options.maxTokens ?? config.maxTokens,
      stream,
      onDelta: (chunk) => {
        const content = chunk.choices[0]?.delta.content;
        if (content) {
          process.stdout.write(content);
        }
      },
    });
    history = result.transcript.filter((m) => m.role !== 'system');
    printConversation(result, options.verbose ?? false, stream);
  };

  if (message.trim() !== '') {
    await send(message);
    return;
  }

  console.log(chalk.blue(`Connected to ${endpoint.toString()}`));
  console.log(chalk.yellow('Type a message, /clear to reset the conversation, or /quit to exit.\n'));

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    while (true) {
      const input = (await rl.question(chalk.cyan('You: '))).trim();
      if (input === '') {
        continue;
      }
      if (input === '/quit' || input === '/exit' || input === '/q') {
        console.log(chalk.yellow('Goodbye!'));
        return;
      }
      if (input === '/clear') {
        history = [];
        console.log(chalk.yellow('Conversation history cleared.'));
        continue;
      }
      try {
        await send(input);
      } catch (error) {
        // Keep the REPL alive across transport failures
        console.error(chalk.red(`Error: ${errorMessage(error)}`));
      }
    }
  } finally {
    rl.close();
  }
}

async function listTools(options: ToolsOptions, deps: CliDependencies): Promise<void> {
  const registry = await createRegistry(deps, options.toolsDir);
  const agents = options.agent ? [options.agent] : Object.keys(AGENT_PRESETS);

  for (const agent of agents) {
    const descriptors = registry.getToolsForAgent(agent);
    const handlers = registry.listHandlers(agent);
    console.log(chalk.blue(`\n${agent}: ${descriptors.length} schema(s), ${handlers.length} handler(s)`));

    const names = new Set([...descriptors.map((d) => d.function.name), ...handlers.map((h) => h.name)]);
    for (const name of names) {
      const descriptor = descriptors.find((d) => d.function.name === name);
      const handled = registry.hasHandler(agent, name);
      const status = handled ? chalk.green('handler') : chalk.yellow('no handler');
      console.log(`  ${chalk.white(name)} ${chalk.gray('-')} ${status}`);
      if (descriptor) {
        console.log(chalk.gray(`    ${descriptor.function.description}`));
        if (options.verbose) {
          console.log(chalk.gray(`    ${JSON.stringify(descriptor.function.parameters.properties)}`));
        }
      } else {
        console.log(chalk.gray('    (no schema loaded)'));
      }
    }
  }
}

async function callTool(tool: string, rawArguments: string, options: CallOptions, deps: CliDependencies): Promise<void> {
  const registry = new ToolRegistry({ logger: deps.logger.child('registry') });
  registerBuiltinTools(registry);
  const executor = new ToolExecutor(registry, {
    agent: options.agent ?? deps.config.agentName,
    maxRetries: options.maxRetries ?? deps.config.maxRetries,
    backoffBaseMs: deps.config.retryBaseMs,
    logger: deps.logger.child('executor'),
  });

  const result = await executor.execute({ id: 'cli_call', name: tool, rawArguments }, options.maxRetries);
  console.log(JSON.stringify(toWireToolResult(result), null, 2));
  if (!result.success) {
    process.exitCode = 1;
  }
}

async function ping(options: EndpointOptions, deps: CliDependencies): Promise<void> {
  const endpoint = endpointFromOptions(options, deps.config);
  const client: CliTransport = deps.createClient
    ? deps.createClient(endpoint)
    : new ChatClient(endpoint, { timeoutMs: deps.config.requestTimeoutMs, logger: deps.logger.child('transport') });

  const models = await client.listModels();
  console.log(chalk.green(`${endpoint.toString()} is up`));
  for (const model of models) {
    const marker = model === endpoint.model ? chalk.green('*') : ' ';
    console.log(`  ${marker} ${model}`);
  }
  if (!models.includes(endpoint.model)) {
    console.log(chalk.yellow(`Model '${endpoint.model}' is not served by this endpoint`));
  }
}

function showInfo(config: Config): void {
  console.log(chalk.blue('\nAgent presets\n'));
  for (const [name, preset] of Object.entries(AGENT_PRESETS)) {
    console.log(`  ${chalk.white(name.padEnd(10))} port ${preset.port}  ${chalk.gray(preset.description)}`);
  }

  console.log(chalk.blue('\nCurrent configuration\n'));
  console.log(chalk.gray(`  agent ${config.agentName} on ${config.host}, tools from ${config.toolsDir}`));

  console.log(chalk.blue('\nEnvironment variables\n'));
  const variables: Array<[string, string]> = [
    ['AGENT_NAME', 'default agent (architect)'],
    ['AGENT_HOST', 'agent host (localhost)'],
    ['AGENT_PORT', 'agent port (preset port)'],
    ['AGENT_MODEL', 'served model name (preset model)'],
    ['AGENT_API_KEY', 'bearer token for the agent'],
    ['AGENT_REQUEST_TIMEOUT_MS', 'per-request timeout (300000)'],
    ['AGENT_MAX_ITERATIONS', 'model round trips per conversation (5)'],
    ['AGENT_MAX_RETRIES', 'handler attempts per tool call (3)'],
    ['AGENT_RETRY_BASE_MS', 'first retry delay, doubling (1000)'],
    ['AGENT_TEMPERATURE', 'sampling temperature (0.7)'],
    ['AGENT_MAX_TOKENS', 'maximum output tokens (2048)'],
    ['AGENT_STREAM', 'stream responses (false)'],
    ['AGENT_TOOLS_DIR', 'tool schema directory (tools)'],
    ['AGENT_LOG_LEVEL', 'log level on stderr (info)'],
  ];
  for (const [name, description] of variables) {
    console.log(`  ${chalk.white(name.padEnd(26))} ${chalk.gray(description)}`);
  }

  console.log(chalk.blue('\nExamples\n'));
  console.log(chalk.cyan('  agent-client chat -a architect "Design a login API"'));
  console.log(chalk.cyan('  agent-client call plan_sprint \'{"sprint_name":"S1","duration_days":10,"team_capacity":20,"user_stories":[]}\' -a po'));
  console.log(chalk.cyan('  agent-client ping -a dev'));
  console.log();
}

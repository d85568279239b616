// pattern: Imperative Shell

/**
 * docs-gateway entry point.
 * Composition root that wires config, providers and tools, then serves a line REPL.
 */

import * as readline from 'node:readline';
import { fileURLToPath } from 'node:url';
import { createAggregator } from './aggregator/index.ts';
import type { Aggregator } from './aggregator/index.ts';
import { loadConfig } from './config/config.ts';
import type { AppConfig } from './config/schema.ts';
import { createEncoder } from './encoding/index.ts';
import { errorMessage } from './errors.ts';
import { createDefaultProviders, createProviderRegistry } from './providers/index.ts';
import type { ProviderRegistry } from './providers/index.ts';
import { createDocsTool, createProviderTools, createToolRegistry } from './tool/index.ts';
import type { ToolRegistry } from './tool/index.ts';
import { createUpstreamClient } from './upstream/client.ts';
import type { FetchFn } from './upstream/client.ts';

export type Gateway = {
  readonly registry: ProviderRegistry;
  readonly aggregator: Aggregator;
  readonly tools: ToolRegistry;
};

export type Command =
  | { readonly kind: 'call'; readonly tool: string; readonly params: Record<string, unknown> }
  | { readonly kind: 'tools' }
  | { readonly kind: 'providers' }
  | { readonly kind: 'help' }
  | { readonly kind: 'exit' }
  | { readonly kind: 'invalid'; readonly message: string };

export type CommandOutcome = {
  readonly output: string;
  readonly exit: boolean;
};

const HELP_TEXT = [
  'commands:',
  '  <tool> [json-params]   run a tool, e.g. search_library_docs {"library": "requests"}',
  '  tools                  list tool definitions',
  '  providers              list provider metadata',
  '  exit | quit            end the session',
].join('\n');

/**
 * Build every long-lived component once. `fetchFn` lets tests run the whole
 * graph against an in-process fake.
 */
export function createGateway(config: AppConfig, fetchFn?: FetchFn): Gateway {
  const client = createUpstreamClient(config.http, fetchFn);
  const registry = createProviderRegistry(createDefaultProviders(config, client));
  const aggregator = createAggregator({
    registry,
    keys: config.aggregator.keys,
    include: config.aggregator.providers,
    defaultLimit: config.aggregator.default_limit,
  });
  const encode = createEncoder(config.output.format);

  const tools = createToolRegistry();
  tools.register(createDocsTool({ aggregator, encode, defaultLimit: config.aggregator.default_limit }));
  for (const tool of createProviderTools({ registry, encode })) {
    tools.register(tool);
  }

  return { registry, aggregator, tools };
}

export type RequestTracker = {
  start(): AbortController;
  finish(controller: AbortController): void;
  abortAll(): void;
  readonly size: number;
};

/** Keeps one AbortController per running command so shutdown can cancel all of them. */
export function createRequestTracker(): RequestTracker {
  const running = new Set<AbortController>();

  return {
    start() {
      const controller = new AbortController();
      running.add(controller);
      return controller;
    },
    finish(controller) {
      running.delete(controller);
    },
    abortAll() {
      for (const controller of running) {
        controller.abort();
      }
      running.clear();
    },
    get size() {
      return running.size;
    },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse one REPL line. Blank lines yield null.
 */
export function parseCommand(line: string): Command | null {
  const trimmed = line.trim();
  if (trimmed === '') return null;

  const match = /^(\S+)\s*([\s\S]*)$/.exec(trimmed);
  const word = match?.[1] ?? trimmed;
  const rest = match?.[2] ?? '';

  switch (word) {
    case 'exit':
    case 'quit':
      return { kind: 'exit' };
    case 'tools':
      return { kind: 'tools' };
    case 'providers':
      return { kind: 'providers' };
    case 'help':
      return { kind: 'help' };
  }

  if (rest === '') {
    return { kind: 'call', tool: word, params: {} };
  }

  let params: unknown;
  try {
    params = JSON.parse(rest);
  } catch (error) {
    return { kind: 'invalid', message: `invalid JSON params: ${errorMessage(error)}` };
  }
  if (!isRecord(params)) {
    return { kind: 'invalid', message: 'params must be a JSON object' };
  }
  return { kind: 'call', tool: word, params };
}

export function createCommandHandler(
  gateway: Pick<Gateway, 'registry' | 'tools'>,
): (command: Command, signal?: AbortSignal) => Promise<CommandOutcome> {
  return async (command, signal) => {
    switch (command.kind) {
      case 'exit':
        return { output: '', exit: true };
      case 'help':
        return { output: HELP_TEXT, exit: false };
      case 'invalid':
        return { output: `error: ${command.message}`, exit: false };
      case 'tools':
        return { output: JSON.stringify(gateway.tools.describeTools(), null, 2), exit: false };
      case 'providers':
        return { output: JSON.stringify(gateway.registry.metadata(), null, 2), exit: false };
      case 'call': {
        const result = await gateway.tools.dispatch(command.tool, command.params, signal);
        return {
          output: result.success ? result.output : `error: ${result.error ?? 'unknown error'}`,
          exit: false,
        };
      }
    }
  };
}

async function main(): Promise<void> {
  console.log('docs-gateway starting...');

  const config = loadConfig(process.argv[2]);
  const gateway = createGateway(config);
  const handleCommand = createCommandHandler(gateway);

  const providerNames = gateway.registry.list().map((p) => p.name);
  console.log(`[registry] providers: ${providerNames.join(', ')}`);
  console.log(`[aggregator] library search via: ${gateway.aggregator.providerNames().join(', ')}`);
  console.log(`[output] format: ${config.output.format}`);

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  const requests = createRequestTracker();

  const shutdown = (): void => {
    console.log('\nShutting down...');
    requests.abortAll();
    rl.close();
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
  rl.on('close', () => {
    process.exit(0);
  });

  const handleLine = async (line: string): Promise<void> => {
    const command = parseCommand(line);
    if (command) {
      const controller = requests.start();
      try {
        const outcome = await handleCommand(command, controller.signal);
        if (outcome.exit) {
          rl.close();
          return;
        }
        process.stdout.write(`${outcome.output}\n`);
      } finally {
        requests.finish(controller);
      }
    }
    rl.prompt();
  };

  console.log('Type "help" for commands (press Ctrl+C to exit):\n');
  rl.setPrompt('> ');
  rl.on('line', (line: string) => {
    handleLine(line).catch((error: unknown) => {
      console.error(`error: ${errorMessage(error)}`);
      rl.prompt();
    });
  });

  rl.prompt();
}

// Run main entry point only when file is executed directly
if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}

#!/usr/bin/env node
/*
 Command-line runner:
 - Parses CLI args (--data, --message, --trace, --help)
 - Loads .env, the listening history and config/models.json
 - One-shot with --message, otherwise an interactive session that keeps the conversation
 - Ctrl+C stops the running turn
*/

import * as readline from 'readline/promises';
import { setTracingDisabled } from '@openai/agents';
import { loadEnv } from './config/loadEnv';
import { ListeningHistory } from './data/listeningHistory';
import { buildToolRegistry } from './tools/definitions';
import { AgentsGenerationClient } from './agents/generationClient';
import { Orchestrator } from './orchestrator/run';
import { renderMessage } from './utils/events';
import { cancelled, messageOf } from './utils/errors';
import { createLogger } from './utils/logger';
import type { AgentState } from './types/state';
import type { OrchestratorEvent } from './types/orchestrator';

type CliArgs = { help: boolean; message?: string; data?: string; trace?: string; rest: string[] };

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { help: false, rest: [] };
  for (let i = 2; i < argv.length; i += 1) {
    const a = argv[i];
    if (a === '--help' || a === '-h') {
      args.help = true;
    } else if (a === '--message' || a === '-m') {
      args.message = argv[i + 1];
      i += 1;
    } else if (a === '--data' || a === '-d') {
      args.data = argv[i + 1];
      i += 1;
    } else if (a === '--trace' || a === '-t') {
      args.trace = argv[i + 1];
      i += 1;
    } else {
      args.rest.push(a);
    }
  }
  return args;
}

function printUsage() {
  console.log(
    'Usage: listening-agent --data <dir> [--message <text>] [--trace <trace-id>]\n' +
      'Answers questions about the Streaming*.json play history in <dir> (or env LISTENING_DATA_PATH).\n' +
      'Without --message an interactive session starts; type "exit" to leave.'
  );
}

export function exitCodeFor(state: AgentState): number {
  if (state.stage === 'DONE') return 0;
  if (state.stage === 'CANCELLED') return 130;
  return 1;
}

function printOutcome(state: AgentState) {
  if (state.stage === 'DONE') console.log(`\n${state.finalResponse ?? ''}\n`);
  else if (state.stage === 'FAILED') console.error(`\n${state.failure?.message ?? 'Request failed.'}\n`);
  else console.log('\n(stopped)\n');
}

export async function main(argv: string[] = process.argv): Promise<number> {
  loadEnv('.env');
  const args = parseArgs(argv);
  if (args.help) {
    printUsage();
    return 0;
  }
  const dataDir = args.data || process.env.LISTENING_DATA_PATH;
  if (!dataDir) {
    console.error('Error: --data <dir> is required (or env LISTENING_DATA_PATH).');
    printUsage();
    return 2;
  }

  setTracingDisabled(true);
  const logger = createLogger(args.trace);
  const history = ListeningHistory.fromDirectory(dataDir, logger.child('history'));
  const orchestrator = new Orchestrator({
    registry: buildToolRegistry(history),
    generation: new AgentsGenerationClient(logger.child('agents')),
    logger,
  });
  logger.info(`Session start plays=${history.size}`);

  const onEvent = (ev: OrchestratorEvent) => {
    const msg = renderMessage(ev);
    if (msg && ev.type !== 'final') console.log('-', msg);
  };

  let current: AbortController | undefined;
  const onSigint = () => {
    if (current) current.abort(cancelled('interrupted by user'));
    else process.exit(130);
  };
  process.on('SIGINT', onSigint);

  const runTurn = async (prior: AgentState | undefined, message: string) => {
    current = new AbortController();
    try {
      return await orchestrator.submit(prior, message, { signal: current.signal, onEvent });
    } finally {
      current = undefined;
    }
  };

  try {
    if (args.message) {
      const state = await runTurn(undefined, args.message);
      printOutcome(state);
      return exitCodeFor(state);
    }

    const rl = readline.createInterface({ input: process.stdin, output: process.stdout, terminal: process.stdin.isTTY });
    rl.on('SIGINT', () => {
      if (current) current.abort(cancelled('interrupted by user'));
      else rl.close();
    });
    rl.setPrompt('> ');
    rl.prompt();
    let prior: AgentState | undefined;
    for await (const line of rl) {
      const text = line.trim();
      if (text === 'exit' || text === 'quit') break;
      if (text) {
        const state = await runTurn(prior, text);
        printOutcome(state);
        if (state.stage === 'DONE') prior = state;
      }
      rl.prompt();
    }
    rl.close();
    return 0;
  } finally {
    process.off('SIGINT', onSigint);
  }
}

if (require.main === module) {
  main().then(
    (code) => process.exit(code),
    (e) => {
      console.error(messageOf(e));
      process.exit(1);
    }
  );
}

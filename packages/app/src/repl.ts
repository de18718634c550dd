#!/usr/bin/env node
import * as path from 'node:path';
import * as readline from 'node:readline';
import { createConsoleLogger, errorMessage } from '@agentnet/core';
import { bootstrap } from './bootstrap.js';

const EXIT_COMMANDS = new Set(['exit', 'quit']);

/** Interactive loop: each line is routed and answered by the network. */
async function main(): Promise<void> {
  const configPath = process.argv[2] ?? path.resolve(process.cwd(), 'config/default.json5');
  const app = await bootstrap({ configPath, logger: createConsoleLogger('warn'), listen: false });
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, prompt: '> ' });

  console.log(`Agents: ${app.network.listAgents().map((agent) => agent.name).join(', ')}`);
  console.log('Type a request, or "exit" to quit.');
  rl.prompt();

  for await (const raw of rl) {
    const line = raw.trim();
    if (EXIT_COMMANDS.has(line.toLowerCase())) break;

    if (line !== '') {
      try {
        const result = await app.network.dispatch(line);
        if (result.status === 'completed') {
          console.log(`[${result.response.agent}] ${result.response.text}`);
        } else {
          console.log(result.message);
        }
      } catch (err) {
        console.error(`Error: ${errorMessage(err)}`);
      }
    }
    rl.prompt();
  }
  rl.close();
}

main().catch((err: unknown) => {
  console.error('Fatal:', err);
  process.exit(1);
});

#!/usr/bin/env node
import * as readline from 'node:readline';
import { config as dotenvConfig } from 'dotenv';
import { createAnalyst } from './app.js';
import type { Analyst } from './app.js';
import { loadConfig } from './config/index.js';
import { isPitchsideError } from './types/index.js';

const EXIT_COMMANDS = new Set(['exit', 'quit', ':q']);

async function promptLoop(analyst: Analyst): Promise<void> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  // Ctrl-C cancels the running query; at an idle prompt it exits.
  let current: AbortController | null = null;
  rl.on('SIGINT', () => {
    if (current) {
      current.abort();
    } else {
      rl.close();
    }
  });

  rl.setPrompt('pitchside> ');
  rl.prompt();
  try {
    for await (const line of rl) {
      const query = line.trim();
      if (EXIT_COMMANDS.has(query.toLowerCase())) {
        break;
      }
      if (query.length > 0) {
        current = new AbortController();
        try {
          console.log(await analyst.answer(query, { signal: current.signal }));
        } finally {
          current = null;
        }
      }
      rl.prompt();
    }
  } finally {
    rl.close();
  }
}

async function main(argv: ReadonlyArray<string>): Promise<number> {
  dotenvConfig();

  let analyst: Analyst;
  try {
    analyst = await createAnalyst(loadConfig(process.env));
  } catch (error) {
    if (isPitchsideError(error)) {
      console.error(`pitchside: ${error.message}`);
      return 1;
    }
    throw error;
  }

  try {
    const query = argv.join(' ').trim();
    if (query.length > 0) {
      const outcome = await analyst.run(query);
      if (outcome.state.kind === 'DONE') {
        console.log(outcome.state.answer);
        return 0;
      }
      console.error(outcome.state.message);
      return 2;
    }

    await promptLoop(analyst);
    return 0;
  } finally {
    await analyst.close();
  }
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  },
);

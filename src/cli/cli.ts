#!/usr/bin/env node

/**
 * Board edit CLI
 */

import { cmdReplay } from "./commands/replay";

// Parse args for --root early to configure environment
for (let i = 0; i < process.argv.length; i++) {
  if (process.argv[i] === "--root" && process.argv[i + 1]) {
    process.env.BOARD_ROOT = process.argv[i + 1];
    break;
  }
}

function printHelp(): void {
  console.log(`
Board edit CLI

Usage:
  board-edit <command> [options]

Commands:
  replay <script.yml> [--cpl <out.csv>]
                                 Apply an edit script to an empty board and
                                 print the resulting placement
  help                           Show this help

Options:
  --root <dir>                   Project root (default: current directory).
                                 board.yml is read from here.

Examples:
  board-edit replay edits.yml
  board-edit replay edits.yml --cpl out/cpl.csv
`);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0];
  const commandArgs = args.slice(1);

  switch (command) {
    case "replay":
      return cmdReplay(commandArgs);
    case "--help":
    case "-h":
    case "help":
      printHelp();
      break;
    default:
      if (command) {
        console.error(`Unknown command: ${command}\n`);
      }
      printHelp();
      process.exit(command ? 1 : 0);
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});

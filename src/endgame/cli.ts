#!/usr/bin/env node
/**
 * Endgame Solver CLI
 *
 * Usage: endgame-solver [options]
 *
 * Prints the engine's move for a position, or plays the position out with
 * the engine on both sides.
 */

import meow from 'meow';
import { EndgameAI, EndgameMatch, scoreForSideToMove } from './EndgameAI.js';
import { EndgamePosition } from './EndgamePosition.js';
import { loadEndgameConfig } from './config.js';
import { EndgameError } from './errors.js';
import type { ProfileChoice } from './types.js';

/** Starting positions of the two classic setups */
const SETUPS = {
  'white-rook': { whiteKing: 'e1', rook: 'a1', blackKing: 'e8', rookColor: 'w', turn: 'w' },
  'black-rook': { whiteKing: 'e1', rook: 'h8', blackKing: 'e8', rookColor: 'b', turn: 'w' },
} as const;

const cli = meow(`
  Usage
    $ endgame-solver [options]

  Options
    --fen <fen>         Position to analyse (default: the --setup position)
    --setup <name>      white-rook (Ke1 Ra1 vs Ke8) or black-rook (Ke1 vs Ke8 Rh8)
    --depth, -d <n>     Maximum search depth
    --time, -t <ms>     Soft time budget per move
    --profile <name>    white-rook | black-rook | auto
    --play              Play the position out, engine against engine
    --max-plies <n>     Ply limit for --play (default: 100)
    --verbose, -v       Log every search iteration

  Environment
    ENDGAME_MAX_DEPTH, ENDGAME_TIME_BUDGET_MS, ENDGAME_PROFILE,
    ENDGAME_CACHE_CAPACITY, ENDGAME_VERBOSE

  Examples
    $ endgame-solver --setup white-rook --depth 3
    $ endgame-solver --fen "k7/8/1K6/8/8/8/8/7R w - - 0 1"
    $ endgame-solver --setup black-rook --play --max-plies 60
`, {
  importMeta: import.meta,
  flags: {
    fen: {
      type: 'string',
    } as const,
    setup: {
      type: 'string',
      default: 'white-rook',
    } as const,
    depth: {
      type: 'number',
      shortFlag: 'd',
    } as const,
    time: {
      type: 'number',
      shortFlag: 't',
    } as const,
    profile: {
      type: 'string',
    } as const,
    play: {
      type: 'boolean',
      default: false,
    } as const,
    maxPlies: {
      type: 'number',
      default: 100,
    } as const,
    verbose: {
      type: 'boolean',
      shortFlag: 'v',
      default: false,
    } as const,
  },
});

function parseProfile(value: string | undefined): ProfileChoice | undefined {
  if (value === undefined) return undefined;
  if (value === 'white-rook' || value === 'black-rook' || value === 'auto') return value;
  throw new Error(`Unknown profile "${value}" (expected white-rook, black-rook or auto)`);
}

function loadPosition(): EndgamePosition {
  if (cli.flags.fen) {
    return EndgamePosition.fromFen(cli.flags.fen);
  }
  const setup = cli.flags.setup;
  if (setup !== 'white-rook' && setup !== 'black-rook') {
    throw new Error(`Unknown setup "${setup}" (expected white-rook or black-rook)`);
  }
  return EndgamePosition.fromPieces(SETUPS[setup]);
}

function main(): void {
  const env = loadEndgameConfig();
  const ai = new EndgameAI({
    ...env,
    name: 'endgame-solver',
    maxDepth: cli.flags.depth ?? env.maxDepth,
    timeBudgetMs: cli.flags.time ?? env.timeBudgetMs,
    profile: parseProfile(cli.flags.profile) ?? env.profile,
    verbose: cli.flags.verbose || env.verbose,
  });
  const position = loadPosition();

  console.log(position.ascii());

  if (cli.flags.play) {
    const match = new EndgameMatch(position, ai, ai);
    match.onMoveCallback((move, pos) => {
      console.log(`${move.color === 'w' ? 'White' : 'Black'}: ${move.san}  (${move.time}ms)  ${pos.fen()}`);
    });
    const record = match.playGame(cli.flags.maxPlies);
    console.log(`\nResult: ${record.result} (${record.reason}) after ${record.plies} plies`);
    console.log(position.ascii());
    return;
  }

  const result = ai.analyze(position);
  if (!result.bestMove) {
    console.log(`No legal moves (${position.getEndReason() ?? 'game over'})`);
    return;
  }

  const relative = scoreForSideToMove(result.score, position.turn());
  console.log(`Best move: ${result.bestMove.san}`);
  console.log(`Score: ${relative} for the side to move (${result.score} White-relative)`);
  console.log(`Depth ${result.depth}, ${result.nodes} nodes, ${result.time}ms`);
}

try {
  main();
} catch (err) {
  if (err instanceof EndgameError) {
    console.error(`Error [${err.code}]: ${err.message}`);
  } else {
    console.error('Error:', err instanceof Error ? err.message : err);
  }
  process.exitCode = 1;
}

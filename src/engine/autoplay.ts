import { GameStatus } from "./types";
import type { EngineOptions, Pos } from "./types";
import type { Game } from "./game";
import { MinesweeperAI } from "./knowledge";
import { parsePosKey } from "./board";

export interface AutoplayOptions {
  maxMoves?: number;
  // Engine to play with; one is created from `engine` when omitted
  ai?: MinesweeperAI;
  engine?: Partial<EngineOptions>;
}

export interface AutoplayResult {
  status: GameStatus;
  moves: Pos[];
  guesses: number;
  flagged: number;
}

/**
 * Lets the knowledge engine play `game` until it is won, lost, or the engine
 * has no move left. Known safe cells are always preferred; a random move is
 * counted as a guess.
 */
export function autoplay(game: Game, options: AutoplayOptions = {}): AutoplayResult {
  const ai = options.ai ?? new MinesweeperAI(game.height, game.width, options.engine);
  const maxMoves = options.maxMoves ?? game.height * game.width;
  const moves: Pos[] = [];
  let guesses = 0;

  while (game.status === GameStatus.Playing && moves.length < maxMoves) {
    let move = ai.makeSafeMove();
    if (move === null) {
      move = ai.makeRandomMove();
      if (move === null) break;
      guesses++;
    }

    moves.push(move);
    const hint = game.open(move);
    if (hint === null) break;

    ai.addKnowledge(move, hint);
    for (const key of ai.mines) {
      if (!game.flagged.has(key)) game.flag(parsePosKey(key));
    }
  }

  return { status: game.status, moves, guesses, flagged: game.flagged.size };
}

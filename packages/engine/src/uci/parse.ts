/**
 * UCI output parsing
 */

/** Centipawn value standing in for a forced mate */
export const MATE_SCORE = 10000;

export type UciScore = { kind: 'cp'; value: number } | { kind: 'mate'; value: number };

export interface InfoLine {
  depth?: number;
  multipv?: number;
  score?: UciScore;
  /** Set when the score is only a lower or upper bound */
  bound?: 'lower' | 'upper';
  pv: string[];
}

export interface BestMoveLine {
  /** null for `bestmove (none)` */
  bestMove: string | null;
  ponder?: string;
}

function intAt(tokens: readonly string[], index: number): number | undefined {
  const token = tokens[index];
  if (token === undefined) return undefined;
  const value = parseInt(token, 10);
  return Number.isNaN(value) ? undefined : value;
}

/**
 * Parse an `info ...` line. Returns null for any other line.
 */
export function parseInfoLine(line: string): InfoLine | null {
  const tokens = line.trim().split(/\s+/);
  if (tokens[0] !== 'info') return null;

  const info: InfoLine = { pv: [] };

  for (let i = 1; i < tokens.length; i++) {
    const token = tokens[i];
    if (token === 'depth') {
      info.depth = intAt(tokens, ++i);
    } else if (token === 'multipv') {
      info.multipv = intAt(tokens, ++i);
    } else if (token === 'score') {
      const kind = tokens[i + 1];
      const value = intAt(tokens, i + 2);
      i += 2;
      if ((kind === 'cp' || kind === 'mate') && value !== undefined) {
        info.score = { kind, value };
      }
      const next = tokens[i + 1];
      if (next === 'lowerbound' || next === 'upperbound') {
        info.bound = next === 'lowerbound' ? 'lower' : 'upper';
        i++;
      }
    } else if (token === 'pv') {
      info.pv = tokens.slice(i + 1);
      break;
    } else if (token === 'string') {
      // free text until end of line
      break;
    }
  }

  return info;
}

/**
 * Parse a `bestmove ...` line. Returns null for any other line.
 */
export function parseBestMove(line: string): BestMoveLine | null {
  const tokens = line.trim().split(/\s+/);
  if (tokens[0] !== 'bestmove') return null;

  const move = tokens[1];
  const result: BestMoveLine = {
    bestMove: move && move !== '(none)' && move !== '0000' ? move : null,
  };
  const ponder = tokens[3];
  if (tokens[2] === 'ponder' && ponder) {
    result.ponder = ponder;
  }
  return result;
}

/**
 * Pick the score of the principal variation from the deepest info line.
 * Exact scores are preferred over bounds; later lines win ties.
 */
export function selectPrincipalScore(infos: readonly InfoLine[]): UciScore | null {
  const scored = infos.filter((info) => info.score !== undefined && (info.multipv ?? 1) === 1);
  const exact = scored.filter((info) => info.bound === undefined);
  const pool = exact.length > 0 ? exact : scored;

  let best: InfoLine | undefined;
  for (const info of pool) {
    if (!best || (info.depth ?? 0) >= (best.depth ?? 0)) {
      best = info;
    }
  }
  return best?.score ?? null;
}

/**
 * Convert a side-to-move score into centipawns from White's point of view.
 * `mate n` with n > 0 means the side to move mates; `mate 0` and negative n
 * mean it is being mated. A mate scores MATE_SCORE less its distance in
 * moves, so a slower mate ranks below a faster one.
 */
export function toWhitePerspective(score: UciScore, sideToMove: 'w' | 'b'): number {
  const centipawns = score.kind === 'cp' ? score.value : mateToCentipawns(score.value);
  if (sideToMove === 'w' || centipawns === 0) {
    return centipawns;
  }
  return -centipawns;
}

function mateToCentipawns(moves: number): number {
  const magnitude = MATE_SCORE - Math.abs(moves);
  return moves > 0 ? magnitude : -magnitude;
}

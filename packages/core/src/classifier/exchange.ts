/**
 * Attacker/defender bookkeeping for a single square
 */

import { opponentOf } from '@movegrade/pgn';
import type { ChessPosition, PieceType, Side } from '@movegrade/pgn';

import { pieceValue } from './material.js';

export interface AttackingPiece {
  square: string;
  type: PieceType;
  value: number;
}

export interface SquareControl {
  /** Enemy pieces attacking the square */
  attackers: AttackingPiece[];
  /** Friendly pieces covering the square */
  defenders: string[];
  /** Cheapest attacker, or null when the square is not attacked */
  cheapestAttacker: AttackingPiece | null;
}

/**
 * Who attacks and who defends a square from the point of view of `owner`.
 *
 * An enemy king only counts as an attacker when the square is undefended,
 * since it cannot capture onto a covered square.
 */
export function inspectSquare(position: ChessPosition, square: string, owner: Side): SquareControl {
  const defenders = position.getAttackers(square, owner);

  const attackers: AttackingPiece[] = [];
  for (const from of position.getAttackers(square, opponentOf(owner))) {
    const piece = position.getPiece(from);
    if (!piece) continue;
    if (piece.type === 'k' && defenders.length > 0) continue;
    attackers.push({ square: from, type: piece.type, value: pieceValue(piece.type) });
  }

  let cheapestAttacker: AttackingPiece | null = null;
  for (const attacker of attackers) {
    if (!cheapestAttacker || attacker.value < cheapestAttacker.value) {
      cheapestAttacker = attacker;
    }
  }

  return { attackers, defenders, cheapestAttacker };
}

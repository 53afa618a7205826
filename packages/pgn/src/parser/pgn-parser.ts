import { parse } from '@mliebelt/pgn-parser';
import { z } from 'zod';

import { ParseError } from '../errors.js';

/**
 * Game metadata from PGN headers
 */
export interface GameMetadata {
  event?: string;
  site?: string;
  date?: string;
  round?: string;
  white: string;
  black: string;
  result: string;
  whiteElo?: number;
  blackElo?: number;
  eco?: string;
}

/**
 * A game as read from PGN: headers plus its main line
 */
export interface ParsedGame {
  metadata: GameMetadata;
  /** Set-up position from the FEN tag, if present */
  startFen?: string;
  /** Main-line moves in SAN, variations and comments dropped */
  moves: string[];
}

/*
 * Shape of the pgn-parser output we rely on. Everything else the parser
 * produces (comments, NAGs, variations, clock annotations) is ignored.
 */
const rawDateSchema = z.object({ value: z.string() }).passthrough();

// Unexpected tag value types are treated as absent rather than failing the game
const textTag = z.string().optional().catch(undefined);
const eloTag = z.union([z.string(), z.number()]).optional().catch(undefined);

const rawTagsSchema = z
  .object({
    Event: textTag,
    Site: textTag,
    Date: z.union([z.string(), rawDateSchema]).optional().catch(undefined),
    Round: textTag,
    White: textTag,
    Black: textTag,
    Result: textTag,
    WhiteElo: eloTag,
    BlackElo: eloTag,
    ECO: textTag,
    FEN: textTag,
  })
  .passthrough();

const rawMoveSchema = z
  .object({
    notation: z.object({ notation: z.string().optional() }).passthrough().optional(),
  })
  .passthrough();

const rawGameSchema = z
  .object({
    tags: rawTagsSchema.optional(),
    moves: z.array(rawMoveSchema).optional(),
  })
  .passthrough();

type RawTags = z.infer<typeof rawTagsSchema>;
type RawGame = z.infer<typeof rawGameSchema>;

const parserLocationSchema = z.object({
  location: z.object({
    start: z.object({ line: z.number(), column: z.number() }),
  }),
});

/**
 * Parse a PGN string into its games
 *
 * @param pgnString - The PGN content to parse (can contain multiple games)
 * @returns Array of parsed games with metadata and main-line moves
 * @throws ParseError if the PGN is malformed
 */
export function parsePgnString(pgnString: string): ParsedGame[] {
  if (!pgnString.trim()) {
    return [];
  }

  let output: unknown;
  try {
    output = parse(pgnString, { startRule: 'games' });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    const located = parserLocationSchema.safeParse(err);
    if (located.success) {
      const { line, column } = located.data.location.start;
      throw new ParseError(`Failed to parse PGN at line ${line}: ${message}`, line, column);
    }
    throw new ParseError(`Failed to parse PGN: ${message}`);
  }

  const games = z.array(rawGameSchema).safeParse(output);
  if (!games.success) {
    throw new ParseError(`Unexpected PGN parser output: ${games.error.issues[0]?.message ?? 'unknown'}`);
  }

  return games.data.map(transformGame);
}

function transformGame(rawGame: RawGame): ParsedGame {
  const tags = rawGame.tags ?? {};
  const game: ParsedGame = {
    metadata: extractMetadata(tags),
    moves: [],
  };
  if (tags.FEN !== undefined && tags.FEN.trim() !== '') {
    game.startFen = tags.FEN.trim();
  }

  for (const rawMove of rawGame.moves ?? []) {
    const san = rawMove.notation?.notation;
    // Skip comment-only entries
    if (san) {
      game.moves.push(san);
    }
  }

  return game;
}

/**
 * Extract game metadata from PGN tags
 */
function extractMetadata(tags: RawTags): GameMetadata {
  const metadata: GameMetadata = {
    white: tags.White ?? 'Unknown',
    black: tags.Black ?? 'Unknown',
    result: tags.Result ?? '*',
  };

  if (tags.Event !== undefined) metadata.event = tags.Event;
  if (tags.Site !== undefined) metadata.site = tags.Site;
  if (tags.Round !== undefined) metadata.round = tags.Round;
  if (tags.ECO !== undefined) metadata.eco = tags.ECO;

  // Date comes back either verbatim or as a parsed object
  const date = tags.Date;
  if (typeof date === 'string') {
    metadata.date = date;
  } else if (date !== undefined) {
    metadata.date = date.value;
  }

  const whiteElo = parseEloValue(tags.WhiteElo);
  if (whiteElo !== undefined) metadata.whiteElo = whiteElo;

  const blackElo = parseEloValue(tags.BlackElo);
  if (blackElo !== undefined) metadata.blackElo = blackElo;

  return metadata;
}

/**
 * Parse an Elo value which can be string or number
 */
function parseEloValue(elo: string | number | undefined): number | undefined {
  if (typeof elo === 'number') {
    // 0 is used by pgn-parser for unknown values like "?" or "-"
    return elo > 0 ? elo : undefined;
  }
  if (!elo || elo === '?' || elo === '-') {
    return undefined;
  }
  const parsed = parseInt(elo, 10);
  return isNaN(parsed) ? undefined : parsed;
}

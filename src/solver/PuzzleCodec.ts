import * as lz from 'lz-string';
import { Board, Grid } from './Board';
import { SIZE } from './SolveUtility';

// The subset of the f-puzzles board format needed for classic 9x9 puzzles
export interface FPuzzlesGridEntry {
    value?: number;
    given?: boolean;
}

export interface FPuzzlesBoard {
    size: number;
    grid: FPuzzlesGridEntry[][];
}

export type DecodeResult = { result: 'grid'; grid: Grid } | { result: 'invalid'; reason: string };

export function toFPuzzlesBoard(clues: Board): FPuzzlesBoard {
    return {
        size: SIZE,
        grid: clues.toGrid().map(row => row.map(value => (value !== 0 ? { value, given: true } : {}))),
    };
}

/**
 * Encodes the clues as an f-puzzles string: the board JSON compressed with lz-string.
 */
export function encodePuzzle(clues: Board): string {
    return lz.compressToBase64(JSON.stringify(toFPuzzlesBoard(clues)));
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Decodes an f-puzzles string into a grid of its given digits.
 * Digits entered by a solver (not marked given) are left out.
 */
export function decodePuzzle(encoded: string): DecodeResult {
    const json = lz.decompressFromBase64(encoded.trim());
    if (!json) {
        return { result: 'invalid', reason: 'Puzzle string could not be decompressed' };
    }

    let data: unknown;
    try {
        data = JSON.parse(json);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return { result: 'invalid', reason: `Puzzle string is not valid JSON: ${message}` };
    }

    if (!isRecord(data) || data.size !== SIZE) {
        return { result: 'invalid', reason: `Only ${SIZE}x${SIZE} puzzles are supported` };
    }

    const rows = data.grid;
    if (!Array.isArray(rows) || rows.length !== SIZE) {
        return { result: 'invalid', reason: `grid must have ${SIZE} rows` };
    }

    const grid: Grid = [];
    for (let row = 0; row < SIZE; row++) {
        const entries: unknown = rows[row];
        if (!Array.isArray(entries) || entries.length !== SIZE) {
            return { result: 'invalid', reason: `grid row ${row + 1} must have ${SIZE} cells` };
        }

        const out: number[] = [];
        for (let col = 0; col < SIZE; col++) {
            const entry: unknown = entries[col];
            if (!isRecord(entry)) {
                return { result: 'invalid', reason: `R${row + 1}C${col + 1} is not an object` };
            }

            const { value, given } = entry;
            if (value === undefined || given !== true) {
                out.push(0);
            } else if (typeof value === 'number' && Number.isInteger(value) && value >= 1 && value <= SIZE) {
                out.push(value);
            } else {
                return { result: 'invalid', reason: `R${row + 1}C${col + 1} has an invalid value` };
            }
        }
        grid.push(out);
    }

    return { result: 'grid', grid };
}

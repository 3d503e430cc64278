import { Board } from './Board';
import { CellIndex, CellMask, CellValue, NUM_CELLS, SIZE, allValues, popcount, valueBit, valuesList } from './SolveUtility';

const ALL_VALUES = allValues(SIZE);

export type ConstrainedCell = {
    cellIndex: CellIndex;
    mask: CellMask;
};

// Candidates of an empty cell, read from the board's region caches. Filled cells have none.
export function candidatesMask(board: Board, cellIndex: CellIndex): CellMask {
    if (board.getIndex(cellIndex) !== 0) {
        return 0;
    }
    return ALL_VALUES & ~board.usedMask(cellIndex);
}

export function candidates(board: Board, row: number, col: number): CellValue[] {
    Board.assertCoords(row, col);
    return valuesList(candidatesMask(board, board.cellIndex(row, col)));
}

// Same as candidates, but scans the 20 peers instead of trusting the caches
export function recomputeCandidates(board: Board, row: number, col: number): CellValue[] {
    Board.assertCoords(row, col);
    const index = board.cellIndex(row, col);
    if (board.getIndex(index) !== 0) {
        return [];
    }

    let used = 0;
    for (const peer of board.peers(index)) {
        const value = board.getIndex(peer);
        if (value !== 0) {
            used |= valueBit(value);
        }
    }
    return valuesList(ALL_VALUES & ~used);
}

// Forward checking: an empty cell with no candidates means the board cannot be completed
export function hasDeadCell(board: Board): boolean {
    for (let cellIndex = 0; cellIndex < NUM_CELLS; cellIndex++) {
        if (board.getIndex(cellIndex) === 0 && candidatesMask(board, cellIndex) === 0) {
            return true;
        }
    }
    return false;
}

/**
 * Finds the empty cell with the fewest candidates, preferring the lowest index on ties.
 * Returns a dead cell (mask 0) as soon as one is seen, and null when the board is full.
 */
export function findMostConstrainedCell(board: Board): ConstrainedCell | null {
    let best: ConstrainedCell | null = null;
    let bestCount = SIZE + 1;

    for (let cellIndex = 0; cellIndex < NUM_CELLS; cellIndex++) {
        if (board.getIndex(cellIndex) !== 0) {
            continue;
        }

        const mask = candidatesMask(board, cellIndex);
        const count = popcount(mask);
        if (count < bestCount) {
            best = { cellIndex, mask };
            bestCount = count;
            if (count === 0) {
                break;
            }
        }
    }

    return best;
}

import { Board } from './Board';
import { findMostConstrainedCell, hasDeadCell } from './ConstraintPropagator';
import { Random, shuffle } from './Random';
import { CellIndex, CellValue, valuesList } from './SolveUtility';

export type SolveOptions = {
    // Shuffle the value order at every branch point instead of trying ascending digits
    random?: Random | null;
    // Stop after this many solutions; 0 searches the whole tree
    maxSolutions?: number;
};

export type SolveResultInvalid = {
    result: 'invalid';
    conflicts: CellIndex[];
};
export type SolveResultBoard = {
    result: 'solution';
    board: Board;
    stats: SolveStats;
};
export type SolveResultNoSolution = {
    result: 'no solution';
    stats: SolveStats;
};
export type SolveResultSolutionCount = {
    result: 'count';
    count: number;
    // False when the search stopped at maxSolutions before exploring the whole tree
    complete: boolean;
    stats: SolveStats;
};

export type SearchStatus = 'searching' | 'stopped' | 'exhausted';

export type SearchEvent =
    | { type: 'select'; cellIndex: CellIndex; values: CellValue[] }
    | { type: 'place'; cellIndex: CellIndex; value: CellValue; depth: number }
    | { type: 'dead end'; cellIndex: CellIndex; value: CellValue }
    | { type: 'backtrack'; cellIndex: CellIndex }
    | { type: 'solution'; solution: CellValue[] }
    | { type: 'done'; status: SearchStatus };

// Stats for brute force searches
export class SolveStats {
    // Values placed on the board
    nodes: number;
    // Placements made at a cell that had more than one candidate
    guesses: number;
    // Branches cut, either by forward checking after a placement or by a cell with no candidates
    deadEnds: number;
    // Frames popped after all of their values failed
    backtracks: number;
    // Calls to SolverSearch.step
    steps: number;

    constructor() {
        this.nodes = 0;
        this.guesses = 0;
        this.deadEnds = 0;
        this.backtracks = 0;
        this.steps = 0;
    }
}

type Frame = {
    cellIndex: CellIndex;
    values: CellValue[];
    next: number;
    placed: CellValue;
};

/**
 * Depth-first search with an explicit frame stack, so callers can pause between steps.
 *
 * Each step either selects the most constrained cell and opens a frame for it, or tries the
 * next value of the top frame. A placement that leaves some empty cell without candidates is
 * undone straight away. The stack is never deeper than the number of empty cells.
 */
export class SolverSearch {
    board: Board;
    stats: SolveStats;
    solutions: CellValue[][];
    status: SearchStatus;

    private readonly random: Random | null;
    private readonly maxSolutions: number;
    private readonly frames: Frame[];
    private selectNext: boolean;

    // The board is cloned; the caller's copy is never touched
    constructor(board: Board, options: SolveOptions | null | undefined = undefined) {
        const { random = null, maxSolutions = 1 } = options || {};
        if (!Number.isInteger(maxSolutions) || maxSolutions < 0) {
            throw new Error(`maxSolutions must be a non-negative integer, got ${maxSolutions}`);
        }

        this.board = board.clone();
        this.stats = new SolveStats();
        this.solutions = [];
        this.status = 'searching';
        this.random = random;
        this.maxSolutions = maxSolutions;
        this.frames = [];
        this.selectNext = true;
    }

    get depth(): number {
        return this.frames.length;
    }

    step(): SearchEvent {
        if (this.status !== 'searching') {
            return { type: 'done', status: this.status };
        }

        this.stats.steps++;
        return this.selectNext ? this.selectCell() : this.tryNextValue();
    }

    run(): SearchStatus {
        while (this.status === 'searching') {
            this.step();
        }
        return this.status;
    }

    private selectCell(): SearchEvent {
        const target = findMostConstrainedCell(this.board);
        if (target === null) {
            return this.recordSolution();
        }

        if (target.mask === 0) {
            this.stats.deadEnds++;
            this.resume();
            return { type: 'dead end', cellIndex: target.cellIndex, value: 0 };
        }

        const values = valuesList(target.mask);
        if (this.random) {
            shuffle(values, this.random);
        }

        this.frames.push({ cellIndex: target.cellIndex, values, next: 0, placed: 0 });
        this.selectNext = false;
        return { type: 'select', cellIndex: target.cellIndex, values: values.slice() };
    }

    private tryNextValue(): SearchEvent {
        const frame = this.frames[this.frames.length - 1];
        if (frame === undefined) {
            throw new Error('Internal error: no frame to try');
        }

        if (frame.placed !== 0) {
            this.board.setIndex(frame.cellIndex, 0);
            frame.placed = 0;
        }

        if (frame.next >= frame.values.length) {
            this.frames.pop();
            this.stats.backtracks++;
            if (this.frames.length === 0) {
                this.status = 'exhausted';
            }
            return { type: 'backtrack', cellIndex: frame.cellIndex };
        }

        const value = frame.values[frame.next++];
        this.board.setIndex(frame.cellIndex, value);
        frame.placed = value;
        this.stats.nodes++;
        if (frame.values.length > 1) {
            this.stats.guesses++;
        }

        if (hasDeadCell(this.board)) {
            this.stats.deadEnds++;
            return { type: 'dead end', cellIndex: frame.cellIndex, value };
        }

        this.selectNext = true;
        return { type: 'place', cellIndex: frame.cellIndex, value, depth: this.frames.length };
    }

    private recordSolution(): SearchEvent {
        const solution = this.board.getValueArray();
        this.solutions.push(solution);
        if (this.maxSolutions > 0 && this.solutions.length >= this.maxSolutions) {
            this.status = 'stopped';
        } else {
            this.resume();
        }
        return { type: 'solution', solution: solution.slice() };
    }

    // Continue with the next value of the current frame, or finish if there is none
    private resume() {
        this.selectNext = false;
        if (this.frames.length === 0) {
            this.status = 'exhausted';
        }
    }
}

// Boards that already repeat a digit in a region are rejected rather than searched
function rejectInvalid(board: Board): SolveResultInvalid | null {
    const conflicts = board.findConflicts();
    return conflicts.length > 0 ? { result: 'invalid', conflicts } : null;
}

/**
 * Finds one completion of the board.
 * @param options - `random` randomises the value order; `maxSolutions` is ignored.
 */
export function findSolution(board: Board, options: SolveOptions | null | undefined = undefined): SolveResultInvalid | SolveResultBoard | SolveResultNoSolution {
    const invalid = rejectInvalid(board);
    if (invalid) {
        return invalid;
    }

    const search = new SolverSearch(board, { random: options?.random ?? null, maxSolutions: 1 });
    search.run();
    if (search.solutions.length === 0) {
        return { result: 'no solution', stats: search.stats };
    }
    return { result: 'solution', board: search.board, stats: search.stats };
}

/**
 * Counts completions of the board, stopping once maxSolutions have been found.
 * With the default of 2 this tells apart unsolvable, unique and ambiguous boards.
 */
export function countSolutions(board: Board, maxSolutions: number = 2): SolveResultInvalid | SolveResultSolutionCount {
    const invalid = rejectInvalid(board);
    if (invalid) {
        return invalid;
    }

    const search = new SolverSearch(board, { maxSolutions });
    const status = search.run();
    return { result: 'count', count: search.solutions.length, complete: status === 'exhausted', stats: search.stats };
}

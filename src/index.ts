import { Board, Grid, ReadonlyGrid, checkGrid } from './solver/Board';
import { candidates } from './solver/ConstraintPropagator';
import { DifficultyConfig, DifficultyLevel } from './solver/Difficulty';
import { GenerateOptions, generate } from './solver/Generator';
import { encodePuzzle } from './solver/PuzzleCodec';
import { DifficultyRating } from './solver/Rater';
import { SolveOptions, SolverSearch, countSolutions as countBoardSolutions, findSolution } from './solver/Solver';
import { CellCoords, CellValue } from './solver/SolveUtility';

export { Board, OutOfRangeError, checkGrid } from './solver/Board';
export type { Grid, ReadonlyGrid, Region, RegionType } from './solver/Board';
export { candidates, findMostConstrainedCell, hasDeadCell, recomputeCandidates } from './solver/ConstraintPropagator';
export { bucketForScore, difficultyConfig, difficultyLevels, parseDifficulty } from './solver/Difficulty';
export type { DifficultyConfig, DifficultyLevel } from './solver/Difficulty';
export { digHoles, generate, generateSolution } from './solver/Generator';
export type { GenerateOptions, Puzzle, Symmetry } from './solver/Generator';
export { decodePuzzle, encodePuzzle } from './solver/PuzzleCodec';
export { mulberry32 } from './solver/Random';
export type { Random } from './solver/Random';
export { ratePuzzle } from './solver/Rater';
export type { DifficultyRating } from './solver/Rater';
export { SolveStats, SolverSearch } from './solver/Solver';
export type { SearchEvent, SearchStatus, SolveOptions } from './solver/Solver';
export type { CellCoords, CellIndex, CellValue } from './solver/SolveUtility';

export type SolverInvalid = { result: 'invalid'; reason: string; conflicts: CellCoords[] };

export type SolverResult = { result: 'solution'; solution: Grid } | { result: 'no solution' } | SolverInvalid;

export type CountResult = { result: 'count'; count: number; complete: boolean } | SolverInvalid;

export type GeneratePuzzleResult =
    | {
          result: 'puzzle';
          clues: Grid;
          solution: Grid;
          difficulty: DifficultyLevel;
          clueCount: number;
          rating: DifficultyRating;
          // f-puzzles string for the clues
          encoded: string;
          seed: number | null;
      }
    | { result: 'generation failed'; reason: string };

// Builds a board from untrusted input, or describes why it cannot
function loadBoard(grid: unknown): { result: 'board'; board: Board } | SolverInvalid {
    const checked = checkGrid(grid);
    if (checked.result === 'invalid') {
        return { result: 'invalid', reason: checked.reason, conflicts: [] };
    }
    return { result: 'board', board: Board.fromGrid(checked.grid) };
}

function conflictsOf(board: Board): CellCoords[] {
    return board.findConflicts().map(index => board.cellCoords(index));
}

/**
 * Generates a puzzle with exactly one solution.
 * @param difficulty - A level, or an explicit target clue count and minimum score.
 * @param options - Seed or random source, symmetry and retry budget.
 */
export function generatePuzzle(
    difficulty: DifficultyLevel | DifficultyConfig = 'medium',
    options: Omit<GenerateOptions, 'difficulty'> = {}
): GeneratePuzzleResult {
    const generated = generate({ ...options, difficulty });
    if (generated.result === 'generation failed') {
        console.error(`Puzzle generation failed: ${generated.reason}`);
        return generated;
    }

    const { clues, solution, rating, seed } = generated.puzzle;
    return {
        result: 'puzzle',
        clues: clues.toGrid(),
        solution: solution.toGrid(),
        difficulty: generated.puzzle.difficulty,
        clueCount: clues.clueCount,
        rating,
        encoded: encodePuzzle(clues),
        seed,
    };
}

/**
 * Solves a grid, which may hold player entries as well as clues.
 * A grid that already repeats a digit in a row, column or box is reported as invalid
 * without searching.
 * @param grid - 9 rows of 9 integers, 0 for an empty cell.
 */
export function solve(grid: ReadonlyGrid, options: Pick<SolveOptions, 'random'> = {}): SolverResult {
    const loaded = loadBoard(grid);
    if (loaded.result === 'invalid') {
        return loaded;
    }

    const found = findSolution(loaded.board, options);
    switch (found.result) {
        case 'invalid':
            return { result: 'invalid', reason: 'Grid repeats a digit in a row, column or box', conflicts: conflictsOf(loaded.board) };
        case 'no solution':
            return { result: 'no solution' };
        case 'solution':
            return { result: 'solution', solution: found.board.toGrid() };
    }
}

/**
 * Counts the completions of a grid, stopping at maxSolutions.
 * @param maxSolutions - 2 answers whether the solution is unique; 0 counts them all.
 */
export function countSolutions(grid: ReadonlyGrid, maxSolutions: number = 2): CountResult {
    const loaded = loadBoard(grid);
    if (loaded.result === 'invalid') {
        return loaded;
    }

    const counted = countBoardSolutions(loaded.board, maxSolutions);
    if (counted.result === 'invalid') {
        return { result: 'invalid', reason: 'Grid repeats a digit in a row, column or box', conflicts: conflictsOf(loaded.board) };
    }
    return { result: 'count', count: counted.count, complete: counted.complete };
}

/**
 * Checks a player's entry against the current board: true if no other cell in the same row,
 * column or box already holds the value. Does not consult the solution.
 * @throws OutOfRangeError for coordinates outside 0..8 or a value outside 0..9.
 */
export function isLegalMove(grid: ReadonlyGrid, row: number, col: number, value: CellValue): boolean {
    return Board.fromGrid(grid).isLegal(row, col, value);
}

/**
 * Checks a player's entry against the puzzle's solution grid.
 * @throws OutOfRangeError for coordinates outside 0..8.
 */
export function checkAgainstSolution(solution: ReadonlyGrid, row: number, col: number, value: CellValue): boolean {
    Board.assertCoords(row, col);
    return solution[row][col] === value;
}

// Digits that can still go in an empty cell, for draft marks
export function candidatesAt(grid: ReadonlyGrid, row: number, col: number): CellValue[] {
    return candidates(Board.fromGrid(grid), row, col);
}

// Every filled cell that shares its digit with another cell in a row, column or box
export function findConflicts(grid: ReadonlyGrid): CellCoords[] {
    return conflictsOf(Board.fromGrid(grid));
}

/**
 * Creates a search the caller advances one step at a time, e.g. to animate an auto-solve.
 * @throws Error if the grid is malformed.
 */
export function createSolverSearch(grid: ReadonlyGrid, options: SolveOptions = {}): SolverSearch {
    return new SolverSearch(Board.fromGrid(grid), options);
}

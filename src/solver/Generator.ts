import { Board } from './Board';
import { DifficultyConfig, DifficultyLevel, difficultyConfig } from './Difficulty';
import { Random, mulberry32, randomSeed, shuffle } from './Random';
import { DifficultyRating, ratePuzzle } from './Rater';
import { SolverSearch, countSolutions, findSolution } from './Solver';
import { CellIndex, NUM_CELLS, SIZE, cellCoords, cellIndex, sequenceEqual } from './SolveUtility';

export type Symmetry = 'none' | 'central' | 'diagonal';

export interface GenerateOptions {
    difficulty?: DifficultyLevel | DifficultyConfig;
    // Ignored when random is supplied
    seed?: number;
    random?: Random;
    symmetry?: Symmetry;
    // Full generate-and-rate attempts made while chasing the level's minimum score
    maxAttempts?: number;
}

export interface Puzzle {
    clues: Board;
    solution: Board;
    difficulty: DifficultyLevel;
    rating: DifficultyRating;
    // The seed the random source was created from, null when a random source was passed in
    seed: number | null;
}

export type GenerateResultPuzzle = { result: 'puzzle'; puzzle: Puzzle };
export type GenerateResultFailed = { result: 'generation failed'; reason: string };

/**
 * Fills an empty board with a random valid solution by searching with shuffled value order.
 * Returns null only if the search fails, which would be a solver bug.
 */
export function generateSolution(random: Random): Board | null {
    const search = new SolverSearch(new Board(), { random, maxSolutions: 1 });
    search.run();
    return search.solutions.length > 0 ? search.board : null;
}

export function symmetricMates(index: CellIndex, symmetry: Symmetry): CellIndex[] {
    const { row, col } = cellCoords(index);
    let mate = index;
    if (symmetry === 'central') {
        mate = cellIndex(SIZE - 1 - row, SIZE - 1 - col);
    } else if (symmetry === 'diagonal') {
        mate = cellIndex(col, row);
    }
    return mate === index ? [index] : [index, mate];
}

/**
 * Clears clues in the given order for as long as the puzzle stays uniquely solvable.
 * A removal that lets a second completion in is undone and the clue restored.
 * Stops once the board is down to targetClues.
 * @returns the number of cells cleared
 */
export function digHoles(clues: Board, order: readonly CellIndex[], targetClues: number, symmetry: Symmetry = 'none'): number {
    let removed = 0;
    for (const index of order) {
        if (clues.clueCount <= targetClues) {
            break;
        }
        if (clues.getIndex(index) === 0) {
            continue;
        }

        const cleared: [CellIndex, number][] = [];
        for (const mate of symmetricMates(index, symmetry)) {
            const value = clues.getIndex(mate);
            if (value !== 0) {
                cleared.push([mate, value]);
                clues.setIndex(mate, 0);
            }
        }

        const counted = countSolutions(clues, 2);
        if (counted.result === 'count' && counted.count === 1) {
            removed += cleared.length;
            continue;
        }

        for (const [mate, value] of cleared) {
            clues.setIndex(mate, value);
        }
    }
    return removed;
}

// One pass of steps 1-5: random solution, random removal order, dig, rate
function generateAttempt(config: DifficultyConfig, random: Random, symmetry: Symmetry): { clues: Board; solution: Board; rating: DifficultyRating } | null {
    const solution = generateSolution(random);
    if (solution === null) {
        return null;
    }

    const clues = solution.clone();
    const order = shuffle(
        Array.from({ length: NUM_CELLS }, (_, i) => i),
        random
    );
    digHoles(clues, order, config.targetClues, symmetry);
    return { clues, solution, rating: ratePuzzle(clues, solution) };
}

/**
 * Generates a puzzle with a unique solution at the requested difficulty.
 *
 * Attempts are repeated while the rating stays below the level's minimum score, keeping the
 * highest rated one. The result is checked before it is returned: the clues must be a subset of
 * the solution and must have exactly one completion.
 */
export function generate(options: GenerateOptions = {}): GenerateResultPuzzle | GenerateResultFailed {
    const { difficulty = 'medium', symmetry = 'none', maxAttempts = 5 } = options;
    const config = typeof difficulty === 'string' ? difficultyConfig(difficulty) : difficulty;
    const seed = options.random ? null : options.seed ?? randomSeed();
    const random = options.random ?? mulberry32(seed ?? 0);

    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
        return { result: 'generation failed', reason: `maxAttempts must be a positive integer, got ${maxAttempts}` };
    }

    let best: { clues: Board; solution: Board; rating: DifficultyRating } | null = null;
    for (let attempt = 0; attempt < maxAttempts; attempt++) {
        const current = generateAttempt(config, random, symmetry);
        if (current === null) {
            return { result: 'generation failed', reason: 'Could not fill an empty board' };
        }
        if (best === null || current.rating.score > best.rating.score) {
            best = current;
        }
        if (best.rating.score >= config.minScore) {
            break;
        }
    }

    if (best === null) {
        return { result: 'generation failed', reason: 'No attempt was made' };
    }

    const { clues, solution, rating } = best;
    for (let i = 0; i < NUM_CELLS; i++) {
        const value = clues.getIndex(i);
        if (value !== 0 && value !== solution.getIndex(i)) {
            return { result: 'generation failed', reason: 'Clues do not match the solution' };
        }
    }

    const counted = countSolutions(clues, 2);
    if (counted.result !== 'count' || counted.count !== 1) {
        return { result: 'generation failed', reason: 'Puzzle does not have a unique solution' };
    }

    const solved = findSolution(clues);
    if (solved.result !== 'solution' || !sequenceEqual(solved.board.getValueArray(), solution.getValueArray())) {
        return { result: 'generation failed', reason: 'Puzzle does not solve to its solution' };
    }

    return { result: 'puzzle', puzzle: { clues, solution, difficulty: config.level, rating, seed } };
}

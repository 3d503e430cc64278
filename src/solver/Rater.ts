import { Board } from './Board';
import { findMostConstrainedCell } from './ConstraintPropagator';
import { DifficultyLevel, bucketForScore } from './Difficulty';
import { LogicResult } from './Enums/LogicResult';
import { HiddenSingle } from './LogicalStep/HiddenSingle';
import { LogicalStep } from './LogicalStep/LogicalStep';
import { NakedSingle } from './LogicalStep/NakedSingle';
import { findSolution } from './Solver';
import { cellName } from './SolveUtility';

export const GUESS = 'Guess';
export const GUESS_WEIGHT = 20;

export interface DifficultyRating {
    bucket: DifficultyLevel;
    score: number;
    steps: number;
    byTechnique: Record<string, number>;
    desc: string[];
    // False if the simulated solve hit a contradiction
    solved: boolean;
}

const logicalSteps: LogicalStep[] = [new NakedSingle(), new HiddenSingle()];

/**
 * Rates a puzzle by simulating a human solve with singles only.
 * When no single is available the most constrained cell is filled from the solution and
 * counted as a guess, which is what pushes a puzzle into the harder buckets.
 * @param solution - The puzzle's solution, if already known; found by search otherwise.
 */
export function ratePuzzle(clues: Board, solution: Board | null = null): DifficultyRating {
    const board = clues.clone();
    const byTechnique: Record<string, number> = {};
    const desc: string[] = [];
    let known = solution;
    let score = 0;
    let steps = 0;
    let solved = true;

    const tally = (name: string, weight: number) => {
        byTechnique[name] = (byTechnique[name] ?? 0) + 1;
        score += weight;
        steps++;
    };

    while (board.emptyCount > 0) {
        let result = LogicResult.UNCHANGED;
        for (const logicalStep of logicalSteps) {
            result = logicalStep.step(board, desc);
            if (result === LogicResult.CHANGED) {
                tally(logicalStep.name, logicalStep.weight);
                break;
            }
            if (result === LogicResult.INVALID) {
                break;
            }
        }

        if (result === LogicResult.INVALID) {
            solved = false;
            break;
        }
        if (result === LogicResult.CHANGED) {
            continue;
        }

        if (known === null) {
            const found = findSolution(board);
            if (found.result !== 'solution') {
                desc.push('No solution exists from here.');
                solved = false;
                break;
            }
            known = found.board;
        }

        const target = findMostConstrainedCell(board);
        if (target === null) {
            break;
        }
        const value = known.getIndex(target.cellIndex);
        board.setIndex(target.cellIndex, value);
        desc.push(`${GUESS}: ${cellName(target.cellIndex)} = ${value}.`);
        tally(GUESS, GUESS_WEIGHT);
    }

    return {
        bucket: solved ? bucketForScore(score) : 'expert',
        score,
        steps,
        byTechnique,
        desc,
        solved,
    };
}

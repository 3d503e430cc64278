import { Board } from '../Board';
import { candidatesMask } from '../ConstraintPropagator';
import { LogicResult } from '../Enums/LogicResult';
import { NUM_CELLS, cellName, minValue } from '../SolveUtility';
import { LogicalStep } from './LogicalStep';

export class NakedSingle extends LogicalStep {
    constructor() {
        super('Naked Single', 1);
    }

    step(board: Board, desc: string[] | null = null): LogicResult {
        // Get the first naked single
        for (let cellIndex = 0; cellIndex < NUM_CELLS; cellIndex++) {
            if (board.getIndex(cellIndex) !== 0) continue;

            const mask = candidatesMask(board, cellIndex);
            if (mask === 0) {
                if (desc) {
                    desc.push(`Naked Single: ${cellName(cellIndex)} has no candidates.`);
                }
                return LogicResult.INVALID;
            }
            if (mask & (mask - 1)) continue;

            const value = minValue(mask);
            board.setIndex(cellIndex, value);
            if (desc) {
                desc.push(`Naked Single: ${cellName(cellIndex)} = ${value}.`);
            }
            return LogicResult.CHANGED;
        }

        return LogicResult.UNCHANGED;
    }
}

import { Board } from '../Board';
import { candidatesMask } from '../ConstraintPropagator';
import { LogicResult } from '../Enums/LogicResult';
import { SIZE, allValues, cellName, maskToString, minValue } from '../SolveUtility';
import { LogicalStep } from './LogicalStep';

export class HiddenSingle extends LogicalStep {
    constructor() {
        super('Hidden Single', 2);
    }

    step(board: Board, desc: string[] | null = null): LogicResult {
        const all = allValues(SIZE);
        for (let regionIndex = 0; regionIndex < board.regions.length; regionIndex++) {
            const region = board.regions[regionIndex];

            let atLeastOnce = 0;
            let moreThanOnce = 0;
            for (const cellIndex of region.cells) {
                const cellMask = candidatesMask(board, cellIndex);
                moreThanOnce |= atLeastOnce & cellMask;
                atLeastOnce |= cellMask;
            }
            const givenMask = board.usedMasks[regionIndex];

            if ((atLeastOnce | givenMask) !== all) {
                // Puzzle is invalid: Not all values are present in the region
                if (desc) {
                    const cannotPlaceMask = ~(atLeastOnce | givenMask) & all;
                    desc.push(`${region.name} has nowhere to place ${maskToString(cannotPlaceMask)}.`);
                }
                return LogicResult.INVALID;
            }

            const exactlyOnce = atLeastOnce & ~moreThanOnce;
            for (const cellIndex of region.cells) {
                const cellMask = candidatesMask(board, cellIndex);
                const newCellMask = cellMask & exactlyOnce;
                if (newCellMask !== 0 && newCellMask !== cellMask) {
                    const cellValue = minValue(newCellMask);
                    board.setIndex(cellIndex, cellValue);
                    if (desc) {
                        desc.push(`Hidden Single in ${region.name}: ${cellName(cellIndex)} = ${cellValue}.`);
                    }
                    return LogicResult.CHANGED;
                }
            }
        }

        return LogicResult.UNCHANGED;
    }
}

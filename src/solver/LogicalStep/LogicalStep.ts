import { Board } from '../Board';
import { LogicResult } from '../Enums/LogicResult';

export class LogicalStep {
    name: string;
    // Contribution of one application of this step to a puzzle's difficulty score
    weight: number;

    constructor(name: string, weight: number) {
        this.name = name;
        this.weight = weight;
    }

    // Returns the name of the logical step
    toString() {
        return this.name;
    }

    // Applies at most one deduction, describing it in desc when given
    step(board: Board, desc: string[] | null = null): LogicResult {
        void board;
        void desc;
        return LogicResult.UNCHANGED;
    }
}

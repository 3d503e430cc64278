import { Board } from '../src/solver/Board';
import { candidates, findMostConstrainedCell, hasDeadCell, recomputeCandidates } from '../src/solver/ConstraintPropagator';
import { mulberry32 } from '../src/solver/Random';
import { SIZE } from '../src/solver/SolveUtility';
import { SOLVED, SWAP_CYCLE_HOLES, boardWithHoles, boxCoords, deadCellBoard } from './TestUtility';

describe('candidates', () => {
    it('offers every digit on an empty board', () => {
        expect(candidates(new Board(), 4, 4)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9]);
    });

    it('leaves out digits seen by the cell', () => {
        const board = new Board();
        board.set(0, 8, 1);
        board.set(8, 0, 2);
        board.set(1, 1, 3);
        board.set(4, 4, 4);
        expect(candidates(board, 0, 0)).toEqual([4, 5, 6, 7, 8, 9]);
    });

    it('is empty for a filled cell', () => {
        expect(candidates(boardWithHoles([[4, 4]]), 0, 0)).toEqual([]);
        expect(candidates(boardWithHoles([[4, 4]]), 4, 4)).toEqual([9]);
    });

    it('matches a full peer scan through random edits', () => {
        const random = mulberry32(31337);
        const board = new Board();
        for (let i = 0; i < 300; i++) {
            const row = Math.floor(random() * SIZE);
            const col = Math.floor(random() * SIZE);
            const value = Math.floor(random() * (SIZE + 1));
            if (board.isLegal(row, col, value)) {
                board.set(row, col, value);
            }
            for (let r = 0; r < SIZE; r++) {
                for (let c = 0; c < SIZE; c++) {
                    expect(candidates(board, r, c)).toEqual(recomputeCandidates(board, r, c));
                }
            }
        }
    });
});

describe('hasDeadCell', () => {
    it('finds an empty cell with no candidates', () => {
        expect(hasDeadCell(deadCellBoard())).toBe(true);
    });

    it('never fires while a puzzle is filled in along its solution', () => {
        const board = boardWithHoles(SWAP_CYCLE_HOLES.concat(boxCoords(4), boxCoords(8)));
        for (let index = 0; index < 81; index++) {
            if (board.getIndex(index) === 0) {
                board.setIndex(index, Number(SOLVED[index]));
                expect(hasDeadCell(board)).toBe(false);
            }
        }
        expect(board.valueString()).toBe(SOLVED);
    });

    it('ignores boards where every empty cell has a candidate', () => {
        expect(hasDeadCell(new Board())).toBe(false);
        expect(hasDeadCell(boardWithHoles([[0, 0], [4, 4]]))).toBe(false);
    });
});

describe('findMostConstrainedCell', () => {
    it('returns null for a full board', () => {
        expect(findMostConstrainedCell(boardWithHoles([]))).toBeNull();
    });

    it('prefers the lowest index on ties', () => {
        expect(findMostConstrainedCell(new Board())).toEqual({ cellIndex: 0, mask: 0b111111111 });
        expect(findMostConstrainedCell(boardWithHoles([[0, 0], [8, 8]]))).toEqual({ cellIndex: 0, mask: 0b1 });
    });

    it('picks the cell with the fewest candidates', () => {
        const board = new Board();
        board.set(0, 0, 1);
        // Cells sharing a unit with R1C1 have 8 candidates, the first of them is R1C2
        expect(findMostConstrainedCell(board)).toEqual({ cellIndex: 1, mask: 0b111111110 });
    });

    it('returns a dead cell immediately', () => {
        expect(findMostConstrainedCell(deadCellBoard())).toEqual({ cellIndex: 8, mask: 0 });
    });
});

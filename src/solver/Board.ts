import { BOX_SIZE, CellCoords, CellIndex, CellMask, CellValue, NUM_CELLS, SIZE, allValues, boxIndex, cellCoords, cellIndex, cellName, valueBit } from './SolveUtility';

export type Grid = number[][];
export type ReadonlyGrid = readonly (readonly number[])[];

export type RegionType = 'row' | 'col' | 'box';
export type Region = {
    name: string;
    type: RegionType;
    index: number;
    cells: CellIndex[];
};

export type GridCheckResult = { result: 'grid'; grid: Grid } | { result: 'invalid'; reason: string };

export class OutOfRangeError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'OutOfRangeError';
    }
}

const ALL_VALUES = allValues(SIZE);

// Rows occupy region slots 0-8, columns 9-17 and boxes 18-26
const regions: Region[] = [];
for (let row = 0; row < SIZE; row++) {
    regions.push({ name: `Row ${row + 1}`, type: 'row', index: row, cells: Array.from({ length: SIZE }, (_, col) => cellIndex(row, col)) });
}
for (let col = 0; col < SIZE; col++) {
    regions.push({ name: `Col ${col + 1}`, type: 'col', index: col, cells: Array.from({ length: SIZE }, (_, row) => cellIndex(row, col)) });
}
for (let box = 0; box < SIZE; box++) {
    const boxRow = Math.floor(box / BOX_SIZE) * BOX_SIZE;
    const boxCol = (box % BOX_SIZE) * BOX_SIZE;
    const cells = Array.from({ length: SIZE }, (_, i) => cellIndex(boxRow + Math.floor(i / BOX_SIZE), boxCol + (i % BOX_SIZE)));
    regions.push({ name: `Box ${box + 1}`, type: 'box', index: box, cells });
}

const cellRegions: [number, number, number][] = Array.from({ length: NUM_CELLS }, (_, index) => {
    const { row, col } = cellCoords(index);
    return [row, SIZE + col, 2 * SIZE + boxIndex(row, col)];
});

// Every cell sharing a row, column or box with the given cell, excluding itself
const cellPeers: CellIndex[][] = Array.from({ length: NUM_CELLS }, (_, index) => {
    const peers = new Set<CellIndex>();
    for (const region of cellRegions[index]) {
        for (const peer of regions[region].cells) {
            if (peer !== index) {
                peers.add(peer);
            }
        }
    }
    return Array.from(peers).sort((a, b) => a - b);
});

/**
 * Validates the nested grid representation: 9 rows of 9 integers in 0..9.
 */
export function checkGrid(grid: unknown): GridCheckResult {
    if (!Array.isArray(grid) || grid.length !== SIZE) {
        return { result: 'invalid', reason: `Grid must be an array of ${SIZE} rows` };
    }

    const out: Grid = [];
    for (let row = 0; row < SIZE; row++) {
        const rowValues: unknown = grid[row];
        if (!Array.isArray(rowValues) || rowValues.length !== SIZE) {
            return { result: 'invalid', reason: `Row ${row + 1} must be an array of ${SIZE} values` };
        }

        const outRow: number[] = [];
        for (let col = 0; col < SIZE; col++) {
            const value: unknown = rowValues[col];
            if (typeof value !== 'number' || !Number.isInteger(value) || value < 0 || value > SIZE) {
                return { result: 'invalid', reason: `${cellName(cellIndex(row, col))} must be an integer from 0 to ${SIZE}` };
            }
            outRow.push(value);
        }
        out.push(outRow);
    }
    return { result: 'grid', grid: out };
}

/**
 * A 9x9 Sudoku grid.
 *
 * Alongside the cell values the board keeps, for each of its 27 regions, how many times each
 * digit occurs and the mask of digits present. Both are updated on every write, so candidate
 * lookups never rescan peers.
 */
export class Board {
    cells: Uint8Array;
    counts: Uint8Array;
    usedMasks: Uint16Array;
    emptyCount: number;

    constructor() {
        this.cells = new Uint8Array(NUM_CELLS);
        this.counts = new Uint8Array(regions.length * SIZE);
        this.usedMasks = new Uint16Array(regions.length);
        this.emptyCount = NUM_CELLS;
    }

    static fromGrid(grid: ReadonlyGrid): Board {
        const checked = checkGrid(grid);
        if (checked.result === 'invalid') {
            throw new Error(checked.reason);
        }

        const board = new Board();
        for (let row = 0; row < SIZE; row++) {
            for (let col = 0; col < SIZE; col++) {
                board.setIndex(cellIndex(row, col), checked.grid[row][col]);
            }
        }
        return board;
    }

    // Parse an 81 character string; digits 1-9 are placed, 0 or '.' are empty
    static fromString(str: string): Board {
        const s = str.replace(/\s+/g, '');
        if (s.length !== NUM_CELLS) {
            throw new Error(`Board string must be ${NUM_CELLS} characters.`);
        }

        const board = new Board();
        for (let i = 0; i < NUM_CELLS; i++) {
            const ch = s[i];
            if (ch === '0' || ch === '.') continue;
            const value = Number(ch);
            if (!Number.isInteger(value) || value < 1 || value > SIZE) {
                throw new Error(`Invalid digit '${ch}' at ${cellName(i)}.`);
            }
            board.setIndex(i, value);
        }
        return board;
    }

    // Copy board for backtracking purposes
    clone(): Board {
        const clone = new Board();
        clone.cells.set(this.cells);
        clone.counts.set(this.counts);
        clone.usedMasks.set(this.usedMasks);
        clone.emptyCount = this.emptyCount;
        return clone;
    }

    get regions(): readonly Region[] {
        return regions;
    }

    get clueCount(): number {
        return NUM_CELLS - this.emptyCount;
    }

    cellIndex(row: number, col: number): CellIndex {
        return cellIndex(row, col);
    }

    cellCoords(index: CellIndex): CellCoords {
        return cellCoords(index);
    }

    peers(index: CellIndex): readonly CellIndex[] {
        return cellPeers[index];
    }

    get(row: number, col: number): CellValue {
        Board.assertCoords(row, col);
        return this.cells[cellIndex(row, col)];
    }

    // No legality check is performed
    set(row: number, col: number, value: CellValue) {
        Board.assertCoords(row, col);
        Board.assertValue(value);
        this.setIndex(cellIndex(row, col), value);
    }

    getIndex(index: CellIndex): CellValue {
        return this.cells[index];
    }

    setIndex(index: CellIndex, value: CellValue) {
        const oldValue = this.cells[index];
        if (oldValue === value) {
            return;
        }

        const units = cellRegions[index];
        if (oldValue !== 0) {
            for (const unit of units) {
                const countIndex = unit * SIZE + oldValue - 1;
                if (--this.counts[countIndex] === 0) {
                    this.usedMasks[unit] &= ~valueBit(oldValue);
                }
            }
            this.emptyCount++;
        }

        if (value !== 0) {
            for (const unit of units) {
                this.counts[unit * SIZE + value - 1]++;
                this.usedMasks[unit] |= valueBit(value);
            }
            this.emptyCount--;
        }

        this.cells[index] = value;
    }

    // Digits present anywhere in the cell's row, column or box
    usedMask(index: CellIndex): CellMask {
        const [row, col, box] = cellRegions[index];
        return (this.usedMasks[row] | this.usedMasks[col] | this.usedMasks[box]) & ALL_VALUES;
    }

    /**
     * Returns true if no other cell in the same row, column or box holds the value.
     * Zero represents an empty cell and is always legal.
     */
    isLegal(row: number, col: number, value: CellValue): boolean {
        Board.assertCoords(row, col);
        Board.assertValue(value);
        return this.isLegalIndex(cellIndex(row, col), value);
    }

    isLegalIndex(index: CellIndex, value: CellValue): boolean {
        if (value === 0) {
            return true;
        }

        const self = this.cells[index] === value ? 1 : 0;
        for (const unit of cellRegions[index]) {
            if (this.counts[unit * SIZE + value - 1] - self > 0) {
                return false;
            }
        }
        return true;
    }

    // True if no region holds a duplicate digit
    isValid(): boolean {
        for (let i = 0; i < this.counts.length; i++) {
            if (this.counts[i] > 1) {
                return false;
            }
        }
        return true;
    }

    isComplete(): boolean {
        return this.emptyCount === 0 && this.isValid();
    }

    // Every filled cell whose digit also appears elsewhere in one of its regions
    findConflicts(): CellIndex[] {
        const conflicts: CellIndex[] = [];
        for (let index = 0; index < NUM_CELLS; index++) {
            const value = this.cells[index];
            if (value !== 0 && !this.isLegalIndex(index, value)) {
                conflicts.push(index);
            }
        }
        return conflicts;
    }

    getValueArray(): CellValue[] {
        return Array.from(this.cells);
    }

    valueString(): string {
        return this.cells.join('');
    }

    toGrid(): Grid {
        return Array.from({ length: SIZE }, (_, row) => Array.from(this.cells.subarray(row * SIZE, row * SIZE + SIZE)));
    }

    static assertCoords(row: number, col: number) {
        if (!Number.isInteger(row) || row < 0 || row >= SIZE || !Number.isInteger(col) || col < 0 || col >= SIZE) {
            throw new OutOfRangeError(`Cell (${row}, ${col}) is out of range`);
        }
    }

    static assertValue(value: CellValue) {
        if (!Number.isInteger(value) || value < 0 || value > SIZE) {
            throw new OutOfRangeError(`Value ${value} is out of range`);
        }
    }
}

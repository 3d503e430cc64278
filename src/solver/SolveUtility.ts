import { Random } from './Random';

export type CellIndex = number;
export type CellMask = number;
export type CellValue = number;

export const SIZE = 9;
export const BOX_SIZE = 3;
export const NUM_CELLS = SIZE * SIZE;

export interface CellCoords {
    row: number;
    col: number;
}

export function popcount(x: CellMask): number {
    x -= (x >> 1) & 0x55555555;
    x = (x & 0x33333333) + ((x >> 2) & 0x33333333);
    x = (x + (x >> 4)) & 0x0f0f0f0f;
    x += x >> 8;
    x += x >> 16;
    return x & 0x0000003f;
}

// Count the number of trailing zeros in an integer
export function ctz(x: CellMask): number {
    return popcount((x & -x) - 1);
}

// Computes the bitmask with all values set
export function allValues(size: number): CellMask {
    return (1 << size) - 1;
}

// Computes the bitmask with a specific value set
export function valueBit(value: CellValue): CellMask {
    return 1 << (value - 1);
}

// Get the value of the first set bit
export function minValue(bits: CellMask): CellValue {
    return ctz(bits) + 1;
}

// Get the value of a randomly set bit
export function randomValue(bits: CellMask, random: Random): CellValue {
    if (bits === 0) {
        return 0;
    }

    let valueIndex = Math.floor(random() * popcount(bits));
    let curBits = bits;
    while (curBits !== 0) {
        const value = minValue(curBits);
        if (valueIndex === 0) {
            return value;
        }
        curBits ^= valueBit(value);
        valueIndex--;
    }
    return 0;
}

export function valuesMask(values: CellValue[]): CellMask {
    return values.reduce((mask, value) => mask | valueBit(value), 0);
}

export function valuesList(mask: CellMask): CellValue[] {
    const values: number[] = [];
    while (mask !== 0) {
        const value = minValue(mask);
        values.push(value);
        mask ^= valueBit(value);
    }
    return values;
}

export function maskToString(mask: CellMask): string {
    return valuesList(mask).join('');
}

export function cellIndex(row: number, col: number): CellIndex {
    return row * SIZE + col;
}

export function cellCoords(index: CellIndex): CellCoords {
    return { row: Math.floor(index / SIZE), col: index % SIZE };
}

export function boxIndex(row: number, col: number): number {
    return Math.floor(row / BOX_SIZE) * BOX_SIZE + Math.floor(col / BOX_SIZE);
}

export function cellName(index: CellIndex): string {
    const { row, col } = cellCoords(index);
    return `R${row + 1}C${col + 1}`;
}

export function cellIndexFromName(name: string): CellIndex {
    const regex = /r(\d+)c(\d+)/;
    const match = regex.exec(name.toLowerCase());
    if (!match) {
        throw new Error(`Invalid cell name: ${name}`);
    }

    const row = parseInt(match[1]) - 1;
    const col = parseInt(match[2]) - 1;
    return row * SIZE + col;
}

export function sequenceEqual<T>(arr1: readonly T[], arr2: readonly T[]): boolean {
    if (arr1.length !== arr2.length) {
        return false;
    }

    return arr1.every((value, index) => value === arr2[index]);
}

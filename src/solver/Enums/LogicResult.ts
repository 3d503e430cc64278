// Outcome of applying one logical step to a board
export enum LogicResult {
    UNCHANGED,
    CHANGED,
    INVALID,
}

import { describe, it, expect } from "vitest";
import { TransactionLog } from "../undo/TransactionLog";
import type { Undoable } from "../board/types";

class Box implements Undoable<Box> {
    constructor(public value: number) {}

    clone(): Box {
        return new Box(this.value);
    }
}

function readAll(log: TransactionLog<Box>): Box[] {
    const result: Box[] = [];
    const it = log.startReadObject();
    for (let box = log.readObject(it); box; box = log.readObject(it)) {
        result.push(box);
    }
    return result;
}

describe("TransactionLog", () => {
    it("has nothing to undo or redo when empty", () => {
        const log = new TransactionLog<Box>();

        expect(log.canUndo()).toBe(false);
        expect(log.undo()).toBe(false);
        expect(log.canRedo()).toBe(false);
        expect(log.redo()).toBe(false);
    });

    it("rejects saving an object it does not hold", () => {
        const log = new TransactionLog<Box>();

        expect(() => log.saveForUndo(new Box(1))).toThrow("object is not in the log");
    });

    it("keeps only the first state per snapshot level", () => {
        const log = new TransactionLog<Box>();
        const box = new Box(1);
        log.insert(box);
        log.generateSnapshot();

        log.saveForUndo(box);
        box.value = 2;
        log.saveForUndo(box);
        box.value = 3;

        const changed: Box[] = [];
        expect(log.undo(changed)).toBe(true);

        expect(changed.map((b) => b.value)).toEqual([1]);
        expect(log.contains(box)).toBe(false);
        expect(log.contains(changed[0])).toBe(true);
        expect(readAll(log)).toEqual(changed);
    });

    it("removes objects inserted after the snapshot and re-inserts them on redo", () => {
        const log = new TransactionLog<Box>();
        log.insert(new Box(1));
        log.generateSnapshot();
        const added = new Box(2);
        log.insert(added);

        const changed: Box[] = [];
        const cancelled: Box[] = [];
        expect(log.undo(changed, cancelled)).toBe(true);
        expect(changed).toEqual([]);
        expect(cancelled).toEqual([added]);
        expect(log.size).toBe(1);

        const redone: Box[] = [];
        expect(log.redo(redone)).toBe(true);
        expect(redone[0]).toBe(added);
        expect(log.contains(added)).toBe(true);
        expect(log.size).toBe(2);
    });

    it("undoes an empty level without replaying anything", () => {
        const log = new TransactionLog<Box>();
        log.insert(new Box(1));
        log.generateSnapshot();

        expect(log.undo()).toBe(true);
        expect(log.readObject(log.startReadObject())).toBeNull();
        expect(log.canUndo()).toBe(false);
    });

    it("restores an object inserted and changed in later levels", () => {
        const log = new TransactionLog<Box>();
        log.generateSnapshot();
        const box = new Box(1);
        log.insert(box);
        log.generateSnapshot();
        log.saveForUndo(box);
        box.value = 5;

        log.undo();
        expect(readAll(log).map((b) => b.value)).toEqual([1]);
        log.undo();
        expect(log.size).toBe(0);

        log.redo();
        expect(readAll(log).map((b) => b.value)).toEqual([1]);
        log.redo();
        expect(readAll(log)).toEqual([box]);
        expect(box.value).toBe(5);
    });

    it("forgets the redo history on a new snapshot", () => {
        const log = new TransactionLog<Box>();
        const box = new Box(1);
        log.insert(box);
        log.generateSnapshot();
        log.saveForUndo(box);
        box.value = 2;
        log.undo();

        expect(log.canRedo()).toBe(true);
        log.generateSnapshot();
        expect(log.canRedo()).toBe(false);
        expect(log.redo()).toBe(false);
    });
});

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { cmdReplay, describeOutcome } from "../cli/commands/replay";
import { resetConfig } from "../cli/config";

const EDITS = `
steps:
  - add: { name: R1, x: 0, y: 0, package: R_0603 }
  - snapshot
  - move: { component: R1, x: 2000, y: 0 }
  - undo
  - redo
  - redo
`;

describe("describeOutcome", () => {
    it("describes creations and undo/redo results", () => {
        expect(describeOutcome({ step: 1, kind: "add", created: 3 })).toBe("  → step 1: added component #3");
        expect(describeOutcome({ step: 4, kind: "undo", applied: true, moved: ["R1", "U2"] })).toBe(
            "  → step 4: undo restored R1, U2"
        );
        expect(describeOutcome({ step: 5, kind: "redo", applied: true, moved: [] })).toBe(
            "  → step 5: redo restored no components"
        );
        expect(describeOutcome({ step: 6, kind: "undo", applied: false, moved: [] })).toBe("  → step 6: nothing to undo");
    });

    it("has nothing to say about plain edits", () => {
        expect(describeOutcome({ step: 2, kind: "snapshot" })).toBeNull();
        expect(describeOutcome({ step: 3, kind: "move" })).toBeNull();
    });
});

describe("replay command", () => {
    let tempDir: string;
    let savedRoot: string | undefined;

    beforeEach(() => {
        tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "board-replay-"));
        fs.writeFileSync(path.join(tempDir, "edits.yml"), EDITS);
        fs.writeFileSync(path.join(tempDir, "board.yml"), "unitsPerMm: 1000\n");

        savedRoot = process.env.BOARD_ROOT;
        process.env.BOARD_ROOT = tempDir;
        resetConfig();

        vi.spyOn(console, "log").mockImplementation(() => {});
        vi.spyOn(console, "error").mockImplementation(() => {});
        vi.spyOn(process, "exit").mockImplementation((code) => {
            throw new Error(`exit ${code}`);
        });
    });

    afterEach(() => {
        if (savedRoot === undefined) {
            delete process.env.BOARD_ROOT;
        } else {
            process.env.BOARD_ROOT = savedRoot;
        }
        resetConfig();
        vi.restoreAllMocks();
        fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it("replays the script, prints the placement and writes the CPL", async () => {
        await cmdReplay(["edits.yml", "--cpl", "out/cpl.csv"]);

        const cplPath = path.join(tempDir, "out", "cpl.csv");
        expect(vi.mocked(console.log).mock.calls.map((call) => call[0])).toEqual([
            "\n🚀  Replaying: edits.yml\n",
            "  → step 1: added component #1",
            "  → step 4: undo restored R1",
            "  → step 5: redo restored R1",
            "  → step 6: nothing to redo",
            "\n✨  Placement (1 of 1 components on the board)\n" + "─".repeat(30),
            "  #1  R1  (2000, 0)  0.0°  front  R_0603",
            "─".repeat(30),
            `  ✅ CPL written to ${cplPath}`,
        ]);
        expect(fs.readFileSync(cplPath, "utf-8").split("\n")).toEqual([
            "Designator,Val,Package,Mid X,Mid Y,Rotation,Layer",
            "R1,,R_0603,2.0000mm,0.0000mm,0.0,Top",
        ]);
        expect(console.error).not.toHaveBeenCalled();
    });

    it("fails with the step of a broken edit", async () => {
        fs.writeFileSync(
            path.join(tempDir, "edits.yml"),
            "steps:\n  - add: { name: R1, x: 0, y: 0, package: R }\n  - snapshot\n  - add: { name: R2, x: 0, y: 0, package: R }\n  - undo\n  - move: { component: R2, x: 1, y: 0 }\n"
        );

        await expect(cmdReplay(["edits.yml"])).rejects.toThrow("exit 1");
        expect(console.error).toHaveBeenCalledWith("❌  Replay failed: step 5: component #2 is not on the board");
    });

    it("fails when the script does not exist", async () => {
        await expect(cmdReplay(["missing.yml"])).rejects.toThrow("exit 1");
        expect(console.error).toHaveBeenCalledWith(`❌  Script not found: ${path.join(tempDir, "missing.yml")}`);
        expect(console.log).not.toHaveBeenCalled();
    });

    it("checks --cpl before replaying", async () => {
        await expect(cmdReplay(["edits.yml", "--cpl"])).rejects.toThrow("exit 1");
        expect(console.error).toHaveBeenCalledWith("❌  --cpl needs a value");
        expect(console.log).not.toHaveBeenCalled();
        expect(fs.existsSync(path.join(tempDir, "out"))).toBe(false);
    });

    it("needs a script file", async () => {
        await expect(cmdReplay([])).rejects.toThrow("exit 1");
        expect(console.error).toHaveBeenCalledWith("❌  replay needs a script file, e.g. board-edit replay edits.yml");
    });
});
